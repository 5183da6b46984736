/**
 * Qubit connectivity topology
 *
 * Edges are undirected: if `[a, b]` is listed, both a→b and b→a are valid
 * two-qubit interactions.
 */

import { TopologySchema, type TopologyData, type TopologyKind } from './schemas.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export type Edge = readonly [number, number];

export class Topology {
  readonly kind: TopologyKind;
  readonly edges: readonly Edge[];

  constructor(kind: TopologyKind, edges: readonly Edge[]) {
    this.kind = Object.freeze({ ...kind });
    this.edges = Object.freeze(edges.map(([a, b]): Edge => Object.freeze([a, b] as const)));
    Object.freeze(this);
  }

  static linear(n: number): Topology {
    const edges: Edge[] = [];
    for (let i = 0; i + 1 < n; i++) {
      edges.push([i, i + 1]);
    }
    return new Topology({ type: 'linear' }, edges);
  }

  static star(n: number): Topology {
    const edges: Edge[] = [];
    for (let i = 1; i < n; i++) {
      edges.push([0, i]);
    }
    return new Topology({ type: 'star' }, edges);
  }

  static full(n: number): Topology {
    return new Topology({ type: 'fully_connected' }, allPairs(0, n));
  }

  /**
   * Node (r, c) has index r * cols + c and is joined to its right and down
   * neighbours only. No diagonals, no wraparound.
   */
  static grid(rows: number, cols: number): Topology {
    const edges: Edge[] = [];
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < cols; c++) {
        const idx = r * cols + c;
        if (c + 1 < cols) {
          edges.push([idx, idx + 1]);
        }
        if (r + 1 < rows) {
          edges.push([idx, idx + cols]);
        }
      }
    }
    return new Topology({ type: 'grid', rows, cols }, edges);
  }

  static custom(edges: readonly Edge[]): Topology {
    return new Topology({ type: 'custom' }, edges);
  }

  static heavyHex(edges: readonly Edge[]): Topology {
    return new Topology({ type: 'heavy_hex' }, edges);
  }

  /**
   * Qubits inside a zone are all-to-all (Rydberg interaction radius); qubits
   * in different zones need shuttling. The last zone takes the remainder.
   */
  static neutralAtom(numQubits: number, zones: number): Topology {
    const perZone = Math.floor(numQubits / Math.max(zones, 1));
    const edges: Edge[] = [];
    for (let z = 0; z < zones; z++) {
      const start = z * perZone;
      const end = z === zones - 1 ? numQubits : start + perZone;
      edges.push(...allPairs(start, end));
    }
    return new Topology({ type: 'neutral_atom', zones }, edges);
  }

  static parse(data: unknown): Result<Topology, ContractError> {
    const parsed = TopologySchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid topology: ${parsed.error.message}`));
    }
    return Ok(new Topology(parsed.data.kind, parsed.data.edges));
  }

  isConnected(q1: number, q2: number): boolean {
    return this.edges.some(([a, b]) => (a === q1 && b === q2) || (a === q2 && b === q1));
  }

  /** A custom topology with no edges carries no connectivity information. */
  isUnspecified(): boolean {
    return this.kind.type === 'custom' && this.edges.length === 0;
  }

  toJSON(): TopologyData {
    return {
      kind: { ...this.kind },
      edges: this.edges.map(([a, b]): [number, number] => [a, b]),
    };
  }
}

function allPairs(start: number, end: number): Edge[] {
  const edges: Edge[] = [];
  for (let i = start; i < end; i++) {
    for (let j = i + 1; j < end; j++) {
      edges.push([i, j]);
    }
  }
  return edges;
}
