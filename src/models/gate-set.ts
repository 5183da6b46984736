/**
 * Gate set supported by a backend
 *
 * Gate names follow the OpenQASM 3 convention (lowercase): `h`, `cx`, `rz`,
 * `prx`, ... The `native` list names gates that execute without
 * decomposition; when it is empty every supported gate counts as native
 * (typical for simulators).
 */

import { readFileSync } from 'node:fs';
import { GateSetPresetsSchema, GateSetSchema, type GateSetData } from './schemas.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export interface GateSetInit {
  singleQubit: readonly string[];
  twoQubit: readonly string[];
  threeQubit?: readonly string[];
  native?: readonly string[];
}

export type GateArity = 1 | 2 | 3;

export type GateSetPresetName =
  | 'iqm'
  | 'ibmEagle'
  | 'ibmHeron'
  | 'universal'
  | 'rigetti'
  | 'ionq'
  | 'neutralAtom';

const PRESETS_URL = new URL('../../data/gate-sets.json', import.meta.url);

let presetCache: Record<string, GateSetData> | undefined;

function normalize(names: readonly string[] | undefined): readonly string[] {
  return Object.freeze((names ?? []).map((name) => name.toLowerCase()));
}

function loadPreset(name: GateSetPresetName): GateSet {
  if (!presetCache) {
    const raw: unknown = JSON.parse(readFileSync(PRESETS_URL, 'utf-8'));
    const parsed = GateSetPresetsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid gate set presets: ${parsed.error.message}`);
    }
    presetCache = parsed.data;
  }

  const data = presetCache[name];
  if (!data) {
    throw new Error(`Missing gate set preset: ${name}`);
  }
  return new GateSet(data);
}

export class GateSet {
  readonly singleQubit: readonly string[];
  readonly twoQubit: readonly string[];
  readonly threeQubit: readonly string[];
  readonly native: readonly string[];

  constructor(init: GateSetInit) {
    this.singleQubit = normalize(init.singleQubit);
    this.twoQubit = normalize(init.twoQubit);
    this.threeQubit = normalize(init.threeQubit);
    this.native = normalize(init.native);
    Object.freeze(this);
  }

  /** PRX + CZ native (Garnet, Adonis). */
  static iqm(): GateSet {
    return loadPreset('iqm');
  }

  /** Eagle processors: `ecr, rz, sx, x` native. */
  static ibmEagle(): GateSet {
    return loadPreset('ibmEagle');
  }

  /** Heron processors: `cz, rz, sx, x` native, plus `rx`, `rzz`, `h`. */
  static ibmHeron(): GateSet {
    return loadPreset('ibmHeron');
  }

  /** All standard gates, empty native list. */
  static universal(): GateSet {
    return loadPreset('universal');
  }

  static rigetti(): GateSet {
    return loadPreset('rigetti');
  }

  static ionq(): GateSet {
    return loadPreset('ionq');
  }

  static neutralAtom(): GateSet {
    return loadPreset('neutralAtom');
  }

  static parse(data: unknown): Result<GateSet, ContractError> {
    const parsed = GateSetSchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid gate set: ${parsed.error.message}`));
    }
    return Ok(new GateSet(parsed.data));
  }

  contains(gate: string): boolean {
    return this.arityOf(gate) !== undefined;
  }

  isNative(gate: string): boolean {
    if (this.native.length === 0) {
      return this.contains(gate);
    }
    return this.native.includes(gate.toLowerCase());
  }

  arityOf(gate: string): GateArity | undefined {
    const name = gate.toLowerCase();
    if (this.singleQubit.includes(name)) {
      return 1;
    }
    if (this.twoQubit.includes(name)) {
      return 2;
    }
    if (this.threeQubit.includes(name)) {
      return 3;
    }
    return undefined;
  }

  toJSON(): GateSetData {
    return {
      singleQubit: [...this.singleQubit],
      twoQubit: [...this.twoQubit],
      threeQubit: [...this.threeQubit],
      native: [...this.native],
    };
  }
}
