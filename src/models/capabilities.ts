/**
 * Backend capability introspection
 *
 * Describes what a backend can do: qubit count, supported gates,
 * connectivity, shot limits and noise characteristics. Backends build one
 * at construction time and hand out the same snapshot on every call.
 */

import { CapabilitiesSchema, type CapabilitiesData, type NoiseProfile } from './schemas.js';
import { GateSet } from './gate-set.js';
import { Topology } from './topology.js';
import { ContractError } from './errors.js';
import { Err, Ok, type Result } from './result.js';

export interface CapabilitiesInit {
  name: string;
  numQubits: number;
  gateSet: GateSet;
  topology: Topology;
  maxShots: number;
  isSimulator: boolean;
  features?: readonly string[];
  noiseProfile?: NoiseProfile;
}

export class Capabilities {
  readonly name: string;
  readonly numQubits: number;
  readonly gateSet: GateSet;
  readonly topology: Topology;
  readonly maxShots: number;
  readonly isSimulator: boolean;
  readonly features: readonly string[];
  readonly noiseProfile: Readonly<NoiseProfile> | undefined;

  constructor(init: CapabilitiesInit) {
    this.name = init.name;
    this.numQubits = init.numQubits;
    this.gateSet = init.gateSet;
    this.topology = init.topology;
    this.maxShots = init.maxShots;
    this.isSimulator = init.isSimulator;
    this.features = Object.freeze([...(init.features ?? [])]);
    this.noiseProfile = init.noiseProfile ? Object.freeze({ ...init.noiseProfile }) : undefined;
    Object.freeze(this);
  }

  static simulator(numQubits: number): Capabilities {
    return new Capabilities({
      name: 'simulator',
      numQubits,
      gateSet: GateSet.universal(),
      topology: Topology.full(numQubits),
      maxShots: 100_000,
      isSimulator: true,
      features: ['statevector', 'unitary'],
    });
  }

  static iqm(name: string, numQubits: number): Capabilities {
    return new Capabilities({
      name,
      numQubits,
      gateSet: GateSet.iqm(),
      topology: Topology.star(numQubits),
      maxShots: 20_000,
      isSimulator: false,
    });
  }

  // Eagle and Heron ship without connectivity; attach the device's
  // coupling map with withTopology().
  static ibmEagle(name: string, numQubits: number): Capabilities {
    return new Capabilities({
      name,
      numQubits,
      gateSet: GateSet.ibmEagle(),
      topology: Topology.custom([]),
      maxShots: 100_000,
      isSimulator: false,
      features: ['dynamic_circuits'],
    });
  }

  static ibmHeron(name: string, numQubits: number): Capabilities {
    return new Capabilities({
      name,
      numQubits,
      gateSet: GateSet.ibmHeron(),
      topology: Topology.custom([]),
      maxShots: 100_000,
      isSimulator: false,
      features: ['dynamic_circuits'],
    });
  }

  static neutralAtom(name: string, numQubits: number, zones: number): Capabilities {
    return new Capabilities({
      name,
      numQubits,
      gateSet: GateSet.neutralAtom(),
      topology: Topology.neutralAtom(numQubits, zones),
      maxShots: 100_000,
      isSimulator: false,
      features: ['shuttling', 'zoned'],
    });
  }

  static rigetti(name: string, numQubits: number): Capabilities {
    const side = Math.ceil(Math.sqrt(numQubits));
    return new Capabilities({
      name,
      numQubits,
      gateSet: GateSet.rigetti(),
      topology: Topology.grid(side, side),
      maxShots: 100_000,
      isSimulator: false,
    });
  }

  static ionq(name: string, numQubits: number): Capabilities {
    return new Capabilities({
      name,
      numQubits,
      gateSet: GateSet.ionq(),
      topology: Topology.full(numQubits),
      maxShots: 100_000,
      isSimulator: false,
    });
  }

  static parse(data: unknown): Result<Capabilities, ContractError> {
    const parsed = CapabilitiesSchema.safeParse(data);
    if (!parsed.success) {
      return Err(new ContractError('CONFIGURATION', `invalid capabilities: ${parsed.error.message}`));
    }

    const { gateSet, topology, noiseProfile, ...rest } = parsed.data;
    return Ok(
      new Capabilities({
        ...rest,
        gateSet: new GateSet(gateSet),
        topology: new Topology(topology.kind, topology.edges),
        ...(noiseProfile ? { noiseProfile } : {}),
      })
    );
  }

  withTopology(topology: Topology): Capabilities {
    return new Capabilities({ ...this.toInit(), topology });
  }

  withNoiseProfile(noiseProfile: NoiseProfile): Capabilities {
    return new Capabilities({ ...this.toInit(), noiseProfile });
  }

  toJSON(): CapabilitiesData {
    return {
      name: this.name,
      numQubits: this.numQubits,
      gateSet: this.gateSet.toJSON(),
      topology: this.topology.toJSON(),
      maxShots: this.maxShots,
      isSimulator: this.isSimulator,
      features: [...this.features],
      ...(this.noiseProfile ? { noiseProfile: { ...this.noiseProfile } } : {}),
    };
  }

  private toInit(): CapabilitiesInit {
    return {
      name: this.name,
      numQubits: this.numQubits,
      gateSet: this.gateSet,
      topology: this.topology,
      maxShots: this.maxShots,
      isSimulator: this.isSimulator,
      features: this.features,
      ...(this.noiseProfile ? { noiseProfile: this.noiseProfile } : {}),
    };
  }
}

// ============================================================================
// Preset registry (kebab-case names, used by the CLI)
// ============================================================================

export interface PresetOptions {
  name?: string;
  numQubits?: number;
  zones?: number;
}

interface PresetEntry {
  description: string;
  defaultName: string;
  defaultQubits: number;
  build: (name: string, numQubits: number, zones: number) => Capabilities;
}

export const CAPABILITY_PRESETS = {
  simulator: {
    description: 'Ideal simulator, universal gates, all-to-all',
    defaultName: 'simulator',
    defaultQubits: 5,
    build: (_name, numQubits) => Capabilities.simulator(numQubits),
  },
  iqm: {
    description: 'IQM superconducting (PRX + CZ), star topology',
    defaultName: 'iqm-garnet',
    defaultQubits: 20,
    build: (name, numQubits) => Capabilities.iqm(name, numQubits),
  },
  'ibm-eagle': {
    description: 'IBM Eagle (ECR native)',
    defaultName: 'ibm-eagle',
    defaultQubits: 127,
    build: (name, numQubits) => Capabilities.ibmEagle(name, numQubits),
  },
  'ibm-heron': {
    description: 'IBM Heron (CZ native)',
    defaultName: 'ibm-heron',
    defaultQubits: 156,
    build: (name, numQubits) => Capabilities.ibmHeron(name, numQubits),
  },
  rigetti: {
    description: 'Rigetti superconducting (RX, RZ, CZ), square grid',
    defaultName: 'rigetti',
    defaultQubits: 84,
    build: (name, numQubits) => Capabilities.rigetti(name, numQubits),
  },
  ionq: {
    description: 'IonQ trapped-ion (RX, RY, RZ, XX), all-to-all',
    defaultName: 'ionq',
    defaultQubits: 25,
    build: (name, numQubits) => Capabilities.ionq(name, numQubits),
  },
  'neutral-atom': {
    description: 'Neutral-atom array with interaction zones',
    defaultName: 'neutral-atom',
    defaultQubits: 100,
    build: (name, numQubits, zones) => Capabilities.neutralAtom(name, numQubits, zones),
  },
} satisfies Record<string, PresetEntry>;

export type CapabilityPresetName = keyof typeof CAPABILITY_PRESETS;

export function isCapabilityPresetName(value: string): value is CapabilityPresetName {
  return Object.prototype.hasOwnProperty.call(CAPABILITY_PRESETS, value);
}

export function capabilitiesFromPreset(
  preset: string,
  options: PresetOptions = {}
): Result<Capabilities, ContractError> {
  if (!isCapabilityPresetName(preset)) {
    return Err(
      new ContractError(
        'CONFIGURATION',
        `unknown preset "${preset}" (expected one of ${Object.keys(CAPABILITY_PRESETS).join(', ')})`
      )
    );
  }

  const numQubits = options.numQubits ?? CAPABILITY_PRESETS[preset].defaultQubits;
  if (!Number.isInteger(numQubits) || numQubits < 1) {
    return Err(new ContractError('CONFIGURATION', `qubit count must be a positive integer, got ${numQubits}`));
  }

  const zones = options.zones ?? 1;
  if (!Number.isInteger(zones) || zones < 1) {
    return Err(new ContractError('CONFIGURATION', `zone count must be a positive integer, got ${zones}`));
  }

  const entry: PresetEntry = CAPABILITY_PRESETS[preset];
  return Ok(entry.build(options.name ?? entry.defaultName, numQubits, zones));
}
