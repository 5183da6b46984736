/**
 * Capabilities and preset tests
 */

import { describe, test, expect } from 'vitest';
import {
  CAPABILITY_PRESETS,
  Capabilities,
  capabilitiesFromPreset,
  isCapabilityPresetName,
} from '../src/models/capabilities.js';
import { Topology } from '../src/models/topology.js';

describe('Capabilities presets', () => {
  test('simulator', () => {
    const caps = Capabilities.simulator(10);
    expect(caps.name).toBe('simulator');
    expect(caps.isSimulator).toBe(true);
    expect(caps.numQubits).toBe(10);
    expect(caps.maxShots).toBe(100_000);
    expect(caps.gateSet.contains('h')).toBe(true);
    expect(caps.topology.isConnected(0, 9)).toBe(true);
    expect(caps.features).toEqual(['statevector', 'unitary']);
  });

  test('iqm', () => {
    const caps = Capabilities.iqm('Garnet', 20);
    expect(caps.name).toBe('Garnet');
    expect(caps.isSimulator).toBe(false);
    expect(caps.maxShots).toBe(20_000);
    expect(caps.gateSet.contains('prx')).toBe(true);
    expect(caps.gateSet.contains('cz')).toBe(true);
    expect(caps.gateSet.contains('cx')).toBe(false);
    expect(caps.topology.kind).toEqual({ type: 'star' });
  });

  test('ibm presets carry no connectivity', () => {
    const eagle = Capabilities.ibmEagle('ibm-test', 127);
    expect(eagle.topology.isUnspecified()).toBe(true);
    expect(eagle.features).toEqual(['dynamic_circuits']);
    expect(Capabilities.ibmHeron('ibm-test', 156).gateSet.isNative('cz')).toBe(true);
  });

  test('rigetti uses a square grid large enough for every qubit', () => {
    const caps = Capabilities.rigetti('rigetti', 84);
    expect(caps.topology.kind).toEqual({ type: 'grid', rows: 10, cols: 10 });
  });

  test('neutral atom and ionq', () => {
    const atoms = Capabilities.neutralAtom('atoms', 6, 2);
    expect(atoms.topology.kind).toEqual({ type: 'neutral_atom', zones: 2 });
    expect(atoms.features).toEqual(['shuttling', 'zoned']);
    expect(Capabilities.ionq('ionq', 4).topology.edges).toHaveLength(6);
  });

  test('snapshots are frozen', () => {
    const caps = Capabilities.simulator(3);
    expect(Object.isFrozen(caps)).toBe(true);
    expect(Object.isFrozen(caps.features)).toBe(true);
  });

  test('withTopology and withNoiseProfile return new snapshots', () => {
    const eagle = Capabilities.ibmEagle('ibm-test', 3);
    const mapped = eagle.withTopology(Topology.linear(3));
    expect(mapped.topology.isConnected(0, 1)).toBe(true);
    expect(eagle.topology.edges).toHaveLength(0);

    const noisy = mapped.withNoiseProfile({ t1: 100, twoQubitFidelity: 0.99 });
    expect(noisy.noiseProfile).toEqual({ t1: 100, twoQubitFidelity: 0.99 });
    expect(mapped.noiseProfile).toBeUndefined();
    expect(noisy.topology).toBe(mapped.topology);
  });

  test('parse reads what toJSON writes', () => {
    const caps = Capabilities.iqm('Garnet', 5).withNoiseProfile({ readoutFidelity: 0.95 });
    const parsed = Capabilities.parse(caps.toJSON());
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.value.toJSON()).toEqual(caps.toJSON());
    }

    const invalid = Capabilities.parse({ name: 'x' });
    expect(invalid.ok).toBe(false);
    if (!invalid.ok) {
      expect(invalid.error.kind).toBe('CONFIGURATION');
    }
  });
});

describe('capabilitiesFromPreset', () => {
  test('uses preset defaults', () => {
    const result = capabilitiesFromPreset('iqm');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.name).toBe('iqm-garnet');
      expect(result.value.numQubits).toBe(20);
    }
  });

  test('applies overrides', () => {
    const result = capabilitiesFromPreset('neutral-atom', { name: 'lab', numQubits: 6, zones: 2 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.name).toBe('lab');
      expect(result.value.topology.kind).toEqual({ type: 'neutral_atom', zones: 2 });
    }
  });

  test('rejects unknown presets and bad counts', () => {
    const unknown = capabilitiesFromPreset('abacus');
    expect(unknown.ok).toBe(false);
    if (!unknown.ok) {
      expect(unknown.error.kind).toBe('CONFIGURATION');
      expect(unknown.error.detail).toBe(
        'unknown preset "abacus" (expected one of simulator, iqm, ibm-eagle, ibm-heron, rigetti, ionq, neutral-atom)'
      );
    }

    const zeroQubits = capabilitiesFromPreset('ionq', { numQubits: 0 });
    expect(zeroQubits.ok).toBe(false);

    const zeroZones = capabilitiesFromPreset('neutral-atom', { zones: 0 });
    expect(zeroZones.ok).toBe(false);
  });

  test('preset names', () => {
    expect(isCapabilityPresetName('ibm-heron')).toBe(true);
    expect(isCapabilityPresetName('toString')).toBe(false);
    expect(Object.keys(CAPABILITY_PRESETS)).toHaveLength(7);
  });
});
