/**
 * Zod schemas for all data models
 * Single source of truth for validation of serialized values
 */

import { z } from 'zod';
import { JobStatuses } from './states.js';

const QubitIndexSchema = z.number().int().min(0);

const FidelitySchema = z.number().min(0).max(1);

// Gate names are lowercase OpenQASM 3 identifiers
export const GateNameSchema = z
  .string()
  .min(1)
  .transform((name) => name.toLowerCase());

// Rightmost character is qubit 0
export const BitstringSchema = z.string().regex(/^[01]+$/, 'bitstring must contain only 0 and 1');

// ============================================================================
// Hardware description
// ============================================================================

export const NoiseProfileSchema = z.object({
  t1: z.number().nonnegative().optional(),
  t2: z.number().nonnegative().optional(),
  singleQubitFidelity: FidelitySchema.optional(),
  twoQubitFidelity: FidelitySchema.optional(),
  readoutFidelity: FidelitySchema.optional(),
  gateTime: z.number().nonnegative().optional(),
});

export const GateSetSchema = z.object({
  singleQubit: z.array(GateNameSchema),
  twoQubit: z.array(GateNameSchema),
  threeQubit: z.array(GateNameSchema).default([]),
  native: z.array(GateNameSchema).default([]),
});

export const GateSetPresetsSchema = z.record(GateSetSchema);

export const TopologyKindSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('fully_connected') }),
  z.object({ type: z.literal('linear') }),
  z.object({ type: z.literal('star') }),
  z.object({
    type: z.literal('grid'),
    rows: z.number().int().min(0),
    cols: z.number().int().min(0),
  }),
  z.object({ type: z.literal('heavy_hex') }),
  z.object({ type: z.literal('custom') }),
  z.object({ type: z.literal('neutral_atom'), zones: z.number().int().min(0) }),
]);

export const TopologySchema = z.object({
  kind: TopologyKindSchema,
  edges: z.array(z.tuple([QubitIndexSchema, QubitIndexSchema])),
});

export const CapabilitiesSchema = z.object({
  name: z.string().min(1),
  numQubits: z.number().int().min(0),
  gateSet: GateSetSchema,
  topology: TopologySchema,
  maxShots: z.number().int().positive(),
  isSimulator: z.boolean(),
  features: z.array(z.string()).default([]),
  noiseProfile: NoiseProfileSchema.optional(),
});

export type NoiseProfile = z.infer<typeof NoiseProfileSchema>;
export type GateSetData = z.infer<typeof GateSetSchema>;
export type TopologyKind = z.infer<typeof TopologyKindSchema>;
export type TopologyData = z.infer<typeof TopologySchema>;
export type CapabilitiesData = z.infer<typeof CapabilitiesSchema>;

// ============================================================================
// Availability & validation
// ============================================================================

export const BackendAvailabilitySchema = z.object({
  isAvailable: z.boolean(),
  queueDepth: z.number().int().min(0).optional(),
  estimatedWaitSecs: z.number().nonnegative().optional(),
  statusMessage: z.string().optional(),
});

export const ValidationResultSchema = z.object({
  isValid: z.boolean(),
  reasons: z.array(z.string()).default([]),
  requiresTranspilation: z.boolean().default(false),
  transpilationDetails: z.string().optional(),
});

export type BackendAvailabilityData = z.infer<typeof BackendAvailabilitySchema>;
export type ValidationResultData = z.infer<typeof ValidationResultSchema>;

// ============================================================================
// Jobs & results
// ============================================================================

export const JobStatusSchema = z.enum([
  JobStatuses.QUEUED,
  JobStatuses.RUNNING,
  JobStatuses.COMPLETED,
  JobStatuses.FAILED,
  JobStatuses.CANCELLED,
]);

export const CountsSchema = z.record(BitstringSchema, z.number().int().min(0));

export const ExecutionResultSchema = z.object({
  counts: CountsSchema,
  shots: z.number().int().min(0),
  executionTimeMs: z.number().int().min(0).optional(),
  metadata: z.record(z.unknown()).default({}),
});

export type CountsData = z.infer<typeof CountsSchema>;
export type ExecutionResultData = z.infer<typeof ExecutionResultSchema>;

// ============================================================================
// Circuit summary (backend-neutral view used by pre-flight checks)
// ============================================================================

export const OperationSchema = z.object({
  gate: GateNameSchema,
  qubits: z.array(QubitIndexSchema),
});

export const CircuitSummarySchema = z.object({
  numQubits: z.number().int().min(0),
  operations: z.array(OperationSchema),
});

export type Operation = z.infer<typeof OperationSchema>;
export type CircuitSummary = z.infer<typeof CircuitSummarySchema>;
