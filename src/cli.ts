#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  CAPABILITY_PRESETS,
  CircuitSummarySchema,
  ValidationResult,
  capabilitiesFromPreset,
  unwrap,
  type Capabilities,
  type CircuitSummary,
} from './models/index.js';
import { checkCircuit, waitForResult, withRetry } from './core/index.js';
import { createSimulator } from './backends/index.js';
import { loadConfig, retryOptionsFromConfig, waitOptionsFromConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { stableHash } from './utils/hash.js';

interface PresetCliOptions {
  qubits?: number;
  zones?: number;
  name?: string;
}

interface ValidateCliOptions extends PresetCliOptions {
  preset: string;
}

interface DemoCliOptions {
  shots: number;
  qubits?: number;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function resolvePreset(preset: string, opts: PresetCliOptions): Capabilities {
  return unwrap(
    capabilitiesFromPreset(preset, {
      ...(opts.name !== undefined ? { name: opts.name } : {}),
      ...(opts.qubits !== undefined ? { numQubits: opts.qubits } : {}),
      ...(opts.zones !== undefined ? { zones: opts.zones } : {}),
    })
  );
}

function readCircuit(file: string): CircuitSummary {
  const raw: unknown = JSON.parse(readFileSync(resolve(file), 'utf-8'));
  const parsed = CircuitSummarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid circuit file ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// GHZ state: H on qubit 0, then a CX chain.
function ghzCircuit(numQubits: number): CircuitSummary {
  const operations = [{ gate: 'h', qubits: [0] }];
  for (let q = 0; q + 1 < numQubits; q++) {
    operations.push({ gate: 'cx', qubits: [q, q + 1] });
  }
  return { numQubits, operations };
}

async function demo(opts: DemoCliOptions): Promise<void> {
  const config = unwrap(loadConfig({ dotenv: true }));
  const logger = createLogger(config.logging);
  const backend = createSimulator(config, logger);

  const numQubits = opts.qubits ?? Math.min(3, backend.capabilities().numQubits);
  const circuit = ghzCircuit(numQubits);

  const jobId = unwrap(
    await withRetry(() => backend.submit(circuit, opts.shots), { ...retryOptionsFromConfig(config), logger })
  );
  logger.info({ jobId, shots: opts.shots, numQubits }, 'Waiting for demo job');

  const result = unwrap(await waitForResult(backend, jobId, { ...waitOptionsFromConfig(config), logger }));

  printJson({
    backend: backend.name(),
    jobId,
    result: result.toJSON(),
    mostFrequent: result.mostFrequent() ?? null,
  });
}

const program = new Command();
program.name('qbc').description('Quantum backend contract toolkit').version('0.1.0');

program
  .command('presets')
  .description('List the built-in hardware presets')
  .action(() => {
    for (const [name, entry] of Object.entries(CAPABILITY_PRESETS)) {
      console.log(`${name.padEnd(14)} ${String(entry.defaultQubits).padStart(4)} qubits  ${entry.description}`);
    }
  });

program
  .command('inspect')
  .description('Print the capabilities of a preset as JSON')
  .argument('<preset>', 'Preset name (see `qbc presets`)')
  .option('--qubits <n>', 'Qubit count', parseInteger)
  .option('--zones <n>', 'Interaction zones (neutral-atom only)', parseInteger)
  .option('--name <name>', 'Device name')
  .action((preset: string, opts: PresetCliOptions) => {
    const caps = resolvePreset(preset, opts);
    printJson({ capabilities: caps.toJSON(), fingerprint: stableHash(caps) });
  });

program
  .command('validate')
  .description('Check a circuit summary (JSON) against a preset')
  .argument('<circuit>', 'Path to a {"numQubits", "operations"} JSON file')
  .requiredOption('--preset <preset>', 'Preset name')
  .option('--qubits <n>', 'Qubit count', parseInteger)
  .option('--zones <n>', 'Interaction zones (neutral-atom only)', parseInteger)
  .action((file: string, opts: ValidateCliOptions) => {
    const caps = resolvePreset(opts.preset, opts);
    const validation = checkCircuit(readCircuit(file), caps);
    printJson(ValidationResult.toJSON(validation));
    if (!validation.isValid) {
      process.exitCode = 2;
    }
  });

program
  .command('demo')
  .description('Run a GHZ circuit on the in-memory simulator')
  .option('--shots <n>', 'Number of shots', parseInteger, 1024)
  .option('--qubits <n>', 'Circuit width', parseInteger)
  .action((opts: DemoCliOptions) => demo(opts));

program.parseAsync(process.argv).catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
