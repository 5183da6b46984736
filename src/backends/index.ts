/**
 * Backend implementations and factory
 */

import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { Capabilities } from '../models/index.js';
import { MockSimulatorBackend } from './mock-simulator.js';

export * from './mock-simulator.js';

export function createSimulator(config: Config, logger?: Logger, capabilities?: Capabilities): MockSimulatorBackend {
  return new MockSimulatorBackend({
    capabilities: capabilities ?? Capabilities.simulator(config.simulator.numQubits),
    queueMs: config.simulator.queueMs,
    runMs: config.simulator.runMs,
    ...(logger ? { logger } : {}),
  });
}
