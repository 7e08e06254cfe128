#!/usr/bin/env node
/**
 * skrode CLI: run or check a worker topology.
 *
 * Usage:
 *   skrode run [-c config.yml] [--memory]   Run every worker in the topology until SIGINT/SIGTERM
 *   skrode check [-c config.yml]            Validate the topology and its targets, then exit
 *
 * The config path defaults to $SKRODE_CONFIG, then ./config.yml.
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadEnv, type SkrodeEnv } from './config/schema.js';
import { ConfigError, TopologyFailedError, errorMessage } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { MemoryQueueBackend } from './queue/memory.js';
import { RedisQueueBackend } from './queue/redis.js';
import type { QueueBackend } from './queue/types.js';
import { TopologyRunner } from './runner/runner.js';
import type { RunReport } from './runner/types.js';
import { createDefaultTargets } from './targets/builtin.js';
import type { TargetRegistry } from './targets/registry.js';
import { loadTopology } from './topology/registry.js';

export interface CliOptions {
  command?: string;
  config: string;
  /** Use in-process queues instead of the configured Redis connections. */
  memory: boolean;
}

export function parseArgs(argv: string[], defaultConfig = 'config.yml'): CliOptions {
  const options: CliOptions = { config: defaultConfig, memory: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-c' || arg === '--config') {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`${arg} needs a file path`);
      }
      options.config = value;
      i++;
    } else if (arg.startsWith('--config=')) {
      options.config = arg.slice('--config='.length);
    } else if (arg === '--memory') {
      options.memory = true;
    } else if (arg.startsWith('-')) {
      throw new Error(`Unknown option: ${arg}`);
    } else if (options.command === undefined) {
      options.command = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return options;
}

export interface CheckResult {
  connections: string[];
  queues: string[];
  workers: string[];
  instances: string[];
}

/**
 * Load and validate a topology, and bind every instance's target, without
 * opening any connection.
 */
export function checkConfig(configPath: string, targets: TargetRegistry = createDefaultTargets()): CheckResult {
  const { config, registry } = loadTopology(configPath);
  const instances = registry.instances();
  for (const instance of instances) {
    targets.bind(instance.definition);
  }
  return {
    connections: Array.from(config.connections.keys()),
    queues: Array.from(config.queues.keys()),
    workers: registry.names(),
    instances: instances.map((i) => i.id),
  };
}

export interface RunDeps {
  logger: Logger;
  signal: AbortSignal;
  targets?: TargetRegistry;
  backend?: QueueBackend;
}

/**
 * Load a topology and run it until `signal` aborts. Targets are disposed
 * once the run ends, whichever way it ends.
 */
export async function runTopology(options: Pick<CliOptions, 'config' | 'memory'>, deps: RunDeps): Promise<RunReport> {
  const { config, registry } = loadTopology(options.config);
  const targets = deps.targets ?? createDefaultTargets();
  const backend = deps.backend ?? (options.memory ? new MemoryQueueBackend() : new RedisQueueBackend());

  const runner = new TopologyRunner({
    registry,
    targets,
    backend,
    logger: deps.logger,
    settings: config.runner,
  });

  try {
    return await runner.run(deps.signal);
  } finally {
    await targets.dispose();
  }
}

function printUsage(): void {
  console.log('skrode v0.1.0');
  console.log('\nUsage:');
  console.log('  skrode run [-c config.yml] [--memory]   Run the worker topology until interrupted');
  console.log('  skrode check [-c config.yml]            Validate the topology and exit');
}

// --- CLI runner (only executes when this file is the entry point) ---
const isDirectRun = (() => {
  try {
    const self = fileURLToPath(import.meta.url);
    const invoked = realpathSync(process.argv[1]);
    return invoked === self;
  } catch {
    return false;
  }
})();

if (isDirectRun) {
  let env: SkrodeEnv;
  let options: CliOptions;
  try {
    env = loadEnv();
    options = parseArgs(process.argv.slice(2), env.SKRODE_CONFIG);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  if (options.command === 'check') {
    try {
      const result = checkConfig(options.config);
      console.log(`\n  ${options.config} is valid.\n`);
      console.log(`  Connections  ${result.connections.join(', ') || '(none)'}`);
      console.log(`  Queues       ${result.queues.join(', ') || '(none)'}`);
      console.log(`  Workers      ${result.workers.join(', ') || '(none)'}`);
      console.log(`  Instances    ${result.instances.join(', ') || '(none)'}\n`);
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  } else if (options.command === 'run') {
    const logger = createLogger({ level: env.SKRODE_LOG_LEVEL });
    const controller = new AbortController();
    const shutdown = (sig: NodeJS.Signals) => {
      logger.fatal(`Got ${sig}, shutting down`);
      controller.abort();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    try {
      const report = await runTopology(options, { logger, signal: controller.signal });
      // Tasks that outlived the shutdown timeout would otherwise keep the process alive.
      if (report.timedOut.length > 0) process.exit(1);
    } catch (err) {
      if (err instanceof ConfigError) {
        console.error(`Error: ${err.message}`);
      } else if (err instanceof TopologyFailedError) {
        logger.fatal(err.message, { tasks: err.report.tasks });
      } else {
        logger.fatal('Topology crashed', { error: errorMessage(err) });
      }
      process.exitCode = 1;
    }
  } else {
    printUsage();
  }
}
