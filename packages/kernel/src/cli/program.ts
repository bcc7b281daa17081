/**
 * Mesh Kernel CLI
 *
 * Commands: validate, optimize, run, verify-trace, replay, bundle.
 * Every command prints one JSON envelope on stdout; logs go to stderr.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import pino from 'pino';
import { VERSION as CONTRACTS_VERSION, type TraceEvent } from '@mesh-kernel/contracts';
import { createConfig, loadConfigFromEnv, type KernelConfig } from '../config/index.js';
import { KernelError, ValidationError } from '../errors.js';
import { Kernel } from '../kernel.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { isRecord } from '../shared/utils.js';
import { NdjsonTraceSink } from '../trace/trace-emitter.js';
import { compareTraces, createReplayBundle, parseTraceStream, summarizeTrace } from '../trace/replay.js';
import { verifyTraceLog } from '../trace/trace-signer.js';

const VERSION = '0.1.0';

/**
 * CLI output format
 */
export interface CLIOutput {
  success: boolean;
  command: string;
  result?: unknown;
  error?: {
    code: string;
    message: string;
    issues?: unknown[];
  };
  timestamp: string;
}

export interface CLIDependencies {
  /** Receives each printed envelope */
  write: (text: string) => void;
  setExitCode: (code: number) => void;
  env: NodeJS.ProcessEnv;
  createKernel: (config: KernelConfig, logger: Logger) => Promise<Kernel>;
  now: () => number;
}

const defaultDependencies: CLIDependencies = {
  write: (text) => console.log(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  env: process.env,
  createKernel: (config, logger) => Kernel.fromConfig(config, logger),
  now: Date.now,
};

async function readJson(path: string): Promise<unknown> {
  const contents = await readFile(resolve(path), 'utf8');
  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new ValidationError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function readInputs(path: string | undefined): Promise<Record<string, unknown>> {
  if (!path) return {};
  const inputs = await readJson(path);
  if (!isRecord(inputs)) {
    throw new ValidationError(`${path} must contain a JSON object of input variables`);
  }
  return inputs;
}

async function readTrace(path: string): Promise<TraceEvent[]> {
  return parseTraceStream(await readFile(resolve(path), 'utf8'));
}

function errorOutput(command: string, error: unknown, now: () => number): CLIOutput {
  return {
    success: false,
    command,
    error: {
      code: error instanceof KernelError ? error.code : 'CLI_ERROR',
      message: error instanceof Error ? error.message : 'Unknown error',
      ...(error instanceof ValidationError && error.issues.length > 0 && { issues: error.issues }),
    },
    timestamp: new Date(now()).toISOString(),
  };
}

/**
 * Create the CLI program
 */
export function createProgram(overrides: Partial<CLIDependencies> = {}): Command {
  const deps: CLIDependencies = { ...defaultDependencies, ...overrides };

  const print = (output: CLIOutput): void => {
    deps.write(JSON.stringify(output, null, 2));
    deps.setExitCode(output.success ? 0 : 1);
  };

  /**
   * Wrap a command body so every outcome, thrown or not, becomes one
   * envelope.
   */
  const command =
    <O>(name: string, body: (options: O, kernel: () => Promise<Kernel>) => Promise<{ success: boolean; result: unknown }>) =>
    async (options: O & { registryUrl?: string }): Promise<void> => {
      try {
        const base = loadConfigFromEnv(deps.env);
        const config = options.registryUrl ? createConfig({ ...base, registryUrl: options.registryUrl }) : base;
        const logger = createLogger({ component: 'cli', level: config.logLevel, destination: pino.destination(2) });
        const { success, result } = await body(options, () => deps.createKernel(config, logger));
        print({ success, command: name, result, timestamp: new Date(deps.now()).toISOString() });
      } catch (error) {
        print(errorOutput(name, error, deps.now));
      }
    };

  const program = new Command();

  program
    .name('mesh-kernel')
    .description('Plan execution kernel for tool meshes')
    .version(`${VERSION} (contracts ${CONTRACTS_VERSION})`);

  program
    .command('validate')
    .description('Validate a plan against the registered tools')
    .requiredOption('-p, --plan <path>', 'Path to plan JSON')
    .option('-i, --inputs <path>', 'Path to input variables JSON')
    .option('--registry-url <url>', 'Tool registry service URL')
    .action(
      command<{ plan: string; inputs?: string }>('validate', async (options, kernel) => {
        const inputs = await readInputs(options.inputs);
        const { plan, graph } = await (await kernel()).validate(await readJson(options.plan), inputs);
        return {
          success: true,
          result: { valid: true, nodes: plan.nodes.length, edges: plan.edges?.length ?? 0, order: graph.nodeIds },
        };
      })
    );

  program
    .command('optimize')
    .description('Show dependency waves and the optimized order within each')
    .requiredOption('-p, --plan <path>', 'Path to plan JSON')
    .option('-i, --inputs <path>', 'Path to input variables JSON')
    .option('--registry-url <url>', 'Tool registry service URL')
    .action(
      command<{ plan: string; inputs?: string }>('optimize', async (options, kernel) => {
        const inputs = await readInputs(options.inputs);
        const { optimized } = await (await kernel()).prepare(await readJson(options.plan), inputs);
        return {
          success: true,
          result: { waves: optimized.waves, order: optimized.order, estimates: optimized.estimates },
        };
      })
    );

  program
    .command('run')
    .description('Execute a plan')
    .requiredOption('-p, --plan <path>', 'Path to plan JSON')
    .option('-i, --inputs <path>', 'Path to input variables JSON')
    .option('-t, --trace-out <path>', 'Write the trace as NDJSON to this file')
    .option('--registry-url <url>', 'Tool registry service URL')
    .action(
      command<{ plan: string; inputs?: string; traceOut?: string }>('run', async (options, kernel) => {
        const instance = await kernel();
        const inputs = await readInputs(options.inputs);
        const plan = await readJson(options.plan);
        const sink = options.traceOut ? await NdjsonTraceSink.toFile(resolve(options.traceOut)) : undefined;
        const result = await instance.runPlan(plan, { inputs, ...(sink && { sink }) });
        const publicKey = instance.publicKeyPem();
        return {
          success: result.status === 'completed',
          result: publicKey ? { ...result, public_key: publicKey } : result,
        };
      })
    );

  program
    .command('verify-trace')
    .description('Check the signature chain of a stored trace')
    .requiredOption('-t, --trace <path>', 'Path to NDJSON trace')
    .requiredOption('-k, --public-key <path>', 'Path to PEM public key')
    .action(
      command<{ trace: string; publicKey: string }>('verify-trace', async (options) => {
        const events = await readTrace(options.trace);
        const publicKey = await readFile(resolve(options.publicKey), 'utf8');
        const verification = verifyTraceLog(events, publicKey);
        return { success: verification.valid, result: { events: events.length, ...verification } };
      })
    );

  program
    .command('replay')
    .description('Compare a trace against another run of the same plan')
    .requiredOption('-t, --trace <path>', 'Path to the reference NDJSON trace')
    .requiredOption('-a, --against <path>', 'Path to the NDJSON trace to check')
    .action(
      command<{ trace: string; against: string }>('replay', async (options) => {
        const expected = await readTrace(options.trace);
        const actual = await readTrace(options.against);
        const divergences = compareTraces(expected, actual);
        return {
          success: divergences.length === 0,
          result: { divergences, expected: summarizeTrace(expected), actual: summarizeTrace(actual) },
        };
      })
    );

  program
    .command('bundle')
    .description('Package a plan, its trace and the tool versions it ran against')
    .requiredOption('-p, --plan <path>', 'Path to plan JSON')
    .requiredOption('-t, --trace <path>', 'Path to NDJSON trace')
    .option('-i, --inputs <path>', 'Path to input variables JSON')
    .option('-k, --public-key <path>', 'Path to PEM public key to include')
    .option('-o, --out <path>', 'Write the bundle to this file instead of stdout')
    .option('--registry-url <url>', 'Tool registry service URL')
    .action(
      command<{ plan: string; trace: string; inputs?: string; publicKey?: string; out?: string }>('bundle', async (options, kernel) => {
        const instance = await kernel();
        const { plan } = await instance.validate(await readJson(options.plan), await readInputs(options.inputs));
        const trace = await readTrace(options.trace);
        const publicKey = options.publicKey ? await readFile(resolve(options.publicKey), 'utf8') : undefined;
        const bundle = createReplayBundle(plan, trace, await instance.snapshot(), {
          now: deps.now,
          ...(publicKey !== undefined && { publicKey }),
        });
        if (options.out) {
          await writeFile(resolve(options.out), `${JSON.stringify(bundle, null, 2)}\n`, 'utf8');
          return { success: true, result: { written: resolve(options.out), events: trace.length } };
        }
        return { success: true, result: bundle };
      })
    );

  return program;
}
