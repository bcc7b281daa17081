/**
 * CLI commands end to end against an in-process kernel and temp files.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { RunResultSchema } from '@mesh-kernel/contracts';
import { createProgram } from '../cli/program';
import type { Kernel } from '../kernel';
import { TraceSigner } from '../trace/trace-signer';
import { createTestKernel, researchHandlers, researchPlan } from './helpers';

const CLIOutputSchema = z.object({
  success: z.boolean(),
  command: z.string(),
  result: z.unknown(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      issues: z.array(z.object({ code: z.string() }).passthrough()).optional(),
    })
    .optional(),
  timestamp: z.string(),
});
type ParsedOutput = z.infer<typeof CLIOutputSchema>;

const NOW = Date.parse('2026-03-01T12:00:00.000Z');

interface Harness {
  run: (...args: string[]) => Promise<ParsedOutput>;
  exitCodes: number[];
}

function harness(kernel: Kernel): Harness {
  const exitCodes: number[] = [];
  return {
    exitCodes,
    run: async (...args) => {
      const outputs: string[] = [];
      await createProgram({
        write: (text) => outputs.push(text),
        setExitCode: (code) => exitCodes.push(code),
        env: { LOG_LEVEL: 'silent' },
        createKernel: async () => kernel,
        now: () => NOW,
      }).parseAsync(args, { from: 'user' });
      expect(outputs).toHaveLength(1);
      return CLIOutputSchema.parse(JSON.parse(outputs[0] ?? ''));
    },
  };
}

let dir: string;
let planPath: string;
let inputsPath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'mesh-kernel-cli-'));
  planPath = join(dir, 'plan.json');
  inputsPath = join(dir, 'inputs.json');
  await writeFile(planPath, JSON.stringify(researchPlan()), 'utf8');
  await writeFile(inputsPath, JSON.stringify({ question: 'What is the capital of Portugal?' }), 'utf8');
});

describe('validate', () => {
  it('reports the plan shape and execution order', async () => {
    const cli = harness(createTestKernel({ handlers: {} }).kernel);

    const output = await cli.run('validate', '-p', planPath, '-i', inputsPath);

    expect(output).toEqual({
      success: true,
      command: 'validate',
      result: { valid: true, nodes: 3, edges: 2, order: ['search', 'check', 'remember'] },
      timestamp: '2026-03-01T12:00:00.000Z',
    });
    expect(cli.exitCodes).toEqual([0]);
  });

  it('lists the issues of a plan that references missing inputs', async () => {
    const cli = harness(createTestKernel({ handlers: {} }).kernel);

    const output = await cli.run('validate', '-p', planPath);

    expect(output.success).toBe(false);
    expect(output.error?.code).toBe('VALIDATION');
    expect(output.error?.message).toBe(
      'Plan failed validation: Node search references "question", which no input or node provides'
    );
    expect(output.error?.issues?.map((issue) => issue.code)).toEqual(['unknown_variable', 'unknown_variable']);
    expect(cli.exitCodes).toEqual([1]);
  });

  it('refuses a plan file that is not JSON', async () => {
    await writeFile(planPath, '{ nope', 'utf8');
    const cli = harness(createTestKernel({ handlers: {} }).kernel);

    const output = await cli.run('validate', '-p', planPath);

    expect(output.error?.code).toBe('VALIDATION');
    expect(output.error?.message.startsWith(`${planPath} is not valid JSON: `)).toBe(true);
  });

  it('refuses inputs that are not an object', async () => {
    await writeFile(inputsPath, '[1, 2]', 'utf8');
    const cli = harness(createTestKernel({ handlers: {} }).kernel);

    const output = await cli.run('validate', '-p', planPath, '-i', inputsPath);

    expect(output.error?.message).toBe(`${inputsPath} must contain a JSON object of input variables`);
  });
});

describe('optimize', () => {
  it('prints waves and the chosen order', async () => {
    const cli = harness(createTestKernel({ handlers: {} }).kernel);

    const output = await cli.run('optimize', '-p', planPath, '-i', inputsPath);

    expect(output.success).toBe(true);
    expect(output.result).toMatchObject({ order: ['search', 'check', 'remember'] });
  });
});

describe('run, verify-trace, replay and bundle', () => {
  it('runs a plan, writes a verifiable trace and bundles it', async () => {
    const signer = TraceSigner.generate();
    const { kernel } = createTestKernel({ handlers: researchHandlers(0.91), signer });
    const cli = harness(kernel);
    const tracePath = join(dir, 'trace.ndjson');
    const keyPath = join(dir, 'trace.pub');
    await writeFile(keyPath, signer.publicKeyPem(), 'utf8');

    const ran = await cli.run('run', '-p', planPath, '-i', inputsPath, '-t', tracePath);
    const result = RunResultSchema.parse(ran.result);

    expect(ran.success).toBe(true);
    expect(result.status).toBe('completed');
    expect(ran.result).toMatchObject({ public_key: signer.publicKeyPem() });

    const verified = await cli.run('verify-trace', '-t', tracePath, '-k', keyPath);
    expect(verified).toMatchObject({
      success: true,
      result: { events: result.trace.length, valid: true, failures: [] },
    });

    const replayed = await cli.run('replay', '-t', tracePath, '-a', tracePath);
    expect(replayed.success).toBe(true);
    expect(replayed.result).toMatchObject({ divergences: [] });

    const bundlePath = join(dir, 'bundle.json');
    const bundled = await cli.run('bundle', '-p', planPath, '-i', inputsPath, '-t', tracePath, '-k', keyPath, '-o', bundlePath);
    expect(bundled.result).toEqual({ written: resolve(bundlePath), events: result.trace.length });

    const bundle: unknown = JSON.parse(await readFile(bundlePath, 'utf8'));
    expect(bundle).toMatchObject({
      format: 'mesh-replay-bundle',
      version: 1,
      tool_versions: { 'doc.search.local': '1.0.0', 'ground.verify': '1.0.0', 'mesh.mem.sqlite': '1.0.0' },
      public_key: signer.publicKeyPem(),
      created_at: '2026-03-01T12:00:00.000Z',
    });

    expect(cli.exitCodes).toEqual([0, 0, 0, 0]);
  });

  it('exits non-zero when the run does not complete', async () => {
    const cli = harness(createTestKernel({ handlers: researchHandlers(0.4) }).kernel);

    const output = await cli.run('run', '-p', planPath, '-i', inputsPath);

    expect(output.success).toBe(false);
    expect(RunResultSchema.parse(output.result).status).toBe('failed');
    expect(cli.exitCodes).toEqual([1]);
  });

  it('fails before running when the trace file cannot be opened', async () => {
    const { kernel, client } = createTestKernel({ handlers: researchHandlers(0.91) });
    const cli = harness(kernel);
    const tracePath = join(dir, 'missing', 'trace.ndjson');

    const output = await cli.run('run', '-p', planPath, '-i', inputsPath, '-t', tracePath);

    expect(output.success).toBe(false);
    expect(output.error).toEqual({
      code: 'CLI_ERROR',
      message: `ENOENT: no such file or directory, open '${tracePath}'`,
    });
    expect(client.calls).toHaveLength(0);
    expect(cli.exitCodes).toEqual([1]);
  });

  it('reports divergence between two different runs', async () => {
    const goodTrace = join(dir, 'good.ndjson');
    const weakTrace = join(dir, 'weak.ndjson');
    await harness(createTestKernel({ handlers: researchHandlers(0.91) }).kernel).run(
      'run', '-p', planPath, '-i', inputsPath, '-t', goodTrace
    );
    await harness(createTestKernel({ handlers: researchHandlers(0.4) }).kernel).run(
      'run', '-p', planPath, '-i', inputsPath, '-t', weakTrace
    );
    const cli = harness(createTestKernel({ handlers: {} }).kernel);

    const output = await cli.run('replay', '-t', goodTrace, '-a', weakTrace);

    expect(output.success).toBe(false);
    expect(output.result).toMatchObject({
      divergences: [
        { kind: 'event_sequence', step_id: 'remember' },
        { kind: 'outcome', step_id: 'check' },
        { kind: 'outcome', step_id: 'remember' },
        { kind: 'status', step_id: 'plan' },
      ],
    });
    expect(cli.exitCodes).toEqual([1]);
  });

  it('fails verification against the wrong key', async () => {
    const { kernel } = createTestKernel({ handlers: researchHandlers(0.91), signer: TraceSigner.generate() });
    const tracePath = join(dir, 'trace.ndjson');
    const keyPath = join(dir, 'other.pub');
    await writeFile(keyPath, TraceSigner.generate().publicKeyPem(), 'utf8');
    const cli = harness(kernel);
    await cli.run('run', '-p', planPath, '-i', inputsPath, '-t', tracePath);

    const output = await cli.run('verify-trace', '-t', tracePath, '-k', keyPath);

    expect(output.success).toBe(false);
    expect(output.result).toMatchObject({
      valid: false,
      failures: expect.arrayContaining([{ seq: 1, reason: 'signature mismatch' }]),
    });
  });
});
