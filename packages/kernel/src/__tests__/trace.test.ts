/**
 * Trace Tests
 *
 * Signing and chain verification, the emitter and its sinks, and replay
 * comparison between runs.
 */

import { describe, it, expect } from 'vitest';
import { generateKeyPairSync } from 'node:crypto';
import { Writable } from 'node:stream';
import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TraceEvent } from '@mesh-kernel/contracts';
import { ValidationError } from '../errors';
import { TraceSigner, verifyTraceLog } from '../trace/trace-signer';
import { NdjsonTraceSink, TraceEmitter, toNdjson, type TraceSink } from '../trace/trace-emitter';
import { compareTraces, createReplayBundle, parseTraceStream, summarizeTrace } from '../trace/replay';
import { validatePlan } from '../plan/validate';
import {
  FakeClock,
  STANDARD_TOOLS,
  createTestKernel,
  researchHandlers,
  researchPlan,
  snapshotOf,
} from './helpers';

function signedLog(signer: TraceSigner, count = 3): TraceEvent[] {
  const clock = new FakeClock();
  const emitter = new TraceEmitter({ planId: 'plan-1', signer, now: clock.now });
  for (let i = 0; i < count; i++) {
    emitter.emit({ step_id: `n${i + 1}`, event_type: 'step-start', data: { op: 'call' } });
  }
  return [...emitter.events()];
}

class MemorySink implements TraceSink {
  readonly events: TraceEvent[] = [];
  closed = 0;

  write(event: TraceEvent): void {
    this.events.push(event);
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}

describe('TraceSigner', () => {
  const signer = TraceSigner.generate();

  it('verifies an untouched chain', () => {
    const events = signedLog(signer);

    expect(events.map((event) => event.seq)).toEqual([1, 2, 3]);
    expect(verifyTraceLog(events, signer.publicKeyPem())).toEqual({ valid: true, failures: [] });
  });

  it('pins an edited record to its own seq', () => {
    const events = signedLog(signer);
    const edited = events.map((event) => (event.seq === 2 ? { ...event, data: { op: 'map' } } : event));

    expect(verifyTraceLog(edited, signer.publicKey)).toEqual({
      valid: false,
      failures: [{ seq: 2, reason: 'signature mismatch' }],
    });
  });

  it('detects a dropped record through seq and the chain', () => {
    const events = signedLog(signer).filter((event) => event.seq !== 2);

    expect(verifyTraceLog(events, signer.publicKey).failures).toEqual([
      { seq: 3, reason: 'expected seq 2' },
      { seq: 3, reason: 'signature mismatch' },
    ]);
  });

  it('rejects a log checked against another key', () => {
    const other = TraceSigner.generate();

    expect(verifyTraceLog(signedLog(signer, 2), other.publicKeyPem()).failures).toEqual([
      { seq: 1, reason: 'signature mismatch' },
      { seq: 2, reason: 'signature mismatch' },
    ]);
  });

  it('reports unsigned records', () => {
    const emitter = new TraceEmitter({ planId: 'plan-1' });
    emitter.emit({ step_id: 'a', event_type: 'step-start' });

    expect(verifyTraceLog(emitter.events(), signer.publicKey).failures).toEqual([{ seq: 1, reason: 'missing signature' }]);
  });

  it('round-trips through PEM', () => {
    const restored = TraceSigner.fromPem(signer.privateKeyPem());

    expect(restored.publicKeyPem()).toBe(signer.publicKeyPem());
    expect(verifyTraceLog(signedLog(restored), signer.publicKeyPem()).valid).toBe(true);
  });

  it('refuses keys that are not ed25519', () => {
    const { privateKey } = generateKeyPairSync('x25519');
    const pem = privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();

    expect(() => TraceSigner.fromPem(pem)).toThrow('Trace signing key must be ed25519, got x25519');
  });
});

describe('TraceEmitter', () => {
  it('assigns seq and timestamps and keeps optional fields only when given', () => {
    const clock = new FakeClock();
    const emitter = new TraceEmitter({ planId: 'plan-1', now: clock.now });

    const first = emitter.emit({ step_id: 'a', event_type: 'tool-invoke', cost_usd: 0, citations: ['doc-1'] });
    clock.advance(1500);
    const second = emitter.emit({ step_id: 'b', event_type: 'step-end', data: { status: 'completed' } });

    expect(first).toEqual({
      plan_id: 'plan-1',
      seq: 1,
      step_id: 'a',
      timestamp: '2026-01-01T00:00:00.000Z',
      event_type: 'tool-invoke',
      cost_usd: 0,
      citations: ['doc-1'],
      data: {},
    });
    expect(second.seq).toBe(2);
    expect(second.timestamp).toBe('2026-01-01T00:00:01.500Z');
    expect(second).not.toHaveProperty('signature');
  });

  it('forwards every event to its sink', () => {
    const sink = new MemorySink();
    const emitter = new TraceEmitter({ planId: 'plan-1', sink });

    emitter.emit({ step_id: 'a', event_type: 'step-start' });
    emitter.emit({ step_id: 'a', event_type: 'step-end' });

    expect(sink.events).toEqual(emitter.events());
  });

  it('writes NDJSON lines to a stream', async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    const sink = new NdjsonTraceSink(stream);
    const emitter = new TraceEmitter({ planId: 'plan-1', sink, now: new FakeClock().now });

    emitter.emit({ step_id: 'a', event_type: 'step-start' });
    await sink.close();

    expect(chunks.join('')).toBe(
      '{"plan_id":"plan-1","seq":1,"step_id":"a","timestamp":"2026-01-01T00:00:00.000Z","event_type":"step-start","data":{}}\n'
    );
  });

  it('rejects on close with the first error from its stream', async () => {
    let writes = 0;
    const stream = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        writes += 1;
        callback(new Error('disk full'));
      },
    });
    const sink = new NdjsonTraceSink(stream);
    const emitter = new TraceEmitter({ planId: 'plan-1', sink });

    emitter.emit({ step_id: 'a', event_type: 'step-start' });
    await expect(sink.close()).rejects.toThrow('disk full');

    emitter.emit({ step_id: 'a', event_type: 'step-end' });
    expect(writes).toBe(1);
    await expect(sink.close()).rejects.toThrow('disk full');
  });

  it('refuses to open a trace file in a missing directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'mesh-kernel-trace-'));

    await expect(NdjsonTraceSink.toFile(join(dir, 'missing', 'trace.ndjson'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  it('writes every event to a trace file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'mesh-kernel-trace-'));
    const path = join(dir, 'trace.ndjson');
    const sink = await NdjsonTraceSink.toFile(path);
    const emitter = new TraceEmitter({ planId: 'plan-1', sink, now: new FakeClock().now });

    emitter.emit({ step_id: 'a', event_type: 'step-start' });
    emitter.emit({ step_id: 'a', event_type: 'step-end' });
    await sink.close();

    expect(parseTraceStream(await readFile(path, 'utf8'))).toEqual(emitter.events());
  });
});

describe('replay', () => {
  it('parses what toNdjson writes', () => {
    const events = signedLog(TraceSigner.generate());

    expect(parseTraceStream(`${toNdjson(events)}\n`)).toEqual(events);
  });

  it('counts invalid records and locates each issue by line', () => {
    const events = signedLog(TraceSigner.generate(), 1);
    const stream = `not json\n${toNdjson(events)}{}\n`;

    try {
      parseTraceStream(stream);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.message).toBe('Trace stream has 2 invalid record(s)');
      expect(error.issues[0]).toMatchObject({ path: 'line 1', code: 'invalid_json' });
      expect(error.issues.slice(1).map((issue) => issue.path)).toContain('line 3: plan_id');
    }
  });

  it('finds no divergence between two runs of the same plan', async () => {
    const first = await createTestKernel({ handlers: researchHandlers(0.91) }).kernel.runPlan(researchPlan(), {
      inputs: { question: 'q' },
    });
    const second = await createTestKernel({ handlers: researchHandlers(0.91) }).kernel.runPlan(researchPlan(), {
      inputs: { question: 'q' },
    });

    expect(compareTraces(first.trace, second.trace)).toEqual([]);
    expect(summarizeTrace(first.trace)).toMatchObject({
      plan_id: 'plan-research',
      outcomes: { search: 'completed', check: 'completed', remember: 'completed' },
      status: 'completed',
    });
  });

  it('names every decision that changed', async () => {
    const good = await createTestKernel({ handlers: researchHandlers(0.91) }).kernel.runPlan(researchPlan(), {
      inputs: { question: 'q' },
    });
    const weak = await createTestKernel({ handlers: researchHandlers(0.4) }).kernel.runPlan(researchPlan(), {
      inputs: { question: 'q' },
    });

    const divergences = compareTraces(good.trace, weak.trace);

    expect(divergences.map((d) => [d.kind, d.step_id])).toEqual([
      ['event_sequence', 'remember'],
      ['outcome', 'check'],
      ['outcome', 'remember'],
      ['status', 'plan'],
    ]);
    expect(divergences[3]).toMatchObject({
      expected: { status: 'completed', halt_reason: null },
      actual: { status: 'failed', halt_reason: null },
    });
  });

  it('reports steps missing from the replayed trace', async () => {
    const { trace } = await createTestKernel({ handlers: researchHandlers(0.91) }).kernel.runPlan(researchPlan(), {
      inputs: { question: 'q' },
    });

    const divergences = compareTraces(
      trace,
      trace.filter((event) => event.step_id !== 'remember')
    );

    expect(divergences).toContainEqual(
      expect.objectContaining({ kind: 'missing_step', step_id: 'remember', actual: null })
    );
    expect(divergences).toContainEqual({ kind: 'outcome', step_id: 'remember', expected: 'completed', actual: null });
  });

  it('bundles the plan, its trace and the tool versions', () => {
    const { plan } = validatePlan(researchPlan(), { inputs: ['question'] });
    const events = signedLog(TraceSigner.generate(), 1);

    const bundle = createReplayBundle(plan, events, snapshotOf(STANDARD_TOOLS), {
      publicKey: 'test-public-key',
      now: new FakeClock().now,
    });

    expect(bundle).toEqual({
      format: 'mesh-replay-bundle',
      version: 1,
      plan,
      trace: events,
      tool_versions: { 'doc.search.local': '1.0.0', 'ground.verify': '1.0.0', 'mesh.mem.sqlite': '1.0.0' },
      public_key: 'test-public-key',
      created_at: '2026-01-01T00:00:00.000Z',
    });
  });
});

describe('signed runs', () => {
  it('produces a trace that verifies against the kernel key', async () => {
    const signer = TraceSigner.generate();
    const sink = new MemorySink();
    const { kernel } = createTestKernel({ handlers: researchHandlers(0.91), signer });

    const result = await kernel.runPlan(researchPlan(), { inputs: { question: 'q' }, sink });

    expect(kernel.publicKeyPem()).toBe(signer.publicKeyPem());
    expect(verifyTraceLog(result.trace, signer.publicKeyPem())).toEqual({ valid: true, failures: [] });
    expect(sink.events).toEqual(result.trace);
    expect(sink.closed).toBe(1);
  });
});
