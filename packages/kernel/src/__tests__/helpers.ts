/**
 * In-process stand-ins for the tool mesh: a registry, a tool client and a
 * clock the tests control.
 */

import type {
  Evidence,
  RegistryEntry,
  RunResult,
  ToolInvokeResponse,
  ToolSpec,
  TraceEvent,
  TraceEventType,
} from '@mesh-kernel/contracts';
import { createConfig, type KernelConfigInput } from '../config/index';
import { ToolInvocationError } from '../errors';
import { Kernel } from '../kernel';
import type { ToolRegistry } from '../tools/registry';
import type { InvokeOptions, ToolClient } from '../tools/tool-client';
import { ToolSpecSnapshot, type ResolvedTool } from '../tools/tool-spec-cache';
import type { TraceSigner } from '../trace/trace-signer';

export class FakeClock {
  private time: number;

  constructor(start = Date.parse('2026-01-01T00:00:00.000Z')) {
    this.time = start;
  }

  readonly now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}

export type ToolHandler = (
  args: Record<string, unknown>,
  call: number
) => ToolInvokeResponse | Promise<ToolInvokeResponse>;

export interface FakeToolClientOptions {
  clock?: FakeClock;
  /** Simulated latency per tool, applied to the clock on every call */
  latencyMs?: Record<string, number>;
}

export class FakeToolClient implements ToolClient {
  readonly calls: Array<{ tool: string; args: Record<string, unknown>; timeoutMs: number }> = [];
  private readonly counts = new Map<string, number>();

  constructor(
    private readonly handlers: Record<string, ToolHandler>,
    private readonly options: FakeToolClientOptions = {}
  ) {}

  async invoke(tool: ResolvedTool, args: Record<string, unknown>, options: InvokeOptions): Promise<ToolInvokeResponse> {
    const name = tool.spec.name;
    this.calls.push({ tool: name, args, timeoutMs: options.timeoutMs });
    const call = (this.counts.get(name) ?? 0) + 1;
    this.counts.set(name, call);

    const latency = this.options.latencyMs?.[name];
    if (latency !== undefined) this.options.clock?.advance(latency);

    const handler = this.handlers[name];
    if (!handler) {
      throw new ToolInvocationError(`No handler for ${name}`, name, false);
    }
    return handler(args, call);
  }

  callsTo(name: string): Array<Record<string, unknown>> {
    return this.calls.filter((call) => call.tool === name).map((call) => call.args);
  }
}

export class FakeRegistry implements ToolRegistry {
  constructor(private readonly specs: readonly ToolSpec[]) {}

  async listTools(): Promise<RegistryEntry[]> {
    return this.specs.map((spec) => ({ name: spec.name, url: `http://${spec.name}.tools.test` }));
  }

  async fetchSpec(entry: RegistryEntry): Promise<ToolSpec> {
    const spec = this.specs.find((candidate) => candidate.name === entry.name);
    if (!spec) throw new Error(`No spec for ${entry.name}`);
    return spec;
  }
}

// ============================================================================
// Fixtures
// ============================================================================

export function toolSpec(name: string, overrides: Partial<ToolSpec> = {}): ToolSpec {
  return {
    name,
    version: '1.0.0',
    io: { input: { type: 'object' }, output: { type: 'object' } },
    ...overrides,
  };
}

export const DOC_SEARCH = toolSpec('doc.search.local', {
  capabilities: ['search'],
  constraints: { cost_per_call_usd: 0.001, latency_p50_ms: 120 },
});

export const GROUND_VERIFY = toolSpec('ground.verify', {
  capabilities: ['verify'],
  constraints: { cost_per_call_usd: 0.002, latency_p50_ms: 300 },
});

export const MEMORY_STORE = toolSpec('mesh.mem.sqlite', {
  capabilities: ['memory'],
  constraints: { cost_per_call_usd: 0, latency_p50_ms: 5 },
});

export const STANDARD_TOOLS = [DOC_SEARCH, GROUND_VERIFY, MEMORY_STORE];

export function snapshotOf(specs: readonly ToolSpec[]): ToolSpecSnapshot {
  return new ToolSpecSnapshot(
    specs.map((spec) => ({ spec, address: `http://${spec.name}.tools.test` })),
    0
  );
}

/**
 * Evidence for one claim per confidence, each supported by one source.
 */
export function evidenceWith(confidences: readonly number[]): Evidence {
  const ids = confidences.map((_, index) => `c${index + 1}`);
  return {
    claims: ids,
    supports: confidences.map((confidence, index) => ({
      claim_id: ids[index] ?? '',
      source: `doc-${index + 1}`,
      confidence,
    })),
    contradicts: [],
    verdicts: confidences.map((confidence, index) => ({
      claim_id: ids[index] ?? '',
      verdict: 'supported' as const,
      confidence,
      needs_citation: false,
    })),
  };
}

/**
 * The search -> verify -> remember plan most scenarios run.
 */
export function researchPlan(overrides: { cost_cap_usd?: number; min_confidence?: number } = {}): unknown {
  return {
    id: 'plan-research',
    signals: { cost_cap_usd: overrides.cost_cap_usd ?? 1, latency_budget_ms: 60_000 },
    nodes: [
      {
        id: 'search',
        op: 'call',
        tool: 'doc.search.local',
        args: { query: '$question', top_k: 3 },
        out: { hits: 'hits' },
      },
      {
        id: 'check',
        op: 'verify',
        tool: 'ground.verify',
        args: { claims: ['$question'], sources: '$hits' },
      },
      {
        id: 'remember',
        op: 'memory-write',
        tool: 'mesh.mem.sqlite',
        args: {
          key: 'answer:q1',
          value: '$hits',
          provenance: ['doc.search.local'],
          confidence: '$check.summary.mean_confidence',
        },
      },
    ],
    edges: [
      { from: 'search', to: 'check' },
      { from: 'check', to: 'remember' },
    ],
    stop_conditions: { min_confidence: overrides.min_confidence ?? 0.8 },
  };
}

export function researchHandlers(verifyConfidence: number): Record<string, ToolHandler> {
  return {
    'doc.search.local': () => ({
      result: { hits: [{ id: 'doc-1', text: 'Lisbon is the capital of Portugal.' }] },
      citations: ['doc-1'],
    }),
    'ground.verify': () => ({ result: evidenceWith([verifyConfidence]) }),
    'mesh.mem.sqlite': (args) => ({ result: { success: true, entry: { ...args, timestamp: 'test' } } }),
  };
}

export interface TestKernel {
  kernel: Kernel;
  client: FakeToolClient;
  clock: FakeClock;
}

export function createTestKernel(options: {
  handlers: Record<string, ToolHandler>;
  specs?: readonly ToolSpec[];
  config?: KernelConfigInput;
  latencyMs?: Record<string, number>;
  signer?: TraceSigner;
  sleeps?: number[];
}): TestKernel {
  const clock = new FakeClock();
  const client = new FakeToolClient(options.handlers, {
    clock,
    ...(options.latencyMs && { latencyMs: options.latencyMs }),
  });
  const kernel = new Kernel({
    config: createConfig({ retry: { backoffMs: 10 }, ...options.config }),
    registry: new FakeRegistry(options.specs ?? STANDARD_TOOLS),
    client,
    now: clock.now,
    sleep: (ms) => {
      options.sleeps?.push(ms);
      return Promise.resolve();
    },
    ...(options.signer && { signer: options.signer }),
  });
  return { kernel, client, clock };
}

// ============================================================================
// Trace queries
// ============================================================================

export function eventsOf(result: RunResult, type: TraceEventType, kind?: string): TraceEvent[] {
  return result.trace.filter(
    (event) => event.event_type === type && (kind === undefined || event.data['kind'] === kind)
  );
}

export function indexOfEvent(result: RunResult, predicate: (event: TraceEvent) => boolean): number {
  return result.trace.findIndex(predicate);
}
