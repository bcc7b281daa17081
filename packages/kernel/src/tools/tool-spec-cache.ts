/**
 * ToolSpec Cache
 *
 * Hands each run an immutable snapshot of the registered tools. A refresh
 * builds a new snapshot and swaps it in whole; runs holding the old one are
 * unaffected. Concurrent refreshes share one fetch.
 */

import type { RegistryEntry, ToolSpec } from '@mesh-kernel/contracts';
import { errorFields, silentLogger, type Logger } from '../shared/logger.js';
import type { ToolRegistry } from './registry.js';

export interface ResolvedTool {
  spec: ToolSpec;
  /** Base URL of the tool's ABI endpoints */
  address: string;
  /** Position in the registry listing */
  registrationIndex: number;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) deepFreeze(item);
  }
  return value;
}

export class ToolSpecSnapshot {
  private readonly byName = new Map<string, ResolvedTool>();

  constructor(
    tools: ReadonlyArray<{ spec: ToolSpec; address: string }>,
    readonly fetchedAt: number
  ) {
    tools.forEach((tool, index) => {
      if (this.byName.has(tool.spec.name)) return;
      this.byName.set(
        tool.spec.name,
        Object.freeze({
          spec: deepFreeze(structuredClone(tool.spec)),
          address: tool.address,
          registrationIndex: index,
        })
      );
    });
  }

  static empty(): ToolSpecSnapshot {
    return new ToolSpecSnapshot([], 0);
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): ResolvedTool | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** All tools in registration order */
  tools(): ResolvedTool[] {
    return Array.from(this.byName.values());
  }

  /** Tools advertising a capability tag, in registration order */
  withCapability(capability: string): ResolvedTool[] {
    return this.tools().filter((tool) => tool.spec.capabilities?.includes(capability) ?? false);
  }

  names(): Set<string> {
    return new Set(this.byName.keys());
  }

  capabilities(): Set<string> {
    const tags = new Set<string>();
    for (const tool of this.byName.values()) {
      for (const tag of tool.spec.capabilities ?? []) tags.add(tag);
    }
    return tags;
  }

  /** Tool name -> declared version, for replay bundles */
  versions(): Record<string, string | null> {
    const versions: Record<string, string | null> = {};
    for (const [name, tool] of this.byName) {
      versions[name] = tool.spec.version ?? null;
    }
    return versions;
  }
}

export interface ToolSpecCacheOptions {
  logger?: Logger;
  now?: () => number;
}

export class ToolSpecCache {
  private current: ToolSpecSnapshot = ToolSpecSnapshot.empty();
  private inFlight: Promise<ToolSpecSnapshot> | undefined;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolSpecCacheOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
  }

  /** The snapshot currently served */
  snapshot(): ToolSpecSnapshot {
    return this.current;
  }

  isStale(maxAgeMs: number): boolean {
    return this.current.size === 0 || this.now() - this.current.fetchedAt > maxAgeMs;
  }

  refresh(): Promise<ToolSpecSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  /** Current snapshot, refreshed first when older than `maxAgeMs` */
  async ensureFresh(maxAgeMs: number): Promise<ToolSpecSnapshot> {
    return this.isStale(maxAgeMs) ? this.refresh() : this.current;
  }

  private async load(): Promise<ToolSpecSnapshot> {
    const entries = await this.registry.listTools();
    const settled = await Promise.allSettled(
      entries.map(async (entry: RegistryEntry) => ({
        entry,
        spec: await this.registry.fetchSpec(entry),
      }))
    );

    const tools: Array<{ spec: ToolSpec; address: string }> = [];
    settled.forEach((outcome, index) => {
      const entry = entries[index];
      if (outcome.status === 'rejected') {
        this.logger.warn(
          { tool: entry?.name, ...errorFields(outcome.reason) },
          'Tool spec unavailable; leaving tool out of snapshot'
        );
        return;
      }
      const { spec } = outcome.value;
      if (spec.name !== outcome.value.entry.name) {
        this.logger.warn(
          { tool: outcome.value.entry.name, spec_name: spec.name },
          'Tool spec name differs from registry entry; using registry name'
        );
      }
      tools.push({ spec: { ...spec, name: outcome.value.entry.name }, address: outcome.value.entry.url });
    });

    const snapshot = new ToolSpecSnapshot(tools, this.now());
    this.current = snapshot;
    this.logger.info({ tools: snapshot.size }, 'Tool spec snapshot refreshed');
    return snapshot;
  }
}
