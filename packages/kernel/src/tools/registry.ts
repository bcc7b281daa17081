/**
 * Tool registries: where tools live and how their specs are fetched.
 */

import { readFile } from 'node:fs/promises';
import {
  RegistryListingSchema,
  ToolSpecSchema,
  validateSchema,
  type RegistryEntry,
  type ToolSpec,
} from '@mesh-kernel/contracts';
import { ValidationError } from '../errors.js';
import { joinUrl, requestJson } from './http.js';

export interface ToolRegistry {
  /** Entries in registration order */
  listTools(): Promise<RegistryEntry[]>;
  fetchSpec(entry: RegistryEntry): Promise<ToolSpec>;
}

export interface RegistryHttpOptions {
  timeoutMs?: number;
}

const DEFAULT_REGISTRY_TIMEOUT_MS = 10_000;

/**
 * GET {address}/spec/{name}
 */
export async function fetchToolSpec(entry: RegistryEntry, timeoutMs: number): Promise<ToolSpec> {
  const body = await requestJson(joinUrl(entry.url, 'spec', entry.name), {
    method: 'GET',
    timeoutMs,
    target: entry.name,
  });
  const result = validateSchema(ToolSpecSchema, body);
  if (!result.success) {
    throw new ValidationError(`Tool ${entry.name} returned an invalid spec`, result.errors);
  }
  return result.data;
}

function parseListing(body: unknown, source: string): RegistryEntry[] {
  const result = validateSchema(RegistryListingSchema, body);
  if (!result.success) {
    throw new ValidationError(`Invalid tool listing from ${source}`, result.errors);
  }
  return result.data;
}

/**
 * Registry service: GET {registry}/tools returns `[{ name, url }]`.
 */
export class HttpToolRegistry implements ToolRegistry {
  private readonly timeoutMs: number;

  constructor(
    private readonly registryUrl: string,
    options: RegistryHttpOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS;
  }

  async listTools(): Promise<RegistryEntry[]> {
    const body = await requestJson(joinUrl(this.registryUrl, 'tools'), {
      method: 'GET',
      timeoutMs: this.timeoutMs,
      target: 'registry',
    });
    return parseListing(body, this.registryUrl);
  }

  fetchSpec(entry: RegistryEntry): Promise<ToolSpec> {
    return fetchToolSpec(entry, this.timeoutMs);
  }
}

/**
 * Fixed list of tool addresses, typically loaded from config/tools.json.
 */
export class StaticToolRegistry implements ToolRegistry {
  private readonly timeoutMs: number;

  constructor(
    private readonly entries: readonly RegistryEntry[],
    options: RegistryHttpOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS;
  }

  static async fromFile(path: string, options: RegistryHttpOptions = {}): Promise<StaticToolRegistry> {
    const contents = await readFile(path, 'utf8');
    let body: unknown;
    try {
      body = JSON.parse(contents);
    } catch (error) {
      throw new ValidationError(
        `Tool config ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return new StaticToolRegistry(parseListing(body, path), options);
  }

  async listTools(): Promise<RegistryEntry[]> {
    return [...this.entries];
  }

  fetchSpec(entry: RegistryEntry): Promise<ToolSpec> {
    return fetchToolSpec(entry, this.timeoutMs);
  }
}
