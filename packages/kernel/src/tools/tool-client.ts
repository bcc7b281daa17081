/**
 * Tool invocation over the HTTP tool ABI:
 * POST {address}/invoke/{name} with `{ args }` -> `{ result, error?, usage?, citations? }`
 */

import { ToolInvokeResponseSchema, safeValidate, type ToolInvokeResponse } from '@mesh-kernel/contracts';
import { ToolInvocationError } from '../errors.js';
import { joinUrl, requestJson } from './http.js';
import type { ResolvedTool } from './tool-spec-cache.js';

export interface InvokeOptions {
  timeoutMs: number;
}

export interface ToolClient {
  invoke(tool: ResolvedTool, args: Record<string, unknown>, options: InvokeOptions): Promise<ToolInvokeResponse>;
}

export class HttpToolClient implements ToolClient {
  async invoke(
    tool: ResolvedTool,
    args: Record<string, unknown>,
    options: InvokeOptions
  ): Promise<ToolInvokeResponse> {
    const name = tool.spec.name;
    const body = await requestJson(joinUrl(tool.address, 'invoke', name), {
      method: 'POST',
      body: { args },
      timeoutMs: options.timeoutMs,
      target: name,
    });

    const response = safeValidate(ToolInvokeResponseSchema, body);
    if (!response) {
      throw new ToolInvocationError(`Tool ${name} returned a malformed response`, name, false);
    }
    if (response.error !== undefined) {
      throw new ToolInvocationError(`Tool ${name} reported an error: ${response.error}`, name, false);
    }
    return response;
  }
}
