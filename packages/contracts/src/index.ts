/**
 * @mesh-kernel/contracts
 *
 * Wire contracts for the mesh kernel: plan IR, tool specs, evidence, memory
 * entries, trace events and run results. Zod schemas and inferred types.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Plan IR
export * from './plan/ir.js';

// Tool contracts
export * from './tools/tool-spec.js';

// Evidence
export * from './evidence/evidence.js';

// Memory
export * from './memory/memory-entry.js';

// Trace events
export * from './trace/trace-event.js';

// Run results
export * from './run/run-result.js';

// Validation utilities
export * from './validation/index.js';
