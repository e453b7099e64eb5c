import type { SyncConfig } from '../config.js';
import type { SyncDependencies } from '../sync/orchestrator.js';
import type { RunQueue } from '../sync/run-queue.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

export interface ErrorResult extends ToolResult {
  isError: boolean;
}

/** What every tool handler needs: bindings plus the resolved config */
export interface ToolContext {
  deps: SyncDependencies;
  config: Pick<SyncConfig, 'token' | 'timeZone'>;
  /** Shared by every tool so runs never overlap */
  queue: RunQueue;
}

export function jsonResult(value: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(message: string): ErrorResult {
  return {
    isError: true,
    content: [{ type: 'text', text: message }],
  };
}
