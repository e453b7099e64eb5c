import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext, ToolResult, ErrorResult } from '../types.js';
import { jsonResult, errorResult } from '../types.js';
import { getSyncStatus } from '../../sync/orchestrator.js';
import { toIsoTimestamp } from '../../shared/transform.js';
import { SourceUnavailableError, describeError } from '../../errors.js';

export async function getSyncStatusHandler(ctx: ToolContext): Promise<ToolResult | ErrorResult> {
  try {
    const status = await ctx.queue.run(() => getSyncStatus(ctx.deps));
    return jsonResult({
      watermark: status.watermark ?? null,
      lastSyncedAt: status.watermark !== undefined ? toIsoTimestamp(status.watermark, ctx.config.timeZone) : null,
      pending: status.pending,
    });
  } catch (err) {
    if (err instanceof SourceUnavailableError) {
      return errorResult(describeError(err));
    }
    throw err;
  }
}

export function register(server: McpServer, ctx: ToolContext): void {
  server.tool(
    'get_sync_status',
    'Show when highlights were last synced to Readwise and how many GoodLinks highlights are waiting to be synced.',
    {},
    async () => getSyncStatusHandler(ctx),
  );
}
