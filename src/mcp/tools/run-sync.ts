import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext, ToolResult, ErrorResult } from '../types.js';
import { jsonResult, errorResult } from '../types.js';
import { runSync } from '../../sync/orchestrator.js';
import { toIsoTimestamp } from '../../shared/transform.js';
import { DeliveryError, describeError } from '../../errors.js';

export async function runSyncHandler(ctx: ToolContext): Promise<ToolResult | ErrorResult> {
  const report = await ctx.queue.run(() => runSync(ctx.deps, {
    token: ctx.config.token,
    timeZone: ctx.config.timeZone,
  }));

  switch (report.state) {
    case 'committed':
      return jsonResult({
        state: report.state,
        count: report.count,
        watermark: report.watermark,
        lastSyncedAt: toIsoTimestamp(report.watermark, ctx.config.timeZone),
      });
    case 'up-to-date':
      return jsonResult({ state: report.state, count: 0, watermark: report.watermark ?? null });
    case 'failed': {
      const body = report.error instanceof DeliveryError && report.error.responseBody
        ? `\nResponse: ${report.error.responseBody}`
        : '';
      return errorResult(`${describeError(report.error)}${body}`);
    }
    case 'preview':
      return errorResult('Sync ran in preview mode');
  }
}

export function register(server: McpServer, ctx: ToolContext): void {
  server.tool(
    'run_sync',
    'Post all GoodLinks highlights created since the last sync to Readwise in one request, then record the new last sync time. Requires READWISE_API_TOKEN.',
    {},
    async () => runSyncHandler(ctx),
  );
}
