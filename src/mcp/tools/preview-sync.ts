import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { TimestampZone } from '../../types.js';
import type { ToolContext, ToolResult, ErrorResult } from '../types.js';
import { jsonResult, errorResult } from '../types.js';
import { runSync } from '../../sync/orchestrator.js';
import { describeError } from '../../errors.js';

export async function previewSyncHandler(
  ctx: ToolContext,
  params: { timeZone?: TimestampZone },
): Promise<ToolResult | ErrorResult> {
  const report = await ctx.queue.run(() => runSync(ctx.deps, {
    preview: true,
    timeZone: params.timeZone ?? ctx.config.timeZone,
  }));

  switch (report.state) {
    case 'preview':
      return jsonResult({
        count: report.batch.highlights.length,
        nextWatermark: report.nextWatermark,
        payload: report.batch,
      });
    case 'up-to-date':
      return jsonResult({
        count: 0,
        nextWatermark: report.watermark ?? null,
        payload: { highlights: [] },
      });
    case 'failed':
      return errorResult(describeError(report.error));
    case 'committed':
      // Preview runs never deliver
      return errorResult('Preview unexpectedly committed a sync');
  }
}

export function register(server: McpServer, ctx: ToolContext): void {
  server.tool(
    'preview_sync',
    'Show the Readwise payload the next sync would post, without posting it or updating the last sync time.',
    {
      timeZone: z.enum(['local', 'utc']).optional().describe('Zone used to render highlighted_at (default: server setting)'),
    },
    async (params) => previewSyncHandler(ctx, params),
  );
}
