import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobSnapshot, JobStatus } from '../../core/entities/SearchJob.js';
import { errorMessage } from '../../core/errors.js';
import type { SearchEngine } from '../../application/services/SearchEngine.js';
import type { PoolStats } from '../../infrastructure/queue/SearchQueue.js';

const STATUS_EMOJI: Record<JobStatus, string> = {
  pending: '⏳',
  collecting_info: '🔍',
  collected_info: '📋',
  searching_papers: '🔄',
  completed: '✅',
  error: '❌',
};

export function formatSnapshot(snapshot: JobSnapshot): string {
  const counts =
    snapshot.totalCount === null
      ? 'Not discovered yet'
      : `${snapshot.fetchedCount ?? 0}/${snapshot.totalCount} visited, ${snapshot.items.length} extracted, ${snapshot.skippedCount} skipped`;

  const lines = [
    `# ${STATUS_EMOJI[snapshot.status]} Search ${snapshot.id}`,
    '',
    '## Status',
    `- **Status**: ${snapshot.status}`,
    `- **Progress**: ${snapshot.progress}%`,
    `- **Subject**: ${snapshot.subjectName || 'Unknown'}`,
    `- **Source**: ${snapshot.sourceUrl}`,
    `- **Items**: ${counts}`,
    `- **Worker**: ${snapshot.workerId ?? 'Not assigned'}`,
    '',
    '## Time Information',
    `- **Started**: ${snapshot.startTime.toISOString()}`,
    `- **Completed**: ${snapshot.completedTime?.toISOString() ?? 'In progress'}`,
  ];

  if (snapshot.errorMessage) {
    lines.push('', '## ❌ Error', '```', snapshot.errorMessage, '```');
  }

  if (snapshot.items.length > 0) {
    lines.push('', '## Papers');
    for (const item of snapshot.items) {
      const venue = item.venue ? ` · ${item.venue}` : '';
      lines.push(`- ${item.title} (${item.year || 'n.d.'})${venue} · ${item.citationCount} citations`);
    }
  }

  return lines.join('\n');
}

export function formatRecent(snapshots: readonly JobSnapshot[]): string {
  if (snapshots.length === 0) {
    return '# Recent Searches\n\nNo finished searches yet';
  }

  const rows = snapshots.map(
    (s) =>
      `| ${s.id} | ${s.subjectName || '-'} | ${s.status} | ${s.items.length} | ${s.completedTime?.toISOString() ?? '-'} |`
  );
  return ['# Recent Searches', '', '| Job | Subject | Status | Papers | Completed |', '|---|---|---|---|---|', ...rows].join(
    '\n'
  );
}

export function formatPoolStats(stats: PoolStats): string {
  return `# Worker Pool

## Statistics
- Running: ${stats.runningCount} (${stats.pendingCount} waiting for a worker)
- Max Workers: ${stats.maxWorkers}
- History: ${stats.completedCount}/${stats.capacity}

## Running Jobs
${stats.runningIds.length === 0 ? 'None' : stats.runningIds.map((id) => `- ${id}`).join('\n')}

## Finished Jobs (oldest first)
${stats.completedIds.length === 0 ? 'None' : stats.completedIds.map((id) => `- ${id}`).join('\n')}`;
}

function text(body: string) {
  return { content: [{ type: 'text' as const, text: body }] };
}

function failure(prefix: string, error: unknown) {
  return { isError: true, content: [{ type: 'text' as const, text: `${prefix}: ${errorMessage(error)}` }] };
}

const identity = {
  client_id: z.string().min(1).describe('Client id that owns the search'),
  search_id: z.string().min(1).describe('Search id chosen by the client'),
};

/**
 * Register all search tools
 */
export function registerSearchTools(server: McpServer, engine: SearchEngine) {
  server.tool(
    'submit-search',
    'Queue a profile page for harvesting. Returns the job id; progress is pushed to the client over WebSocket.',
    {
      url: z.string().url().describe('Profile page URL'),
      ...identity,
    },
    async ({ url, client_id, search_id }) => {
      try {
        const jobId = engine.submit(url, client_id, search_id);
        return text(`Search queued.\n\n- **Job ID**: ${jobId}\n\nUse \`get-search-status\` to follow it.`);
      } catch (error) {
        return failure('Error submitting search', error);
      }
    }
  );

  server.tool('get-search-status', 'Get the current snapshot of a search', identity, async ({ client_id, search_id }) => {
    try {
      const snapshot = engine.getStatus(client_id, search_id);
      if (!snapshot) {
        return { isError: true, ...text(`Search not found: ${client_id}_${search_id}`) };
      }
      return text(formatSnapshot(snapshot));
    } catch (error) {
      return failure('Error getting search status', error);
    }
  });

  server.tool(
    'cancel-search',
    'Cancel a search that has not been picked up by a worker yet',
    identity,
    async ({ client_id, search_id }) => {
      try {
        const cancelled = engine.cancel(client_id, search_id);
        return text(
          cancelled
            ? `Search ${client_id}_${search_id} cancelled`
            : `Search ${client_id}_${search_id} could not be cancelled: it is not queued`
        );
      } catch (error) {
        return failure('Error cancelling search', error);
      }
    }
  );

  server.tool(
    'list-recent-searches',
    'List finished searches, most recent first',
    {
      limit: z.number().int().min(0).max(1000).optional().describe('How many to show; 0 shows all'),
    },
    async ({ limit }) => {
      try {
        return text(formatRecent(engine.recentCompleted(limit ?? 0)));
      } catch (error) {
        return failure('Error listing searches', error);
      }
    }
  );

  server.tool('pool-stats', 'Show worker pool and history statistics', {}, async () => {
    try {
      return text(formatPoolStats(engine.poolStats()));
    } catch (error) {
      return failure('Error getting pool stats', error);
    }
  });
}
