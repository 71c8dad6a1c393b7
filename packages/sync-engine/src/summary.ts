import type { RunSummary, StreamRunResult } from './orchestrator.js';

function count(results: StreamRunResult[], status: StreamRunResult['status']): number {
  return results.filter((result) => result.status === status).length;
}

export function failedStreams(summary: RunSummary): StreamRunResult[] {
  return summary.streams.filter((result) => result.status === 'failed');
}

/**
 * Human-readable run report for stderr. Failed streams get a warning section
 * with their error and the bookmark the next run resumes from.
 */
export function formatRunSummary(summary: RunSummary): string {
  const { streams } = summary;
  const lines = [
    `Sync ${summary.status} (run ${summary.runId}): ${count(streams, 'succeeded')} succeeded, ` +
      `${count(streams, 'failed')} failed, ${count(streams, 'skipped')} skipped`,
  ];

  const width = Math.max(0, ...streams.map((result) => result.stream.length));
  for (const result of streams) {
    lines.push(
      `  ${result.stream.padEnd(width)}  ${result.status.padEnd(9)}  records=${result.recordsEmitted} batches=${result.batchesCommitted}`,
    );
  }

  const failures = failedStreams(summary);
  if (failures.length > 0) {
    lines.push('', `WARNING: ${failures.length} stream(s) failed`);
    for (const failure of failures) {
      lines.push(`  ${failure.stream}: ${failure.error?.type ?? 'Error'}: ${failure.error?.message ?? 'unknown error'}`);
      lines.push(`    resumes from: ${failure.bookmark ? JSON.stringify(failure.bookmark) : 'the beginning'}`);
    }
  }

  return lines.join('\n');
}
