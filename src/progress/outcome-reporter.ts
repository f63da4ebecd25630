// Turns operation results into operator-facing lines

import { OperationSummary } from '../core/duplicate-processor';
import { PruneOutcome, RelocationOutcome } from '../services/local/types';

export type OutcomeCounts = Record<RelocationOutcome['status'], number>;

export function formatOutcome(outcome: RelocationOutcome): string {
  switch (outcome.status) {
    case 'moved':
      return `Moved: ${outcome.source} -> ${outcome.destination}`;
    case 'deleted':
      return `Deleted ${outcome.kind}: ${outcome.source}`;
    case 'skipped_missing':
      return `Source not found (already moved or deleted): ${outcome.source}`;
    case 'failed':
      return `Error ${outcome.action === 'move' ? 'moving' : 'deleting'} ${outcome.source}: ${outcome.cause}`;
  }
}

export function formatPruneOutcome(outcome: PruneOutcome): string {
  return outcome.status === 'removed'
    ? `Deleted empty directory: ${outcome.directory}`
    : `Error deleting directory ${outcome.directory}: ${outcome.cause}`;
}

export function countOutcomes(outcomes: readonly RelocationOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { moved: 0, deleted: 0, skipped_missing: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}

/**
 * Every line the CLI prints for a finished operation, in order
 */
export function formatSummary(summary: OperationSummary): string[] {
  const lines = [...summary.outcomes.map(formatOutcome), ...summary.pruned.map(formatPruneOutcome)];

  for (const unreadable of summary.consolidation?.unreadable ?? []) {
    lines.push(`Error reading ${unreadable.path}: ${unreadable.cause}`);
  }

  lines.push(summary.message);

  if (summary.outcomes.length > 0) {
    const counts = countOutcomes(summary.outcomes);
    lines.push(
      `Summary: ${counts.moved} moved, ${counts.deleted} deleted, ` +
        `${counts.skipped_missing} not found, ${counts.failed} failed`
    );
  }

  return lines;
}
