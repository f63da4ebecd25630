// Local filesystem operation types and interfaces

import { ItemKind } from '../../types';
import { ErrorCategory } from '../../core/error-handler';

export interface IndexOptions {
  kind: ItemKind;
  nameFilter?: string;
  extensionFilter?: string;
}

export type RelocationMode = 'move' | 'delete';

export type RelocationRequest =
  | { mode: 'move'; destination: string }
  | { mode: 'delete' };

export interface MovedOutcome {
  status: 'moved';
  source: string;
  destination: string;
}

export interface DeletedOutcome {
  status: 'deleted';
  source: string;
  kind: ItemKind;
}

export interface SkippedMissingOutcome {
  status: 'skipped_missing';
  source: string;
}

export interface FailedOutcome {
  status: 'failed';
  source: string;
  action: RelocationMode;
  cause: string;
  category: ErrorCategory;
}

/**
 * Per-item result of a move or delete batch
 */
export type RelocationOutcome = MovedOutcome | DeletedOutcome | SkippedMissingOutcome | FailedOutcome;

export type PruneOutcome =
  | { status: 'removed'; directory: string }
  | { status: 'failed'; directory: string; cause: string };

export interface ArtifactWriteResult {
  success: boolean;
  filePath?: string;
  error?: string;
}

export interface ConsolidationResult {
  /** Distinct non-empty contents, in first-seen order */
  contents: string[];
  filesRead: number;
  unreadable: Array<{ path: string; cause: string }>;
  artifact?: ArtifactWriteResult;
}
