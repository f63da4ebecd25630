// Core interfaces and types for the duplicate sweeper

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export interface Logger {
  error(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  debug(message: string, meta?: unknown): void;
}

export type ItemKind = 'file' | 'folder';

/**
 * One filesystem object discovered during a walk
 */
export interface Entry {
  name: string;
  fullPath: string;
  kind: ItemKind;
  /** Distance from the walk root; direct children of the root have depth 1 */
  depth: number;
}

/**
 * Base name -> full paths, in the order the walk discovered them
 */
export type NameIndex = Map<string, string[]>;

/**
 * Names with two or more paths. The first path of each group is the original.
 */
export type DuplicateGroups = Map<string, string[]>;

export interface DuplicateReport {
  total_duplicates: number;
  duplicates: Record<string, string[]>;
}

export interface EmptyDirectoryRecord {
  name: string;
  location: string;
}

export interface EmptyDirectoryReport {
  total_empty_directories: number;
  empty_directories: EmptyDirectoryRecord[];
}

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}
