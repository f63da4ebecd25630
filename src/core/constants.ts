// Core constants and configuration defaults

export const COMMANDS = Object.freeze([
  'report',
  'move',
  'move-out',
  'delete',
  'consolidate',
] as const);

export type SweepCommand = (typeof COMMANDS)[number];

export const DEFAULT_DESTINATIONS: Readonly<Record<SweepCommand, string>> = Object.freeze({
  report: 'reports',
  consolidate: 'consolidated',
  move: 'duplicate',
  'move-out': 'duplicate',
  delete: 'duplicate',
});

export const ARTIFACT_NAMES = {
  DUPLICATE_REPORT: 'duplicate_report.json',
  EMPTY_DIRECTORY_REPORT: 'empty-directories.json',
  CONSOLIDATED: 'consolidated.txt',
} as const;

export const CONSOLIDATE_EXTENSION = '.txt';

export const LOCATION_PREFIX = 'path=';

export const JSON_INDENT = 4;

export const CONSOLIDATED_SEPARATOR = '\n\n';

// Upper bound on `_<n>` suffixes tried before giving up on a free name
export const MAX_NAME_SUFFIX = 10000;
