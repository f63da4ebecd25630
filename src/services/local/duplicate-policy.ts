// Decides which indexed paths are originals and which are duplicates

import { DuplicateGroups, DuplicateReport, NameIndex } from '../../types';

/**
 * Keep only names found at two or more paths. The first path of each group (the first
 * one the walk discovered) is the original; the rest are duplicates.
 */
export function deriveDuplicates(index: NameIndex): DuplicateGroups {
  const groups: DuplicateGroups = new Map();
  for (const [name, paths] of index) {
    if (paths.length > 1) {
      groups.set(name, [...paths]);
    }
  }
  return groups;
}

/**
 * Every path except the original of each group, group by group
 */
export function selectDuplicatePaths(groups: DuplicateGroups): string[] {
  return [...groups.values()].flatMap((paths) => paths.slice(1));
}

/**
 * Every indexed path, for operations that act on all items of a type
 */
export function selectAllPaths(index: NameIndex): string[] {
  return [...index.values()].flat();
}

export function toDuplicateReport(groups: DuplicateGroups): DuplicateReport {
  return {
    total_duplicates: groups.size,
    duplicates: Object.fromEntries(groups),
  };
}
