// Groups walked entries by base name

import * as path from 'path';
import { Entry, NameIndex } from '../../types';
import { FilesystemWalker } from './filesystem-walker';
import { IndexOptions } from './types';

/**
 * Whether a walked entry passes the kind, name and extension filters.
 * The extension filter only applies to files and compares case-insensitively.
 */
export function matchesFilters(entry: Entry, options: IndexOptions): boolean {
  if (entry.kind !== options.kind) {
    return false;
  }
  if (options.nameFilter && entry.name !== options.nameFilter) {
    return false;
  }
  if (options.extensionFilter && entry.kind === 'file') {
    return path.extname(entry.name).toLowerCase() === options.extensionFilter.toLowerCase();
  }
  return true;
}

export class NameIndexer {
  private readonly walker: FilesystemWalker;

  constructor(walker: FilesystemWalker) {
    this.walker = walker;
  }

  /**
   * Map every matching name to its full paths, in discovery order
   */
  async buildIndex(root: string, options: IndexOptions): Promise<NameIndex> {
    const index: NameIndex = new Map();

    for await (const entry of this.walker.walk(root)) {
      if (!matchesFilters(entry, options)) {
        continue;
      }
      const paths = index.get(entry.name);
      if (paths) {
        paths.push(entry.fullPath);
      } else {
        index.set(entry.name, [entry.fullPath]);
      }
    }

    return index;
  }
}
