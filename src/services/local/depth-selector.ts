// Selects what move-out lifts into the reference directory

import * as path from 'path';
import { FilesystemWalker } from './filesystem-walker';
import { PathUtils } from './path-utils';

export interface DeepestDirectory {
  directory: string;
  depth: number;
}

export class DepthSelector {
  private readonly walker: FilesystemWalker;

  constructor(walker: FilesystemWalker) {
    this.walker = walker;
  }

  /**
   * The directory that directly holds at least one file and lies deepest relative to
   * `referenceRoot`. Depth counts separators in the relative path; on a tie the one the
   * walk reaches first wins. The reference root itself never qualifies.
   */
  async findDeepestFileDirectory(
    root: string,
    referenceRoot: string
  ): Promise<DeepestDirectory | undefined> {
    let deepest: DeepestDirectory | undefined;

    for await (const listing of this.walker.walkDirectories(root)) {
      if (listing.files.length === 0 || PathUtils.isSamePath(listing.directory, referenceRoot)) {
        continue;
      }
      const depth = PathUtils.relativeDepth(referenceRoot, listing.directory);
      if (!deepest || depth > deepest.depth) {
        deepest = { directory: listing.directory, depth };
      }
    }

    return deepest;
  }

  /**
   * Files that live anywhere below `root` except directly inside `referenceRoot`
   */
  async collectNestedFiles(root: string, referenceRoot: string): Promise<string[]> {
    const files: string[] = [];
    for await (const listing of this.walker.walkDirectories(root)) {
      if (PathUtils.isSamePath(listing.directory, referenceRoot)) {
        continue;
      }
      files.push(...listing.files.map((name) => path.join(listing.directory, name)));
    }
    return files;
  }
}
