// Finds and prunes empty directories

import * as fs from 'fs/promises';
import type { Dirent } from 'fs';
import * as path from 'path';
import { EmptyDirectoryReport, Logger } from '../../types';
import { getErrorMessage } from '../../core/error-handler';
import { FilesystemWalker } from './filesystem-walker';
import { PathUtils } from './path-utils';
import { PruneOutcome } from './types';

export class EmptyDirectoryScanner {
  private readonly walker: FilesystemWalker;
  private readonly logger: Logger;

  constructor(walker: FilesystemWalker, logger: Logger) {
    this.walker = walker;
    this.logger = logger;
  }

  /**
   * Directories (the root included) with no entries at all, in walk order.
   * Each directory is judged on its own contents as they are now.
   */
  async findEmptyDirectories(root: string): Promise<string[]> {
    const empty: string[] = [];
    for await (const listing of this.walker.walkDirectories(root)) {
      if (listing.entryCount === 0) {
        empty.push(listing.directory);
      }
    }
    return empty;
  }

  /**
   * Remove empty directories bottom-up. A directory emptied by the removal of its
   * children is removed too, up to but never including `protect`.
   */
  async pruneEmptyDirectories(root: string, protect: string = root): Promise<PruneOutcome[]> {
    const outcomes: PruneOutcome[] = [];
    await this.pruneDirectory(root, protect, outcomes);
    return outcomes;
  }

  static toReport(directories: readonly string[]): EmptyDirectoryReport {
    return {
      total_empty_directories: directories.length,
      empty_directories: directories.map((directory) => ({
        name: path.basename(directory),
        location: path.resolve(directory),
      })),
    };
  }

  private async pruneDirectory(
    directory: string,
    protect: string,
    outcomes: PruneOutcome[]
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      outcomes.push({ status: 'failed', directory, cause: getErrorMessage(error) });
      this.logger.warn(`Could not read directory ${directory}: ${getErrorMessage(error)}`);
      return;
    }

    const subdirectories = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
    for (const name of subdirectories) {
      await this.pruneDirectory(path.join(directory, name), protect, outcomes);
    }

    if (PathUtils.isSamePath(directory, protect)) {
      return;
    }

    try {
      const remaining = await fs.readdir(directory);
      if (remaining.length > 0) {
        return;
      }
      await fs.rmdir(directory);
      outcomes.push({ status: 'removed', directory });
      this.logger.debug(`Deleted empty directory: ${directory}`);
    } catch (error) {
      outcomes.push({ status: 'failed', directory, cause: getErrorMessage(error) });
      this.logger.error(`Error deleting directory ${directory}: ${getErrorMessage(error)}`);
    }
  }
}
