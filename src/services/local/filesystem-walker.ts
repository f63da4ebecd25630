// Depth-first filesystem walker

import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import { Entry, Logger } from '../../types';
import { NotADirectoryError, getErrorMessage } from '../../core/error-handler';

/**
 * Check once, before an operation starts, that the root is a readable directory
 */
export async function assertDirectory(root: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch (error) {
    throw new NotADirectoryError(root, getErrorMessage(error));
  }
  if (!stats.isDirectory()) {
    throw new NotADirectoryError(root);
  }
}

export interface DirectoryListing {
  directory: string;
  /** Names of the non-directory entries directly inside */
  files: string[];
  entryCount: number;
}

function byName(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Walks a directory tree depth-first, parent before children. Every entry of a
 * directory is yielded before the walk descends into any of its subdirectories.
 *
 * Children of every directory are sorted by name so that "first discovered" is the same
 * on every platform. Symbolic links are reported as files and never followed.
 */
export class FilesystemWalker {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Every file and folder below `root`; the root itself is not yielded
   */
  async *walk(root: string): AsyncGenerator<Entry> {
    yield* this.walkDirectory(root, 1);
  }

  /**
   * Directories in walk order, starting with the root itself, each with the names of
   * the files it directly contains
   */
  async *walkDirectories(root: string): AsyncGenerator<DirectoryListing> {
    yield* this.visitDirectory(root);
  }

  private async *walkDirectory(directory: string, depth: number): AsyncGenerator<Entry> {
    const children = await this.readSorted(directory);
    if (children === undefined) {
      return;
    }

    for (const child of children) {
      const kind = child.isDirectory() ? 'folder' : 'file';
      yield { name: child.name, fullPath: path.join(directory, child.name), kind, depth };
    }

    for (const child of children) {
      if (child.isDirectory()) {
        yield* this.walkDirectory(path.join(directory, child.name), depth + 1);
      }
    }
  }

  private async *visitDirectory(directory: string): AsyncGenerator<DirectoryListing> {
    const children = await this.readSorted(directory);
    if (children === undefined) {
      return;
    }

    yield {
      directory,
      files: children.filter((child) => !child.isDirectory()).map((child) => child.name),
      entryCount: children.length,
    };

    for (const child of children) {
      if (child.isDirectory()) {
        yield* this.visitDirectory(path.join(directory, child.name));
      }
    }
  }

  private async readSorted(directory: string): Promise<Dirent[] | undefined> {
    try {
      const entries = await fs.readdir(directory, { withFileTypes: true });
      return entries.sort(byName);
    } catch (error) {
      this.logger.warn(`Failed to read directory: ${directory} - ${getErrorMessage(error)}`);
      return undefined;
    }
  }
}
