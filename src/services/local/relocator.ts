// Moves or deletes batches of paths without ever overwriting at the destination

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as path from 'path';
import { ItemKind, Logger } from '../../types';
import { ErrorHandler, getErrorCode } from '../../core/error-handler';
import { PathUtils } from './path-utils';
import { FailedOutcome, RelocationMode, RelocationOutcome, RelocationRequest } from './types';

function kindOf(stats: Stats): ItemKind {
  return stats.isDirectory() ? 'folder' : 'file';
}

/**
 * Applies a move or delete to each path in order and reports one outcome per path.
 * A failing item is recorded and the batch carries on; nothing is rolled back.
 */
export class Relocator {
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;

  constructor(logger: Logger, errorHandler: ErrorHandler) {
    this.logger = logger;
    this.errorHandler = errorHandler;
  }

  async relocate(paths: readonly string[], request: RelocationRequest): Promise<RelocationOutcome[]> {
    const outcomes: RelocationOutcome[] = [];

    if (request.mode === 'move') {
      try {
        await fs.mkdir(request.destination, { recursive: true });
      } catch (error) {
        const failure = this.errorHandler.handleError(error, {
          operation: 'create destination',
          filePath: request.destination,
          timestamp: new Date(),
        });
        return paths.map((source): FailedOutcome => ({
          status: 'failed',
          source,
          action: 'move',
          cause: `Cannot create destination ${request.destination}: ${failure.message}`,
          category: failure.category,
        }));
      }
    }

    for (const source of paths) {
      outcomes.push(await this.relocateOne(source, request));
    }

    return outcomes;
  }

  private async relocateOne(source: string, request: RelocationRequest): Promise<RelocationOutcome> {
    let stats: Stats;
    try {
      stats = await fs.lstat(source);
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        this.logger.debug(`Source not found (already moved or deleted): ${source}`);
        return { status: 'skipped_missing', source };
      }
      return this.failure(source, request.mode, error);
    }

    const kind = kindOf(stats);

    try {
      if (request.mode === 'move') {
        const finalName = await PathUtils.createUniqueName(
          request.destination,
          path.basename(source),
          kind
        );
        const destination = path.join(request.destination, finalName);
        await this.move(source, destination);
        this.logger.debug(`Moved: ${source} -> ${destination}`);
        return { status: 'moved', source, destination };
      }

      if (kind === 'folder') {
        await fs.rm(source, { recursive: true });
      } else {
        await fs.unlink(source);
      }
      this.logger.debug(`Deleted ${kind}: ${source}`);
      return { status: 'deleted', source, kind };
    } catch (error) {
      return this.failure(source, request.mode, error);
    }
  }

  /**
   * Rename, falling back to copy-then-remove across devices
   */
  private async move(source: string, destination: string): Promise<void> {
    try {
      await fs.rename(source, destination);
    } catch (error) {
      if (getErrorCode(error) !== 'EXDEV') {
        throw error;
      }
      this.logger.debug(`Cross-device move, copying instead: ${source} -> ${destination}`);
      await fs.cp(source, destination, { recursive: true, errorOnExist: true, force: false });
      await fs.rm(source, { recursive: true });
    }
  }

  private failure(source: string, action: RelocationMode, error: unknown): FailedOutcome {
    const categorized = this.errorHandler.handleError(error, {
      operation: action === 'move' ? 'move' : 'delete',
      filePath: source,
      timestamp: new Date(),
    });
    return {
      status: 'failed',
      source,
      action,
      cause: categorized.message,
      category: categorized.category,
    };
  }
}
