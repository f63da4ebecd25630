// Merges distinct text contents into a single artifact

import * as fs from 'fs/promises';
import { TextDecoder } from 'util';
import { Logger } from '../../types';
import { ARTIFACT_NAMES, CONSOLIDATED_SEPARATOR, CONSOLIDATE_EXTENSION } from '../../core/constants';
import { getErrorMessage } from '../../core/error-handler';
import { FilesystemWalker } from './filesystem-walker';
import { matchesFilters } from './name-indexer';
import { ReportWriter } from './report-writer';
import { ConsolidationResult } from './types';

// Throws on malformed input so such files are skipped rather than merged as garbage
const utf8 = new TextDecoder('utf-8', { fatal: true });

export class ContentConsolidator {
  private readonly walker: FilesystemWalker;
  private readonly writer: ReportWriter;
  private readonly logger: Logger;

  constructor(walker: FilesystemWalker, writer: ReportWriter, logger: Logger) {
    this.walker = walker;
    this.writer = writer;
    this.logger = logger;
  }

  /**
   * Read every text file below `root` in walk order and keep each distinct trimmed,
   * non-empty content once
   */
  async collectDistinctContents(
    root: string,
    extension: string = CONSOLIDATE_EXTENSION
  ): Promise<Omit<ConsolidationResult, 'artifact'>> {
    const distinct = new Set<string>();
    const unreadable: ConsolidationResult['unreadable'] = [];
    let filesRead = 0;

    for await (const entry of this.walker.walk(root)) {
      if (!matchesFilters(entry, { kind: 'file', extensionFilter: extension })) {
        continue;
      }
      try {
        const content = utf8.decode(await fs.readFile(entry.fullPath)).trim();
        filesRead++;
        if (content) {
          distinct.add(content);
        }
      } catch (error) {
        this.logger.warn(`Error reading ${entry.fullPath}: ${getErrorMessage(error)}`);
        unreadable.push({ path: entry.fullPath, cause: getErrorMessage(error) });
      }
    }

    return { contents: [...distinct], filesRead, unreadable };
  }

  /**
   * Write the distinct contents, separated by a blank line. Nothing is written when there
   * is no content.
   */
  async consolidate(root: string, destination: string): Promise<ConsolidationResult> {
    const collected = await this.collectDistinctContents(root);
    if (collected.contents.length === 0) {
      return collected;
    }

    const artifact = await this.writer.writeText(
      destination,
      ARTIFACT_NAMES.CONSOLIDATED,
      collected.contents.join(CONSOLIDATED_SEPARATOR)
    );
    return { ...collected, artifact };
  }
}
