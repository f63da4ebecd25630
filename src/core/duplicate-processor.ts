// Runs one sweep operation from a resolved configuration

import { DuplicateGroups, Logger, NameIndex } from '../types';
import { ARTIFACT_NAMES } from './constants';
import { OperationConfig } from './config-manager';
import { ErrorHandler } from './error-handler';
import { FilesystemWalker } from '../services/local/filesystem-walker';
import { NameIndexer } from '../services/local/name-indexer';
import {
  deriveDuplicates,
  selectAllPaths,
  selectDuplicatePaths,
  toDuplicateReport,
} from '../services/local/duplicate-policy';
import { Relocator } from '../services/local/relocator';
import { EmptyDirectoryScanner } from '../services/local/empty-directory-scanner';
import { DepthSelector } from '../services/local/depth-selector';
import { ReportWriter } from '../services/local/report-writer';
import { ContentConsolidator } from '../services/local/content-consolidator';
import {
  ArtifactWriteResult,
  ConsolidationResult,
  PruneOutcome,
  RelocationOutcome,
} from '../services/local/types';

export type OperationStatus = 'completed' | 'nothing_found' | 'persistence_failed';

export interface OperationSummary {
  status: OperationStatus;
  /** One-line conclusion for the operator */
  message: string;
  outcomes: RelocationOutcome[];
  pruned: PruneOutcome[];
  artifactPath?: string;
  duplicates?: DuplicateGroups;
  emptyDirectories?: string[];
  consolidation?: ConsolidationResult;
}

export interface ProcessorOptions {
  clock?: () => Date;
}

function emptySummary(status: OperationStatus, message: string): OperationSummary {
  return { status, message, outcomes: [], pruned: [] };
}

/**
 * Wires the local services together and dispatches on the configured command
 */
export class DuplicateProcessor {
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly indexer: NameIndexer;
  private readonly relocator: Relocator;
  private readonly emptyScanner: EmptyDirectoryScanner;
  private readonly depthSelector: DepthSelector;
  private readonly reportWriter: ReportWriter;
  private readonly consolidator: ContentConsolidator;

  constructor(logger: Logger, options: ProcessorOptions = {}) {
    this.logger = logger;
    this.errorHandler = new ErrorHandler(logger);

    const walker = new FilesystemWalker(logger);
    this.indexer = new NameIndexer(walker);
    this.relocator = new Relocator(logger, this.errorHandler);
    this.emptyScanner = new EmptyDirectoryScanner(walker, logger);
    this.depthSelector = new DepthSelector(walker);
    this.reportWriter = new ReportWriter(logger, options.clock);
    this.consolidator = new ContentConsolidator(walker, this.reportWriter, logger);
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  async run(config: OperationConfig): Promise<OperationSummary> {
    for (const warning of config.warnings) {
      this.logger.warn(warning);
    }
    this.logger.debug(`Running ${config.command}`, {
      searchRoot: config.searchRoot,
      destination: config.destination,
      itemKind: config.itemKind,
      extensionFilter: config.extensionFilter,
      nameFilter: config.nameFilter,
    });

    switch (config.command) {
      case 'report':
        // --cleanup takes precedence and ignores the type and name filters
        return config.cleanup ? this.reportEmptyDirectories(config) : this.reportDuplicates(config);
      case 'move':
        return this.moveItems(config);
      case 'delete':
        if (config.all) {
          return this.deleteItems(config);
        }
        return config.cleanup ? this.pruneEmptyDirectories(config) : this.deleteItems(config);
      case 'move-out':
        return config.itemKind === 'folder' ? this.moveOutDeepestFolder(config) : this.moveOutFiles(config);
      case 'consolidate':
        return this.consolidate(config);
    }
  }

  async reportDuplicates(config: OperationConfig): Promise<OperationSummary> {
    const duplicates = await this.findDuplicates(config);
    if (duplicates.size === 0) {
      return emptySummary('nothing_found', 'No duplicates found.');
    }

    const written = await this.reportWriter.writeJson(
      config.destination,
      ARTIFACT_NAMES.DUPLICATE_REPORT,
      toDuplicateReport(duplicates)
    );
    return {
      ...this.artifactSummary(written, 'Duplicate report generated at'),
      duplicates,
    };
  }

  async reportEmptyDirectories(config: OperationConfig): Promise<OperationSummary> {
    const emptyDirectories = await this.emptyScanner.findEmptyDirectories(config.searchRoot);
    if (emptyDirectories.length === 0) {
      return emptySummary('nothing_found', 'No empty directories found.');
    }

    const written = await this.reportWriter.writeJson(
      config.destination,
      ARTIFACT_NAMES.EMPTY_DIRECTORY_REPORT,
      EmptyDirectoryScanner.toReport(emptyDirectories)
    );
    return {
      ...this.artifactSummary(written, 'Empty directories report generated at'),
      emptyDirectories,
    };
  }

  async moveItems(config: OperationConfig): Promise<OperationSummary> {
    const paths = await this.selectTargets(config);
    if (paths.length === 0) {
      return emptySummary(
        'nothing_found',
        config.all ? 'No items found to move.' : 'No duplicates found to move.'
      );
    }

    const outcomes = await this.relocator.relocate(paths, {
      mode: 'move',
      destination: config.destination,
    });
    return { status: 'completed', message: `Processed ${outcomes.length} item(s).`, outcomes, pruned: [] };
  }

  async deleteItems(config: OperationConfig): Promise<OperationSummary> {
    const paths = await this.selectTargets(config);
    if (paths.length === 0) {
      return emptySummary(
        'nothing_found',
        config.all ? 'No items found to delete.' : 'No duplicates found to delete.'
      );
    }

    const outcomes = await this.relocator.relocate(paths, { mode: 'delete' });
    return { status: 'completed', message: `Processed ${outcomes.length} item(s).`, outcomes, pruned: [] };
  }

  async pruneEmptyDirectories(config: OperationConfig): Promise<OperationSummary> {
    const pruned = await this.emptyScanner.pruneEmptyDirectories(config.searchRoot);
    if (pruned.length === 0) {
      return emptySummary('nothing_found', 'No empty directories found.');
    }
    const removed = pruned.filter((outcome) => outcome.status === 'removed').length;
    return {
      status: 'completed',
      message: `Removed ${removed} empty director${removed === 1 ? 'y' : 'ies'}.`,
      outcomes: [],
      pruned,
    };
  }

  async moveOutDeepestFolder(config: OperationConfig): Promise<OperationSummary> {
    const deepest = await this.depthSelector.findDeepestFileDirectory(
      config.searchRoot,
      config.referenceRoot
    );
    if (!deepest) {
      return emptySummary('nothing_found', 'No nested folder with files found to move.');
    }

    this.logger.debug(`Deepest folder with files: ${deepest.directory} (depth ${deepest.depth})`);
    const outcomes = await this.relocator.relocate([deepest.directory], {
      mode: 'move',
      destination: config.referenceRoot,
    });
    return { status: 'completed', message: 'Move-out finished.', outcomes, pruned: [] };
  }

  async moveOutFiles(config: OperationConfig): Promise<OperationSummary> {
    const files = await this.depthSelector.collectNestedFiles(config.searchRoot, config.referenceRoot);
    if (files.length === 0) {
      return emptySummary('nothing_found', 'No nested files found to move.');
    }

    const outcomes = await this.relocator.relocate(files, {
      mode: 'move',
      destination: config.referenceRoot,
    });
    return { status: 'completed', message: `Processed ${outcomes.length} item(s).`, outcomes, pruned: [] };
  }

  async consolidate(config: OperationConfig): Promise<OperationSummary> {
    const consolidation = await this.consolidator.consolidate(config.searchRoot, config.destination);
    if (!consolidation.artifact) {
      return { ...emptySummary('nothing_found', 'No text data found to consolidate.'), consolidation };
    }

    return {
      ...this.artifactSummary(consolidation.artifact, 'Consolidated file generated at'),
      consolidation,
    };
  }

  private buildIndex(config: OperationConfig): Promise<NameIndex> {
    return this.indexer.buildIndex(config.searchRoot, {
      kind: config.itemKind,
      nameFilter: config.nameFilter,
      extensionFilter: config.extensionFilter,
    });
  }

  private async findDuplicates(config: OperationConfig): Promise<DuplicateGroups> {
    return deriveDuplicates(await this.buildIndex(config));
  }

  /**
   * Every matching item with --all, otherwise the duplicates only
   */
  private async selectTargets(config: OperationConfig): Promise<string[]> {
    if (!config.all) {
      return selectDuplicatePaths(await this.findDuplicates(config));
    }
    return selectAllPaths(await this.buildIndex(config));
  }

  private artifactSummary(written: ArtifactWriteResult, label: string): OperationSummary {
    if (!written.success || !written.filePath) {
      return emptySummary('persistence_failed', written.error ?? 'Failed to write artifact');
    }
    return {
      status: 'completed',
      message: `${label}: ${written.filePath}`,
      artifactPath: written.filePath,
      outcomes: [],
      pruned: [],
    };
  }
}
