// Turns command-line options into a validated operation configuration

import * as path from 'path';
import { ConfigValidationResult, ItemKind } from '../types';
import { PathUtils } from '../services/local/path-utils';
import { assertDirectory } from '../services/local/filesystem-walker';
import {
  CONSOLIDATE_EXTENSION,
  DEFAULT_DESTINATIONS,
  LOCATION_PREFIX,
  SweepCommand,
} from './constants';
import { getErrorMessage } from './error-handler';

/**
 * Options as they arrive from the command line, before any defaults are applied
 */
export interface RawSweepOptions {
  type?: string;
  location?: string;
  name?: string;
  cleanup?: boolean;
  searchLocation?: string;
  all?: boolean;
}

export interface OperationConfig {
  command: SweepCommand;
  itemKind: ItemKind;
  /** Lower-cased extension including the dot, e.g. `.txt` */
  extensionFilter?: string;
  nameFilter?: string;
  /** Type exactly as given (lower-cased), if any */
  requestedType?: string;
  searchRoot: string;
  /** Where move-out lands and where relative locations resolve from */
  referenceRoot: string;
  destination: string;
  cleanup: boolean;
  all: boolean;
  warnings: string[];
}

export interface ResolvedType {
  itemKind: ItemKind;
  extensionFilter?: string;
  warning?: string;
}

export class ConfigManager {
  /**
   * `file`, `folder`, or an extension such as `.jpg`. Without a type, `report` looks at
   * folders and every other command at files.
   */
  static resolveType(command: SweepCommand, type?: string): ResolvedType {
    const fallback: ItemKind = command === 'report' ? 'folder' : 'file';
    if (type === undefined) {
      return { itemKind: fallback };
    }

    const normalized = type.toLowerCase();
    if (normalized === 'file' || normalized === 'folder') {
      return { itemKind: normalized };
    }
    if (normalized.startsWith('.')) {
      return { itemKind: 'file', extensionFilter: normalized };
    }

    return {
      itemKind: fallback,
      warning: `Unrecognized type "${type}", using "${fallback}"`,
    };
  }

  static resolve(
    command: SweepCommand,
    options: RawSweepOptions,
    referenceRoot: string
  ): OperationConfig {
    const resolvedType = ConfigManager.resolveType(command, options.type);
    const warnings: string[] = resolvedType.warning ? [resolvedType.warning] : [];

    const searchRoot = options.searchLocation
      ? path.resolve(referenceRoot, PathUtils.parseLocation(options.searchLocation, LOCATION_PREFIX))
      : referenceRoot;

    const destination = options.location
      ? path.resolve(referenceRoot, PathUtils.parseLocation(options.location, LOCATION_PREFIX))
      : path.join(referenceRoot, DEFAULT_DESTINATIONS[command]);

    const all = options.all ?? false;
    const cleanup = options.cleanup ?? false;
    if (command === 'delete' && all && cleanup) {
      warnings.push('--cleanup is ignored when --all is given');
    }

    return {
      command,
      itemKind: resolvedType.itemKind,
      extensionFilter: resolvedType.extensionFilter,
      nameFilter: options.name || undefined,
      requestedType: options.type?.toLowerCase(),
      searchRoot,
      referenceRoot,
      destination,
      cleanup,
      all,
      warnings,
    };
  }

  /**
   * Checks that must pass before any filesystem change is made
   */
  async validateConfig(config: OperationConfig): Promise<ConfigValidationResult> {
    const errors: string[] = [];

    if (config.command === 'consolidate' && config.requestedType !== CONSOLIDATE_EXTENSION) {
      errors.push(`The consolidate command only supports --type ${CONSOLIDATE_EXTENSION}`);
    }

    try {
      await assertDirectory(config.searchRoot);
    } catch (error) {
      errors.push(getErrorMessage(error));
    }

    return {
      isValid: errors.length === 0,
      errors,
    };
  }

  /**
   * Get configuration summary for display
   */
  static getConfigSummary(config: OperationConfig): Record<string, string | boolean> {
    return {
      Command: config.command,
      Type: config.extensionFilter ?? config.itemKind,
      Name: config.nameFilter ?? '(any)',
      'Search Location': config.searchRoot,
      Destination: config.destination,
      Cleanup: config.cleanup,
      All: config.all,
    };
  }
}
