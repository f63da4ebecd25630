// Writes report and consolidation artifacts without overwriting earlier runs

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger } from '../../types';
import { JSON_INDENT } from '../../core/constants';
import { getErrorCode, getErrorMessage } from '../../core/error-handler';
import { PathUtils } from './path-utils';
import { ArtifactWriteResult } from './types';

/**
 * Artifacts are named after a canonical file name. When that name is taken a timestamp
 * is inserted before the extension; when that is taken too (two runs in the same second)
 * a numeric suffix follows the timestamp.
 */
export class ReportWriter {
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(logger: Logger, clock: () => Date = () => new Date()) {
    this.logger = logger;
    this.clock = clock;
  }

  async resolveArtifactPath(directory: string, canonicalName: string): Promise<string> {
    const canonicalPath = path.join(directory, canonicalName);
    if (!(await PathUtils.exists(canonicalPath))) {
      return canonicalPath;
    }

    const timestamped = PathUtils.timestampedName(canonicalName, this.clock());
    const uniqueName = await PathUtils.createUniqueName(directory, timestamped, 'file');
    return path.join(directory, uniqueName);
  }

  async writeJson(directory: string, canonicalName: string, data: unknown): Promise<ArtifactWriteResult> {
    return this.writeArtifact(directory, canonicalName, JSON.stringify(data, null, JSON_INDENT));
  }

  async writeText(directory: string, canonicalName: string, content: string): Promise<ArtifactWriteResult> {
    return this.writeArtifact(directory, canonicalName, content);
  }

  private async writeArtifact(
    directory: string,
    canonicalName: string,
    content: string
  ): Promise<ArtifactWriteResult> {
    try {
      await fs.mkdir(directory, { recursive: true });
    } catch (error) {
      const message = `Failed to create directory ${directory}: ${getErrorMessage(error)}`;
      this.logger.error(message);
      return { success: false, error: message };
    }

    // A concurrent writer may take the resolved name between the check and the write
    for (let attempt = 0; attempt < 3; attempt++) {
      const filePath = await this.resolveArtifactPath(directory, canonicalName);
      try {
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
        this.logger.debug(`Artifact written: ${filePath}`);
        return { success: true, filePath };
      } catch (error) {
        if (getErrorCode(error) === 'EEXIST') {
          continue;
        }
        const message = `Failed to write ${filePath}: ${getErrorMessage(error)}`;
        this.logger.error(message);
        return { success: false, filePath, error: message };
      }
    }

    const message = `Could not find a free name for ${canonicalName} in ${directory}`;
    this.logger.error(message);
    return { success: false, error: message };
  }
}
