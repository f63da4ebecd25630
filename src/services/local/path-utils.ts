// Path utilities for collision-free naming and depth calculations

import * as fs from 'fs/promises';
import * as path from 'path';
import { ItemKind } from '../../types';
import { MAX_NAME_SUFFIX } from '../../core/constants';

export class PathUtils {
  /**
   * True when anything (file, folder or dangling link) occupies the path
   */
  static async exists(targetPath: string): Promise<boolean> {
    try {
      await fs.lstat(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Split a name into stem and extension. Folders never have an extension.
   */
  static splitName(name: string, kind: ItemKind): { stem: string; ext: string } {
    if (kind === 'folder') {
      return { stem: name, ext: '' };
    }
    const ext = path.extname(name);
    return { stem: ext ? name.slice(0, -ext.length) : name, ext };
  }

  static numberedName(name: string, kind: ItemKind, counter: number): string {
    const { stem, ext } = this.splitName(name, kind);
    return `${stem}_${counter}${ext}`;
  }

  /**
   * Find a name that is free inside `directory`: the name itself, else `<stem>_1<ext>`,
   * `<stem>_2<ext>`, ...
   */
  static async createUniqueName(directory: string, name: string, kind: ItemKind): Promise<string> {
    if (!(await this.exists(path.join(directory, name)))) {
      return name;
    }

    for (let counter = 1; counter <= MAX_NAME_SUFFIX; counter++) {
      const candidate = this.numberedName(name, kind, counter);
      if (!(await this.exists(path.join(directory, candidate)))) {
        return candidate;
      }
    }

    throw new Error(`No free name for '${name}' in ${directory} after ${MAX_NAME_SUFFIX} attempts`);
  }

  /**
   * Sortable second-resolution timestamp, e.g. 20241005143012
   */
  static formatTimestamp(date: Date): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    return (
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
      `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
  }

  static timestampedName(fileName: string, date: Date): string {
    const { stem, ext } = this.splitName(fileName, 'file');
    return `${stem}_${this.formatTimestamp(date)}${ext}`;
  }

  /**
   * Number of separators in the path of `target` relative to `reference`.
   * `reference/a` -> 0, `reference/a/b` -> 1.
   */
  static relativeDepth(reference: string, target: string): number {
    const relative = path.relative(reference, target);
    if (!relative) {
      return -1;
    }
    return relative.split(path.sep).length - 1;
  }

  static isSamePath(a: string, b: string): boolean {
    return path.resolve(a) === path.resolve(b);
  }

  /**
   * Accept both `path=<value>` and a bare value, as the location options do
   */
  static parseLocation(location: string, prefix: string): string {
    return location.startsWith(prefix) ? location.slice(prefix.length) : location;
  }
}
