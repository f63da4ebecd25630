import * as fs from 'fs/promises';
import * as path from 'path';
import { FilesystemWalker, assertDirectory } from '../../../services/local/filesystem-walker';
import { NotADirectoryError } from '../../../core/error-handler';
import { ConsoleLogger } from '../../../core/logger';
import { Logger } from '../../../types';
import { createTempDir, removeTempDir, resolveIn, writeTree } from '../../helpers/temp-tree';

describe('FilesystemWalker', () => {
  let tempDir: string;
  let walker: FilesystemWalker;

  beforeEach(async () => {
    tempDir = await createTempDir();
    walker = new FilesystemWalker(new ConsoleLogger('ERROR'));
    await writeTree(tempDir, {
      'b/x.txt': 'b',
      'a/x.txt': 'a',
      'a/sub/y.txt': 'y',
      'c.txt': 'c',
      'empty/': '',
    });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe('walk', () => {
    it('should yield all entries of a directory before descending into its subdirectories', async () => {
      const entries = [];
      for await (const entry of walker.walk(tempDir)) {
        entries.push([path.relative(tempDir, entry.fullPath), entry.kind, entry.depth]);
      }

      expect(entries).toEqual([
        ['a', 'folder', 1],
        ['b', 'folder', 1],
        ['c.txt', 'file', 1],
        ['empty', 'folder', 1],
        [path.join('a', 'sub'), 'folder', 2],
        [path.join('a', 'x.txt'), 'file', 2],
        [path.join('a', 'sub', 'y.txt'), 'file', 3],
        [path.join('b', 'x.txt'), 'file', 2],
      ]);
    });

    it('should reach a file in the root before a same-named file in a subfolder', async () => {
      await writeTree(tempDir, { 'x.txt': 'top' });

      const paths: string[] = [];
      for await (const entry of walker.walk(tempDir)) {
        if (entry.name === 'x.txt') {
          paths.push(entry.fullPath);
        }
      }

      expect(paths).toEqual([
        resolveIn(tempDir, 'x.txt'),
        resolveIn(tempDir, 'a/x.txt'),
        resolveIn(tempDir, 'b/x.txt'),
      ]);
    });

    it('should report base names', async () => {
      const names: string[] = [];
      for await (const entry of walker.walk(resolveIn(tempDir, 'a'))) {
        names.push(entry.name);
      }

      expect(names).toEqual(['sub', 'x.txt', 'y.txt']);
    });

    it('should treat symbolic links as files and not follow them', async () => {
      await fs.symlink(resolveIn(tempDir, 'a'), resolveIn(tempDir, 'empty/link'));

      const entries = [];
      for await (const entry of walker.walk(resolveIn(tempDir, 'empty'))) {
        entries.push(entry);
      }

      expect(entries).toEqual([
        { name: 'link', fullPath: resolveIn(tempDir, 'empty/link'), kind: 'file', depth: 1 },
      ]);
    });

    it('should warn and yield nothing for a directory that cannot be read', async () => {
      const logger: Logger = { error: jest.fn(), warn: jest.fn(), info: jest.fn(), debug: jest.fn() };
      const missing = resolveIn(tempDir, 'missing');

      const entries = [];
      for await (const entry of new FilesystemWalker(logger).walk(missing)) {
        entries.push(entry);
      }

      expect(entries).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.stringContaining(`Failed to read directory: ${missing}`)
      );
    });
  });

  describe('walkDirectories', () => {
    it('should list the root and every directory below it with their files', async () => {
      const listings = [];
      for await (const listing of walker.walkDirectories(tempDir)) {
        listings.push(listing);
      }

      expect(listings).toEqual([
        { directory: tempDir, files: ['c.txt'], entryCount: 4 },
        { directory: resolveIn(tempDir, 'a'), files: ['x.txt'], entryCount: 2 },
        { directory: resolveIn(tempDir, 'a/sub'), files: ['y.txt'], entryCount: 1 },
        { directory: resolveIn(tempDir, 'b'), files: ['x.txt'], entryCount: 1 },
        { directory: resolveIn(tempDir, 'empty'), files: [], entryCount: 0 },
      ]);
    });
  });

  describe('assertDirectory', () => {
    it('should accept an existing directory', async () => {
      await expect(assertDirectory(tempDir)).resolves.toBeUndefined();
    });

    it('should reject a missing path', async () => {
      await expect(assertDirectory(resolveIn(tempDir, 'nope'))).rejects.toBeInstanceOf(NotADirectoryError);
    });

    it('should reject a file', async () => {
      const file = resolveIn(tempDir, 'c.txt');

      await expect(assertDirectory(file)).rejects.toThrow(
        `Provided search location '${file}' is not a valid directory`
      );
    });
  });
});
