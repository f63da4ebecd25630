import * as fs from 'fs/promises';
import { ContentConsolidator } from '../../../services/local/content-consolidator';
import { FilesystemWalker } from '../../../services/local/filesystem-walker';
import { ReportWriter } from '../../../services/local/report-writer';
import { ConsoleLogger } from '../../../core/logger';
import { createTempDir, pathExists, removeTempDir, resolveIn, writeTree } from '../../helpers/temp-tree';

describe('ContentConsolidator', () => {
  let tempDir: string;
  let consolidator: ContentConsolidator;

  beforeEach(async () => {
    tempDir = await createTempDir();
    const logger = new ConsoleLogger('ERROR');
    consolidator = new ContentConsolidator(new FilesystemWalker(logger), new ReportWriter(logger), logger);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should keep distinct trimmed contents in first-seen order', async () => {
    await writeTree(tempDir, {
      'a.txt': 'hi',
      'b/c.txt': '  hi \n',
      'b/d.TXT': 'bye',
      'e.txt': '   ',
      'f.md': 'not text',
    });

    const collected = await consolidator.collectDistinctContents(tempDir);

    expect(collected).toEqual({ contents: ['hi', 'bye'], filesRead: 4, unreadable: [] });
  });

  it('should write the contents separated by a blank line', async () => {
    await writeTree(tempDir, { 'a.txt': 'hi', 'b/c.txt': '  hi \n', 'b/d.txt': 'bye' });
    const destination = resolveIn(tempDir, 'consolidated');

    const result = await consolidator.consolidate(tempDir, destination);

    expect(result.artifact).toEqual({ success: true, filePath: resolveIn(destination, 'consolidated.txt') });
    expect(await fs.readFile(resolveIn(destination, 'consolidated.txt'), 'utf-8')).toBe('hi\n\nbye');
  });

  it('should write nothing when there is no text content', async () => {
    await writeTree(tempDir, { 'empty.txt': '\n\n', 'other.md': 'x' });
    const destination = resolveIn(tempDir, 'consolidated');

    const result = await consolidator.consolidate(tempDir, destination);

    expect(result.artifact).toBeUndefined();
    expect(result.contents).toEqual([]);
    expect(await pathExists(destination)).toBe(false);
  });

  it('should record unreadable files and carry on', async () => {
    await writeTree(tempDir, { 'good.txt': 'ok' });
    const broken = resolveIn(tempDir, 'broken.txt');
    await fs.symlink(resolveIn(tempDir, 'nowhere.txt'), broken);

    const collected = await consolidator.collectDistinctContents(tempDir);

    expect(collected.contents).toEqual(['ok']);
    expect(collected.filesRead).toBe(1);
    expect(collected.unreadable).toHaveLength(1);
    expect(collected.unreadable[0].path).toBe(broken);
  });

  it('should skip files that are not valid UTF-8', async () => {
    await writeTree(tempDir, { 'good.txt': 'ok' });
    const binary = resolveIn(tempDir, 'bin.txt');
    await fs.writeFile(binary, Buffer.from([0xff, 0xfe, 0x41, 0xc3]));

    const collected = await consolidator.collectDistinctContents(tempDir);

    expect(collected.contents).toEqual(['ok']);
    expect(collected.filesRead).toBe(1);
    expect(collected.unreadable.map((file) => file.path)).toEqual([binary]);
  });
});
