import {
  deriveDuplicates,
  selectAllPaths,
  selectDuplicatePaths,
  toDuplicateReport,
} from '../../../services/local/duplicate-policy';
import { NameIndex } from '../../../types';

describe('duplicate policy', () => {
  let index: NameIndex;

  beforeEach(() => {
    index = new Map([
      ['x.txt', ['/r/a/x.txt', '/r/b/x.txt', '/r/c/x.txt']],
      ['only.txt', ['/r/only.txt']],
      ['y.txt', ['/r/a/y.txt', '/r/d/y.txt']],
    ]);
  });

  describe('deriveDuplicates', () => {
    it('should keep only names found at two or more paths, in discovery order', () => {
      const groups = deriveDuplicates(index);

      expect([...groups.keys()]).toEqual(['x.txt', 'y.txt']);
      expect(groups.get('x.txt')).toEqual(['/r/a/x.txt', '/r/b/x.txt', '/r/c/x.txt']);
    });

    it('should not share arrays with the index', () => {
      const groups = deriveDuplicates(index);
      groups.get('y.txt')?.pop();

      expect(index.get('y.txt')).toEqual(['/r/a/y.txt', '/r/d/y.txt']);
    });

    it('should return an empty map when every name is unique', () => {
      expect(deriveDuplicates(new Map([['a', ['/r/a']]])).size).toBe(0);
    });
  });

  describe('selectDuplicatePaths', () => {
    it('should skip the original of every group', () => {
      expect(selectDuplicatePaths(deriveDuplicates(index))).toEqual([
        '/r/b/x.txt',
        '/r/c/x.txt',
        '/r/d/y.txt',
      ]);
    });
  });

  describe('selectAllPaths', () => {
    it('should return every indexed path', () => {
      expect(selectAllPaths(index)).toEqual([
        '/r/a/x.txt',
        '/r/b/x.txt',
        '/r/c/x.txt',
        '/r/only.txt',
        '/r/a/y.txt',
        '/r/d/y.txt',
      ]);
    });
  });

  describe('toDuplicateReport', () => {
    it('should count groups and list every path of each group', () => {
      expect(toDuplicateReport(deriveDuplicates(index))).toEqual({
        total_duplicates: 2,
        duplicates: {
          'x.txt': ['/r/a/x.txt', '/r/b/x.txt', '/r/c/x.txt'],
          'y.txt': ['/r/a/y.txt', '/r/d/y.txt'],
        },
      });
    });
  });
});
