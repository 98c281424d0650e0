import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { walkDirectory, collectSizeGroups, candidateFiles, matchesExtension } from '../src/scan';
import {
  createTempDir,
  cleanupTempDir,
  createTestFile,
  createSymlink
} from './setup';
import path from 'path';

describe('walkDirectory', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should find all files in directory tree', async () => {
    await createTestFile(path.join(tempDir, 'file1.txt'), 'content1');
    await createTestFile(path.join(tempDir, 'subdir/file2.txt'), 'content2');
    await createTestFile(path.join(tempDir, 'subdir/nested/file3.txt'), 'content3');

    const foundFiles: string[] = [];
    await walkDirectory(tempDir, {
      onFile: async (filePath) => {
        foundFiles.push(filePath);
      }
    });

    expect(foundFiles).toHaveLength(3);
    expect(foundFiles).toContain(path.join(tempDir, 'file1.txt'));
    expect(foundFiles).toContain(path.join(tempDir, 'subdir/file2.txt'));
    expect(foundFiles).toContain(path.join(tempDir, 'subdir/nested/file3.txt'));
  });

  it('should report each subdirectory', async () => {
    await createTestFile(path.join(tempDir, 'subdir/nested/file.txt'), 'content');
    await createTestFile(path.join(tempDir, 'other/file.txt'), 'content');

    const dirs: string[] = [];
    await walkDirectory(tempDir, {
      onFile: async () => {},
      onDirectory: (dirPath) => dirs.push(dirPath)
    });

    expect(dirs.sort()).toEqual(
      [path.join(tempDir, 'other'), path.join(tempDir, 'subdir'), path.join(tempDir, 'subdir/nested')].sort()
    );
  });

  it('should handle empty directory', async () => {
    const foundFiles: string[] = [];
    await walkDirectory(tempDir, {
      onFile: async (filePath) => {
        foundFiles.push(filePath);
      }
    });

    expect(foundFiles).toHaveLength(0);
  });

  it('should skip symbolic links', async () => {
    const realFile = path.join(tempDir, 'real.txt');
    const link = path.join(tempDir, 'link.txt');

    await createTestFile(realFile, 'content');
    await createSymlink(realFile, link);

    const foundFiles: string[] = [];
    await walkDirectory(tempDir, {
      onFile: async (filePath) => {
        foundFiles.push(filePath);
      }
    });

    // Should only find the real file, not the symlink
    expect(foundFiles).toEqual([realFile]);
  });

  it('should carry on past an unreadable root', async () => {
    let callbackCount = 0;
    await walkDirectory(path.join(tempDir, 'missing'), {
      onFile: async () => {
        callbackCount++;
      }
    });

    expect(callbackCount).toBe(0);
  });
});

describe('matchesExtension', () => {
  it('should match a case-sensitive suffix', () => {
    expect(matchesExtension('/p/photo.jpg', '.jpg')).toBe(true);
    expect(matchesExtension('/p/photo.JPG', '.jpg')).toBe(false);
    expect(matchesExtension('/p/archive.tar.gz', '.gz')).toBe(true);
  });

  it('should accept everything without a filter', () => {
    expect(matchesExtension('/p/anything', undefined)).toBe(true);
  });
});

describe('collectSizeGroups', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should group files by size', async () => {
    await createTestFile(path.join(tempDir, 'small1.txt'), 'hi');
    await createTestFile(path.join(tempDir, 'small2.txt'), 'yo');
    await createTestFile(path.join(tempDir, 'large.txt'), 'hello world');

    const { groups, uniqueSizeFiles } = await collectSizeGroups({ rootDir: tempDir });

    expect(groups.size).toBe(2);
    // Files with 2 bytes
    expect(groups.get(2)).toHaveLength(2);
    // File with 11 bytes
    expect(groups.get(11)).toHaveLength(1);
    expect(uniqueSizeFiles).toBe(1);
  });

  it('should exclude specified paths', async () => {
    const file1 = path.join(tempDir, 'file1.txt');
    const file2 = path.join(tempDir, 'file2.txt');
    const exclude = path.join(tempDir, 'exclude.txt');

    await createTestFile(file1, 'content');
    await createTestFile(file2, 'content');
    await createTestFile(exclude, 'content');

    const { groups } = await collectSizeGroups({ rootDir: tempDir, excludePaths: [exclude] });

    const group = groups.get(7); // "content" is 7 bytes
    expect(group).toBeDefined();
    expect(group).toHaveLength(2);
    expect(group).toContain(file1);
    expect(group).toContain(file2);
    expect(group).not.toContain(exclude);
  });

  it('should filter by extension', async () => {
    await createTestFile(path.join(tempDir, 'file1.txt'), 'content');
    await createTestFile(path.join(tempDir, 'file2.txt'), 'content');
    await createTestFile(path.join(tempDir, 'file3.jpg'), 'content');
    await createTestFile(path.join(tempDir, 'file4.png'), 'content');

    const { groups } = await collectSizeGroups({ rootDir: tempDir, extension: '.txt' });

    // Should only collect .txt files
    expect(groups.get(7)).toHaveLength(2);
  });

  it('should match extensions case-sensitively', async () => {
    await createTestFile(path.join(tempDir, 'file1.TXT'), 'content');
    await createTestFile(path.join(tempDir, 'file2.txt'), 'content');
    await createTestFile(path.join(tempDir, 'file3.Txt'), 'content');

    const { groups } = await collectSizeGroups({ rootDir: tempDir, extension: '.txt' });

    expect(groups.get(7)).toEqual([path.join(tempDir, 'file2.txt')]);
  });

  it('should drop files below the minimum size', async () => {
    await createTestFile(path.join(tempDir, 'tiny1.txt'), 'ab');
    await createTestFile(path.join(tempDir, 'tiny2.txt'), 'ab');
    await createTestFile(path.join(tempDir, 'big1.txt'), 'abcdef');
    await createTestFile(path.join(tempDir, 'big2.txt'), 'abcdef');

    const { groups } = await collectSizeGroups({ rootDir: tempDir, minSizeBytes: 5 });

    expect([...groups.keys()]).toEqual([6]);
  });

  it('should count the whole tree regardless of filters', async () => {
    await createTestFile(path.join(tempDir, 'a/file1.txt'), 'content');
    await createTestFile(path.join(tempDir, 'a/b/file2.jpg'), 'content');
    await createTestFile(path.join(tempDir, 'c/file3.png'), 'x');

    const result = await collectSizeGroups({ rootDir: tempDir, extension: '.txt', minSizeBytes: 100 });

    expect(result.groups.size).toBe(0);
    expect(result.totalFiles).toBe(3);
    expect(result.totalSubfolders).toBe(3);
    expect(result.uniqueSizeFiles).toBe(0);
  });

  it('should handle empty directory', async () => {
    const result = await collectSizeGroups({ rootDir: tempDir });
    expect(result.groups.size).toBe(0);
    expect(result.totalFiles).toBe(0);
    expect(result.totalSubfolders).toBe(0);
  });

  it('should handle zero-byte files', async () => {
    await createTestFile(path.join(tempDir, 'empty1.txt'), '');
    await createTestFile(path.join(tempDir, 'empty2.txt'), '');

    const { groups } = await collectSizeGroups({ rootDir: tempDir });

    expect(groups.get(0)).toHaveLength(2);
  });
});

describe('candidateFiles', () => {
  it('should keep only shared sizes, in order, with their size', () => {
    const groups = new Map<number, string[]>([
      [3, ['/a/x', '/b/x']],
      [5, ['/c/lonely']],
      [7, ['/d/y', '/e/y', '/f/y']]
    ]);

    expect(candidateFiles(groups)).toEqual([
      { filePath: '/a/x', size: 3 },
      { filePath: '/b/x', size: 3 },
      { filePath: '/d/y', size: 7 },
      { filePath: '/e/y', size: 7 },
      { filePath: '/f/y', size: 7 }
    ]);
  });
});
