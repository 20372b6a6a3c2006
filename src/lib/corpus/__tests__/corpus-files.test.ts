/**
 * Corpus File Utility Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { makeTempDir, removeTempDir } from '../../../__tests__/helpers/fixtures';
import { forEachLine, readJsonFile, repairTrailingLine, urlToRelativePath, writeFileAtomic } from '../corpus-files';

describe('corpus files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('writeFileAtomic', () => {
    it('should replace the file and leave no temporary file behind', async () => {
      const target = path.join(dir, 'stats.json');
      await writeFileAtomic(target, '{"a":1}\n');
      await writeFileAtomic(target, '{"a":2}\n');

      await expect(fs.readFile(target, 'utf8')).resolves.toBe('{"a":2}\n');
      await expect(fs.readdir(dir)).resolves.toEqual(['stats.json']);
    });
  });

  describe('repairTrailingLine', () => {
    it('should cut a torn last line', async () => {
      const target = path.join(dir, 'corpus.jsonl');
      await fs.writeFile(target, 'a\nb\npartial');

      await expect(repairTrailingLine(target)).resolves.toBe(7);
      await expect(fs.readFile(target, 'utf8')).resolves.toBe('a\nb\n');
    });

    it('should leave an intact file alone', async () => {
      const target = path.join(dir, 'corpus.jsonl');
      await fs.writeFile(target, 'a\nb\n');

      await expect(repairTrailingLine(target)).resolves.toBe(0);
      await expect(fs.readFile(target, 'utf8')).resolves.toBe('a\nb\n');
    });

    it('should empty a file holding only a torn line', async () => {
      const target = path.join(dir, 'corpus.jsonl');
      await fs.writeFile(target, 'abc');

      await expect(repairTrailingLine(target)).resolves.toBe(3);
      await expect(fs.readFile(target, 'utf8')).resolves.toBe('');
    });

    it('should find the last newline beyond one read block', async () => {
      const target = path.join(dir, 'corpus.jsonl');
      const torn = 'x'.repeat(70 * 1024);
      await fs.writeFile(target, `first\n${torn}`);

      await expect(repairTrailingLine(target)).resolves.toBe(torn.length);
      await expect(fs.readFile(target, 'utf8')).resolves.toBe('first\n');
    });

    it('should ignore missing and empty files', async () => {
      await expect(repairTrailingLine(path.join(dir, 'missing.jsonl'))).resolves.toBe(0);

      const empty = path.join(dir, 'empty.jsonl');
      await fs.writeFile(empty, '');
      await expect(repairTrailingLine(empty)).resolves.toBe(0);
    });
  });

  describe('forEachLine', () => {
    it('should stream every line', async () => {
      const target = path.join(dir, 'visited.txt');
      await fs.writeFile(target, 'x\ny\n');
      const lines: string[] = [];

      await expect(forEachLine(target, (line) => lines.push(line))).resolves.toBe(true);
      expect(lines).toEqual(['x', 'y']);
    });

    it('should report a missing file', async () => {
      const onLine = jest.fn();
      await expect(forEachLine(path.join(dir, 'missing.txt'), onLine)).resolves.toBe(false);
      expect(onLine).not.toHaveBeenCalled();
    });
  });

  describe('readJsonFile', () => {
    it('should parse JSON and return null for a missing file', async () => {
      const target = path.join(dir, 'frontier.json');
      await fs.writeFile(target, '{"pending":[]}');

      await expect(readJsonFile(target)).resolves.toEqual({ pending: [] });
      await expect(readJsonFile(path.join(dir, 'missing.json'))).resolves.toBeNull();
    });

    it('should reject malformed JSON', async () => {
      const target = path.join(dir, 'stats.json');
      await fs.writeFile(target, '{"pages');

      await expect(readJsonFile(target)).rejects.toThrow(SyntaxError);
    });
  });
});

describe('urlToRelativePath', () => {
  it('should map directory-like URLs to index.html', () => {
    expect(urlToRelativePath('https://docs.example.test/guide/')).toBe('docs.example.test/guide/index.html');
    expect(urlToRelativePath('https://docs.example.test/guide/install')).toBe(
      'docs.example.test/guide/install/index.html'
    );
    expect(urlToRelativePath('https://docs.example.test:8080/')).toBe('docs.example.test_8080/index.html');
  });

  it('should keep file names that have an extension', () => {
    expect(urlToRelativePath('https://docs.example.test/api/page.html')).toBe('docs.example.test/api/page.html');
  });
});
