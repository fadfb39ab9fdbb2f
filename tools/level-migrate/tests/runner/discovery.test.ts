import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { discoverLevelFiles } from '../../src/runner/discovery.js';

describe('discoverLevelFiles', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'discovery-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('finds json files recursively, sorted by path', () => {
    fs.mkdirSync(path.join(tmpDir, 'world-2'));
    fs.writeFileSync(path.join(tmpDir, 'world-2', 'level-1.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'b.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'a.json'), '{}');
    fs.writeFileSync(path.join(tmpDir, 'notes.txt'), 'skip me');

    expect(discoverLevelFiles(tmpDir)).toEqual([
      path.join(tmpDir, 'a.json'),
      path.join(tmpDir, 'b.json'),
      path.join(tmpDir, 'world-2', 'level-1.json'),
    ]);
  });

  it('returns an empty list for an empty directory', () => {
    expect(discoverLevelFiles(tmpDir)).toEqual([]);
  });

  it('throws when the directory does not exist', () => {
    const missing = path.join(tmpDir, 'missing');
    expect(() => discoverLevelFiles(missing)).toThrow(`Levels directory not found: ${missing}`);
  });

  it('throws when given a file', () => {
    const file = path.join(tmpDir, 'a.json');
    fs.writeFileSync(file, '{}');
    expect(() => discoverLevelFiles(file)).toThrow('Levels directory not found');
  });
});
