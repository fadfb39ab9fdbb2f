import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { exitWithError, formatJson, writeOutput } from '../../../src/cli/utils/output.js';

describe('formatJson', () => {
  it('writes compact JSON by default', () => {
    expect(formatJson({ migrated: 1, files: [] }, false)).toBe('{"migrated":1,"files":[]}\n');
  });

  it('indents when pretty', () => {
    expect(formatJson({ migrated: 1 }, true)).toBe('{\n  "migrated": 1\n}\n');
  });
});

describe('writeOutput', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes to stdout when no path is given', () => {
    const spy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    writeOutput('{"ok":true}\n');
    expect(spy).toHaveBeenCalledWith('{"ok":true}\n');
  });

  it('writes to a file, creating parent directories', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'output-test-'));
    const filePath = path.join(tmpDir, 'reports', 'migrate.json');
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    writeOutput('{"ok":true}\n', filePath);

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('{"ok":true}\n');
    expect(stderrSpy).toHaveBeenCalledWith(`Written to ${path.resolve(filePath)}\n`);

    fs.rmSync(tmpDir, { recursive: true });
  });
});

describe('exitWithError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the message and exits with code 2', () => {
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });

    expect(() => exitWithError(new Error('No level files found in /tmp/levels'))).toThrow('exit 2');
    expect(stderrSpy).toHaveBeenCalledWith('Error: No level files found in /tmp/levels\n');
    expect(exitSpy).toHaveBeenCalledWith(2);
  });
});
