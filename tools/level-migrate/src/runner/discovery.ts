import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Recursively walk a directory and collect all files.
 */
function walkDir(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walkDir(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Find every `*.json` level file under `levelsDir`, sorted by path.
 *
 * @throws If `levelsDir` does not exist or is not a directory.
 */
export function discoverLevelFiles(levelsDir: string): string[] {
  if (!fs.existsSync(levelsDir) || !fs.statSync(levelsDir).isDirectory()) {
    throw new Error(`Levels directory not found: ${levelsDir}`);
  }

  return walkDir(levelsDir)
    .filter((filePath) => filePath.endsWith('.json'))
    .sort((a, b) => a.localeCompare(b));
}
