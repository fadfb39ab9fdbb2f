import * as fs from 'node:fs';
import * as path from 'node:path';

/** Serialize a command result as one JSON document with a trailing newline. */
export function formatJson(result: unknown, pretty: boolean): string {
  return JSON.stringify(result, null, pretty ? 2 : undefined) + '\n';
}

export function writeOutput(content: string, outputPath?: string): void {
  if (outputPath) {
    const resolved = path.resolve(outputPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, content);
    process.stderr.write(`Written to ${resolved}\n`);
  } else {
    process.stdout.write(content);
  }
}

/** Report a fatal error the way every command does, then exit with code 2. */
export function exitWithError(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exit(2);
}
