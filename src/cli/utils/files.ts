import * as fs from 'fs';
import * as path from 'path';
import { glob } from 'glob';

/**
 * Expand a CLI input into snapshot files.
 *
 * A directory expands to every `*.json` file below it; anything else is taken
 * as a file path or glob pattern. Results are absolute, sorted, and limited to
 * regular files.
 */
export async function findSnapshotFiles(input: string): Promise<string[]> {
  let pattern = input;
  if (fs.existsSync(input) && fs.statSync(input).isDirectory()) {
    pattern = path.join(input, '**/*.json');
  }

  // glob patterns always use forward slashes
  const matches = await glob(pattern.split(path.sep).join('/'), { absolute: true, nodir: true });
  return matches.sort();
}

/** `graphs/deploy.json` → `graphs/deploy.ps1` */
export function scriptPathFor(snapshotPath: string, outputDir?: string): string {
  const name = `${path.basename(snapshotPath, path.extname(snapshotPath))}.ps1`;
  return path.join(outputDir ?? path.dirname(snapshotPath), name);
}
