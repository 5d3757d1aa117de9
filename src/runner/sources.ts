import * as fs from 'fs/promises';

// One entry per non-empty line, in file order.
export async function readLines(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (err) {
    throw new Error(`Could not read ${path}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}
