/**
 * File system operations - reading, globbing and path containment.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as UTF-8. Invalid byte sequences raise a TypeError instead of
 * being replaced.
 */
export async function readTextFile(filePath: string): Promise<string> {
  const buffer = await fs.promises.readFile(filePath);
  return strictUtf8.decode(buffer);
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    dot?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore ?? [],
    absolute: options.absolute ?? true,
    dot: options.dot ?? false,
    onlyFiles: true,
  });
}

/**
 * True when `child` is `dir` itself or lies anywhere beneath it.
 * Purely lexical: both paths are made absolute, symlinks are not followed.
 */
export function isWithinDirectory(child: string, dir: string): boolean {
  const rel = path.relative(path.resolve(dir), path.resolve(child));
  if (rel === '') return true;
  return !rel.startsWith('..') && !path.isAbsolute(rel);
}
