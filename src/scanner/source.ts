import { readFile, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { glob } from 'glob';
import ignore from 'ignore';
import { DirectoryNotFoundError, FileAccessError } from '../errors.js';

export const DEFAULT_EXTENSIONS: readonly string[] = ['.kt', '.java'];

export const DEFAULT_IGNORE = [
  '.git/**',
  '.gradle/**',
  '.idea/**',
  '**/build/**',
  '**/generated/**',
  '**/intermediates/**',
  'node_modules/**',
  'out/**',
];

/**
 * File enumeration and read-file-as-lines, the two capabilities the engine
 * needs from the file system. Tests swap in an in-memory implementation.
 */
export interface SourceTree {
  /** Throws DirectoryNotFoundError when `root` is missing or not a directory. */
  assertRoot(root: string): Promise<void>;
  /** Paths relative to `root`, forward slashes, sorted. */
  list(root: string, extensions: readonly string[]): Promise<string[]>;
  /** Throws FileAccessError when the file cannot be read. */
  readLines(root: string, file: string): Promise<string[]>;
}

/** Split file text into lines; a final newline does not produce an extra empty line. */
export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export class FsSourceTree implements SourceTree {
  private ig: ReturnType<typeof ignore>;

  constructor(extraIgnore: readonly string[] = []) {
    this.ig = ignore();
    this.ig.add(DEFAULT_IGNORE);
    this.ig.add([...extraIgnore]);
  }

  async assertRoot(root: string): Promise<void> {
    try {
      const info = await stat(root);
      if (info.isDirectory()) return;
    } catch (err) {
      throw new DirectoryNotFoundError(root, { cause: err });
    }
    throw new DirectoryNotFoundError(root);
  }

  async list(root: string, extensions: readonly string[]): Promise<string[]> {
    const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
    const files = await glob('**/*', {
      cwd: root,
      nodir: true,
      dot: false,
      absolute: false,
      posix: true,
    });

    return files
      .map((file) => file.replace(/\\/g, '/'))
      .filter((file) => wanted.has(extname(file).toLowerCase()) && !this.ig.ignores(file))
      .sort();
  }

  async readLines(root: string, file: string): Promise<string[]> {
    try {
      return splitLines(await readFile(join(root, file), 'utf-8'));
    } catch (err) {
      throw new FileAccessError(file, { cause: err });
    }
  }
}
