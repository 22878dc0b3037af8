/**
 * LocalSpectrumSource: reads instrument exports from a local directory.
 *
 * Paths are always relative to the base directory; anything that resolves
 * outside it is refused.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import { SpectrumNotFoundError } from '../spectrum/errors.js';
import type { ListFilesOptions, LocalSourceConfig, SourceFile } from './types.js';

/**
 * Check if a filename matches a glob pattern.
 * Supports simple patterns: *.txt, prefix*, exact names.
 */
export function matchesPattern(filename: string, pattern: string | undefined): boolean {
  if (!pattern) return true;

  if (pattern.startsWith('*.')) {
    const ext = pattern.slice(1);
    return filename.toLowerCase().endsWith(ext.toLowerCase());
  }

  if (pattern.endsWith('*')) {
    const prefix = pattern.slice(0, -1);
    return filename.startsWith(prefix);
  }

  return filename === pattern;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export class LocalSpectrumSource {
  readonly basePath: string;

  constructor(config: LocalSourceConfig) {
    this.basePath = resolve(config.basePath);
  }

  /**
   * Resolve a path relative to the base directory.
   */
  private resolvePath(path: string): string {
    const full = resolve(this.basePath, path);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new SpectrumNotFoundError(`file ${path} (outside the source directory)`);
    }
    return full;
  }

  async getFile(path: string): Promise<SourceFile | null> {
    const fullPath = this.resolvePath(path);

    try {
      const content = await readFile(fullPath, 'utf-8');
      const stats = await stat(fullPath);
      return { path, content, size: stats.size };
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }
  }

  async fileExists(path: string): Promise<boolean> {
    const fullPath = this.resolvePath(path);

    try {
      const stats = await stat(fullPath);
      return stats.isFile();
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw err;
    }
  }

  /**
   * List files, sorted, as paths relative to the base directory.
   */
  async listFiles(options: ListFilesOptions = {}): Promise<string[]> {
    const { directory = '.', pattern, recursive = false } = options;
    const results: string[] = [];

    try {
      await this.listFilesRecursive(this.resolvePath(directory), pattern, recursive, results);
    } catch (err) {
      if (isNotFound(err)) {
        return [];
      }
      throw err;
    }

    return results.sort();
  }

  private async listFilesRecursive(
    fullDir: string,
    pattern: string | undefined,
    recursive: boolean,
    results: string[],
  ): Promise<void> {
    const entries = await readdir(fullDir, { withFileTypes: true });

    for (const entry of entries) {
      const entryPath = join(fullDir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) {
          await this.listFilesRecursive(entryPath, pattern, recursive, results);
        }
      } else if (entry.isFile() && matchesPattern(entry.name, pattern)) {
        results.push(relative(this.basePath, entryPath).split(sep).join('/'));
      }
    }
  }
}

export function createLocalSpectrumSource(config: LocalSourceConfig): LocalSpectrumSource {
  return new LocalSpectrumSource(config);
}
