/**
 * File-system Lister
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {
  config,
  describeError,
  err,
  ListError,
  ok,
  type FileLister,
  type PathKind,
  type Result,
} from '@expedientes/shared';

function isMissingPathError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export class FsFileLister implements FileLister {
  private readonly extensions: ReadonlySet<string>;

  constructor(extensions: readonly string[] = config.supportedExtensions) {
    this.extensions = new Set(extensions.map((ext) => ext.toLowerCase()));
  }

  isSupported(filePath: string): boolean {
    return this.extensions.has(path.extname(filePath).toLowerCase());
  }

  async inspectPath(target: string): Promise<PathKind> {
    try {
      const stats = await fs.stat(target);
      if (stats.isFile()) return 'file';
      if (stats.isDirectory()) return 'directory';
      return 'missing';
    } catch (error) {
      if (isMissingPathError(error)) return 'missing';
      throw error;
    }
  }

  /**
   * Supported files at any depth, sorted by full path.
   */
  async listSupportedFiles(directory: string): Promise<Result<string[], ListError>> {
    try {
      const files = await this.walk(directory);
      return ok(files.sort());
    } catch (error) {
      return err(new ListError(`Cannot list ${directory}: ${describeError(error)}`, { cause: error }));
    }
  }

  private async walk(directory: string): Promise<string[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (entry.isFile() && this.isSupported(entry.name)) {
        files.push(fullPath);
      }
    }

    return files;
  }
}
