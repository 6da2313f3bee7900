/**
 * File Manager
 * Handles writing generated files to disk
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import {
  createChildLogger,
  type BatchFileWriteResult,
  type FileWriteResult,
  type GeneratedArtifact,
} from '@cqlgen/shared';

export class FileManager {
  private logger = createChildLogger({ component: 'FileManager' });
  private baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  /**
   * Write a single file to disk
   */
  async writeFile(file: GeneratedArtifact): Promise<FileWriteResult> {
    const fullPath = join(this.baseDir, file.path);

    try {
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, file.content, 'utf-8');

      this.logger.debug({ path: file.path, table: file.table }, 'File written');

      return {
        success: true,
        path: fullPath,
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error({ error: errorMessage, path: file.path }, 'Failed to write file');

      return {
        success: false,
        path: fullPath,
        error: errorMessage,
      };
    }
  }

  /**
   * Write multiple files to disk, in order
   */
  async writeFiles(files: readonly GeneratedArtifact[]): Promise<BatchFileWriteResult> {
    this.logger.info({ fileCount: files.length, baseDir: this.baseDir }, 'Writing files to disk');

    const written: string[] = [];
    const failed: Array<{ path: string; error: string }> = [];

    for (const file of files) {
      const result = await this.writeFile(file);

      if (result.success) {
        written.push(result.path);
      } else {
        failed.push({
          path: result.path,
          error: result.error ?? 'Unknown error',
        });
      }
    }

    this.logger.info({
      written: written.length,
      failed: failed.length,
    }, 'File write operation complete');

    return {
      success: failed.length === 0,
      written,
      failed,
    };
  }
}
