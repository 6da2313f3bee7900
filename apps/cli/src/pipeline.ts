/**
 * Generation Pipeline
 *
 * Flow:
 * 1. Load the persist configuration (batch) or a column list (legacy)
 * 2. Render every artifact in memory
 * 3. Format every artifact in memory
 * 4. Write all files
 *
 * Nothing is written until every table has rendered and formatted, so a
 * failing table leaves no output from earlier tables behind.
 */

import { resolve } from 'node:path';
import {
  OutputError,
  createChildLogger,
  type BatchFileWriteResult,
  type GeneratedArtifact,
} from '@cqlgen/shared';
import { generate, parseLegacyColumns, parsePersistConfig, type PersistConfig } from '@cqlgen/core';
import { locateFile, readBoilerplate, readJsonDocument } from './config-file.js';
import { FileManager } from './file-manager.js';
import { SourceFormatter } from './formatter.js';

const logger = createChildLogger({ component: 'Pipeline' });

export interface LegacyModeOptions {
  model: string;
  dao: string;
  keyspace: string;
  targetPackage: string;
}

export interface PipelineOptions {
  /** Directory schema files and relative paths are resolved against */
  cwd: string;
  /** Batch-mode schema file name */
  configFile: string;
  /** Fallback directory searched for schema files */
  configDir: string;
  /** Output root, relative to cwd */
  outputDir: string;
  format: boolean;
  /** Single-table mode; batch mode when absent */
  legacy?: LegacyModeOptions;
}

export async function loadPersistConfig(options: PipelineOptions): Promise<PersistConfig> {
  if (options.legacy) {
    const path = await locateFile(`${options.legacy.model}.json`, options.cwd, options.configDir);
    return parseLegacyColumns(await readJsonDocument(path), options.legacy);
  }

  const path = await locateFile(options.configFile, options.cwd, options.configDir);
  return parsePersistConfig(await readJsonDocument(path));
}

/**
 * Render and format every artifact without touching the output directory
 */
export async function renderArtifacts(options: PipelineOptions): Promise<GeneratedArtifact[]> {
  const config = await loadPersistConfig(options);
  const boilerplate = config.boilerplatePath ? await readBoilerplate(config.boilerplatePath, options.cwd) : undefined;

  const result = generate(config, { boilerplate });
  if (!result.success) {
    throw result.error;
  }

  if (!options.format) {
    return result.value;
  }
  return new SourceFormatter().formatAll(result.value);
}

export async function runPipeline(options: PipelineOptions): Promise<BatchFileWriteResult> {
  const artifacts = await renderArtifacts(options);

  const outputRoot = resolve(options.cwd, options.outputDir);
  const writeResult = await new FileManager(outputRoot).writeFiles(artifacts);

  if (!writeResult.success) {
    throw new OutputError(
      `Failed to write ${writeResult.failed.length} of ${artifacts.length} files: ${writeResult.failed
        .map((f) => `${f.path} (${f.error})`)
        .join(', ')}`,
      { written: writeResult.written, failed: writeResult.failed }
    );
  }

  logger.info({ files: writeResult.written.length, outputRoot }, 'Generated files written');
  return writeResult;
}
