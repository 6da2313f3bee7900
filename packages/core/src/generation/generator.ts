/**
 * DAO Generator
 * Runs the schema -> emission model -> template pipeline for every table, in order
 */

import { posix } from 'node:path';
import {
  createChildLogger,
  logArtifactRendered,
  wrapError,
  type CqlGenError,
  type GeneratedArtifact,
  type Result,
} from '@cqlgen/shared';
import { buildEmissionModel } from './emission-model.js';
import { renderDao, renderDto } from './template-renderer.js';
import type { GenerateOptions, PersistConfig, TableDefinition } from './types.js';

const logger = createChildLogger({ component: 'DaoGenerator' });

export function daoFileName(table: TableDefinition): string {
  return `${table.generatedArtifactName.toLowerCase()}-dao.gen.ts`;
}

export function dtoFileName(table: TableDefinition, location: string): string {
  return posix.join(location, `${table.generatedArtifactName.toLowerCase()}-dto.gen.ts`);
}

function generateTable(
  config: PersistConfig,
  table: TableDefinition,
  boilerplate: string | undefined
): GeneratedArtifact[] {
  const model = buildEmissionModel(config, table);
  const artifacts: GeneratedArtifact[] = [];

  const dao: GeneratedArtifact = {
    kind: 'dao',
    table: table.tableName,
    path: daoFileName(table),
    content: renderDao(model, boilerplate),
  };
  artifacts.push(dao);
  logArtifactRendered(dao.table, dao.kind, dao.path, Buffer.byteLength(dao.content));

  if (config.modelGeneration) {
    const dto: GeneratedArtifact = {
      kind: 'dto',
      table: table.tableName,
      path: dtoFileName(table, config.modelGeneration.location),
      content: renderDto(model),
    };
    artifacts.push(dto);
    logArtifactRendered(dto.table, dto.kind, dto.path, Buffer.byteLength(dto.content));
  }

  return artifacts;
}

/**
 * Render every artifact for the configuration. Tables are processed in
 * configuration order; the first failure ends the run and nothing rendered so
 * far is returned.
 */
export function generate(
  config: PersistConfig,
  options: GenerateOptions = {}
): Result<GeneratedArtifact[], CqlGenError> {
  const artifacts: GeneratedArtifact[] = [];

  for (const table of config.tables) {
    try {
      artifacts.push(...generateTable(config, table, options.boilerplate));
    } catch (error) {
      const wrapped = wrapError(error, { table: table.tableName });
      logger.error({ table: table.tableName, code: wrapped.code, error: wrapped.message }, 'Generation failed');
      return { success: false, error: wrapped };
    }
  }

  logger.info({ tables: config.tables.length, artifacts: artifacts.length }, 'Generation complete');
  return { success: true, value: artifacts };
}
