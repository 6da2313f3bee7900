/**
 * DAO Generation Pipeline
 */

export { generate, daoFileName, dtoFileName } from './generator.js';

export { parsePersistConfig, parseLegacyColumns } from './schema-loader.js';
export type { LegacyTableOptions } from './schema-loader.js';

export { mapStorageType, mergeImports, UNKNOWN_TYPE } from './type-mapper.js';
export { buildKeyStructure } from './key-structure.js';
export { buildEmissionModel, lowerFirst } from './emission-model.js';
export { renderDao, renderDto, renderTemplate } from './template-renderer.js';

export type {
  KeyRole,
  ColumnDefinition,
  TableDefinition,
  ModelGenerationTarget,
  PersistConfig,
  ImportFlags,
  CollectionKind,
  TypeMapping,
  KeyStructure,
  ColumnEmission,
  EmissionModel,
  GenerateOptions,
  GeneratedArtifact,
} from './types.js';

export { KEY_ROLES, NO_IMPORTS, DEFAULT_RUNTIME_MODULE } from './types.js';
