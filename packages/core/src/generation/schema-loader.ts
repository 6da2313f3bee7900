/**
 * Schema Loader
 * Validates a parsed persist configuration document and turns it into a PersistConfig
 */

import { z } from 'zod';
import { ConfigurationError, createChildLogger } from '@cqlgen/shared';
import {
  DEFAULT_RUNTIME_MODULE,
  KEY_ROLES,
  type ColumnDefinition,
  type KeyRole,
  type PersistConfig,
  type TableDefinition,
} from './types.js';

const logger = createChildLogger({ component: 'SchemaLoader' });

const IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;
const TYPE_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*(\.[A-Za-z_$][A-Za-z0-9_$]*)*$/;

const identifier = (what: string) =>
  z.string().regex(IDENTIFIER, `${what} must be an identifier starting with a letter`);

const columnSchema = z.object({
  name: identifier('Column name'),
  type: z.string().trim().min(1, 'Column type is required'),
  key: z.string().optional(),
  deserializeTo: z
    .string()
    .optional()
    .refine((value) => !value || TYPE_NAME.test(value), 'deserializeTo must be a type name'),
});

const tableSchema = z.object({
  modelName: identifier('modelName'),
  tableName: identifier('tableName'),
  dao: identifier('dao'),
  generatedName: z.string().regex(/^[A-Za-z0-9_-]+$/, 'generatedName must be a file-name-safe word'),
  columns: z.array(columnSchema).default([]),
});

const persistSchema = z.object({
  keyspace: identifier('keyspace'),
  package: z.string().default(''),
  boilerplate: z.string().optional(),
  imports: z.array(z.string().trim().min(1)).default([]),
  modelPackage: z
    .string()
    .optional()
    .refine((value) => !value || IDENTIFIER.test(value), 'modelPackage must be an identifier'),
  runtime: z.string().min(1).optional(),
  ModelGeneration: z
    .object({
      Package: z.string().default(''),
      Location: z.string().default('.'),
      Imports: z.array(z.string().trim().min(1)).default([]),
    })
    .nullish(),
  tables: z.array(tableSchema).default([]),
});

type RawColumn = z.infer<typeof columnSchema>;
type RawTable = z.infer<typeof tableSchema>;

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}

function toKeyRole(column: RawColumn, table: string): KeyRole {
  const key = column.key?.trim() ?? '';
  if (key === '') {
    return 'none';
  }

  const role = KEY_ROLES.find((r) => r === key);
  if (role) {
    return role;
  }

  logger.warn({ table, column: column.name, key }, 'Unrecognized key role, treating column as a regular column');
  return 'none';
}

function toColumns(raw: readonly RawColumn[], table: string): ColumnDefinition[] {
  if (raw.length === 0) {
    throw new ConfigurationError(`Table ${table} had no columns defined`, { table });
  }

  const seen = new Set<string>();
  return raw.map((column) => {
    if (seen.has(column.name)) {
      throw new ConfigurationError(`Table ${table} defines column ${column.name} more than once`, { table });
    }
    seen.add(column.name);

    return {
      name: column.name,
      storageType: column.type,
      keyRole: toKeyRole(column, table),
      deserializeTarget: column.deserializeTo ?? '',
    };
  });
}

function toTable(raw: RawTable): TableDefinition {
  return {
    modelName: raw.modelName,
    tableName: raw.tableName,
    daoName: raw.dao,
    generatedArtifactName: raw.generatedName,
    columns: toColumns(raw.columns, raw.tableName),
  };
}

/**
 * Validate a parsed persist configuration document (batch mode)
 */
export function parsePersistConfig(document: unknown): PersistConfig {
  if (document === null || document === undefined) {
    throw new ConfigurationError('Persist configuration is empty');
  }

  const parsed = persistSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid persist configuration: ${describeIssues(parsed.error)}`);
  }

  const raw = parsed.data;
  if (raw.tables.length === 0) {
    throw new ConfigurationError('At least one table must be defined');
  }

  const config: PersistConfig = {
    keyspace: raw.keyspace,
    targetPackage: raw.package,
    boilerplatePath: raw.boilerplate || undefined,
    additionalImports: raw.imports,
    modelImportAlias: raw.modelPackage ?? '',
    runtimeModule: raw.runtime ?? DEFAULT_RUNTIME_MODULE,
    modelGeneration: raw.ModelGeneration
      ? {
          package: raw.ModelGeneration.Package,
          location: raw.ModelGeneration.Location,
          imports: raw.ModelGeneration.Imports,
        }
      : undefined,
    tables: raw.tables.map(toTable),
  };

  logger.debug({ keyspace: config.keyspace, tableCount: config.tables.length }, 'Persist configuration loaded');
  return config;
}

/**
 * Options for the single-table legacy mode
 */
export interface LegacyTableOptions {
  model: string;
  dao: string;
  keyspace: string;
  targetPackage: string;
}

/**
 * Build a one-table PersistConfig from a column list document (legacy `<model>.json`)
 */
export function parseLegacyColumns(document: unknown, options: LegacyTableOptions): PersistConfig {
  const parsed = z.array(columnSchema).safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid column list for ${options.model}: ${describeIssues(parsed.error)}`);
  }

  return parsePersistConfig({
    keyspace: options.keyspace,
    package: options.targetPackage,
    tables: [
      {
        modelName: options.model,
        tableName: options.model.toLowerCase(),
        dao: options.dao,
        generatedName: options.model,
        columns: parsed.data,
      },
    ],
  });
}
