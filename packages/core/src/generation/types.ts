/**
 * Types for the DAO generation pipeline
 */

import type { GeneratedArtifact } from '@cqlgen/shared';

// Re-export types from shared for convenience
export type { GeneratedArtifact };

/**
 * Role a column plays in the primary key
 * - 'partition': part of the partition key
 * - 'cluster': clustering column without an explicit sort order
 * - 'cluster-asc' / 'cluster-desc': clustering column with an explicit order
 */
export type KeyRole = 'none' | 'partition' | 'cluster' | 'cluster-asc' | 'cluster-desc';

export const KEY_ROLES: readonly KeyRole[] = ['none', 'partition', 'cluster', 'cluster-asc', 'cluster-desc'];

export interface ColumnDefinition {
  /** Column name, also the generated field name */
  readonly name: string;
  /** CQL type as declared (e.g. `text`, `list<blob>`) */
  readonly storageType: string;
  readonly keyRole: KeyRole;
  /** Type each blob element deserializes to; empty when unused */
  readonly deserializeTarget: string;
}

export interface TableDefinition {
  readonly modelName: string;
  readonly tableName: string;
  readonly daoName: string;
  /** Base name of the generated files */
  readonly generatedArtifactName: string;
  readonly columns: readonly ColumnDefinition[];
}

/**
 * Where DTO modules are generated
 */
export interface ModelGenerationTarget {
  /** Module name recorded in the DTO header */
  readonly package: string;
  /** Directory (relative to the output root) DTO files are written to */
  readonly location: string;
  /** Verbatim import declarations added to every DTO module */
  readonly imports: readonly string[];
}

export interface PersistConfig {
  readonly keyspace: string;
  /** Module name recorded in the DAO header */
  readonly targetPackage: string;
  readonly boilerplatePath?: string;
  /** Verbatim import declarations added to every DAO module */
  readonly additionalImports: readonly string[];
  /** Namespace the DTO module is imported under in DAO modules; empty for none */
  readonly modelImportAlias: string;
  /** Module generated DAOs import their support code from */
  readonly runtimeModule: string;
  readonly modelGeneration?: ModelGenerationTarget;
  readonly tables: readonly TableDefinition[];
}

export const DEFAULT_RUNTIME_MODULE = '@cqlgen/runtime';

/**
 * Imports a column (or a whole table) requires in generated code
 */
export interface ImportFlags {
  /** Timestamp coercion (`toTimestamp`) of a standalone timestamp column */
  readonly time: boolean;
  /** Element encode/decode for blob collections */
  readonly serialization: boolean;
  /** `types` namespace from cassandra-driver (Uuid) */
  readonly identifier: boolean;
}

export const NO_IMPORTS: ImportFlags = {
  time: false,
  serialization: false,
  identifier: false,
};

/**
 * Collection shape of a mapped column
 */
export type CollectionKind = 'none' | 'list' | 'set' | 'map';

export interface TypeMapping {
  /** TypeScript type of the raw column value; `unknown` when unrecognized */
  readonly targetType: string;
  /** Deserialize target for blob collections; empty otherwise */
  readonly serializedElementType: string;
  readonly collection: CollectionKind;
  /** False when no mapping rule matched */
  readonly recognized: boolean;
  readonly imports: ImportFlags;
}

/**
 * Key structure derived from a table's columns, with the CQL fragments built from it
 */
export interface KeyStructure {
  readonly partitionKeys: readonly string[];
  readonly clusteringKeys: readonly string[];
  /** `name ASC|DESC` entries for explicitly ordered clustering columns */
  readonly clusteringOrder: readonly string[];
  /** Partition and clustering keys, in column order */
  readonly allKeys: readonly string[];
  readonly partitionKeyClause: string;
  readonly clusteringColumnsClause: string;
  readonly clusteringOrderClause: string;
  readonly allKeysClause: string;
  readonly allKeysEquality: string;
  readonly partitionKeysClause: string;
  readonly partitionKeysEquality: string;
}

/**
 * Per-column rendering context
 */
export interface ColumnEmission {
  readonly name: string;
  readonly storageType: string;
  readonly targetType: string;
  readonly serializedElementType: string;
  readonly serialized: boolean;
  readonly collection: CollectionKind;
  /** `    name storageType` line of the CREATE TABLE statement */
  readonly definition: string;
  /** Reads the raw column value off `_row` by select-list position */
  readonly scanDeclaration: string;
  /** Property initializer of the resource built from a row */
  readonly resourceField: string;
  /** Bound value for the INSERT statement */
  readonly insertReference: string;
  /** Lower-camel serialization tag */
  readonly jsonTag: string;
  /** DTO property declaration */
  readonly dtoField: string;
  /** Rebuilds deserialize-target values from the raw bytes; empty if not serialized */
  readonly deserializeBlock: string;
  /** Encodes the record field before insert; empty if not serialized */
  readonly serializeBlock: string;
}

/**
 * Fully resolved per-table rendering context
 */
export interface EmissionModel {
  readonly keyspace: string;
  readonly targetPackage: string;
  readonly modelPackage: string;
  readonly table: string;
  readonly model: string;
  readonly dao: string;
  /** Model type as referenced from the DAO (alias-qualified when configured) */
  readonly modelType: string;
  readonly streamType: string;
  /** Name of the generated `<model>ToJson` function */
  readonly toJsonName: string;
  readonly runtimeModule: string;
  /** Named imports taken from the runtime module */
  readonly runtimeImports: string;
  readonly additionalImports: readonly string[];
  /** Import declarations for DTO modules */
  readonly modelImports: readonly string[];
  readonly imports: ImportFlags;
  readonly columns: readonly ColumnEmission[];
  readonly keys: KeyStructure;
  readonly tableDefinition: string;
  readonly selectFields: string;
  readonly insertFields: string;
  readonly insertValues: string;
  readonly insertParams: string;
  readonly deleteParams: string;
  /** Typed parameter list for full-key lookups */
  readonly allKeysParams: string;
  /** Typed parameter list for partition-scoped operations */
  readonly partitionKeysParams: string;
  readonly serializeBlock: string;
  readonly deserializeBlock: string;
  /** Source table definition, formatted for the header comment */
  readonly sourceJson: string;
}

/**
 * Options for a generation run
 */
export interface GenerateOptions {
  /** Boilerplate template text spliced into every DAO */
  boilerplate?: string;
}

export type { Result } from '@cqlgen/shared';
