/**
 * Emission Model Builder
 * Combines key structure and mapped column types into the per-table rendering context
 */

import { createChildLogger } from '@cqlgen/shared';
import { buildKeyStructure } from './key-structure.js';
import { mapStorageType, mergeImports } from './type-mapper.js';
import type {
  ColumnDefinition,
  ColumnEmission,
  EmissionModel,
  ImportFlags,
  PersistConfig,
  TableDefinition,
  TypeMapping,
} from './types.js';

const logger = createChildLogger({ component: 'EmissionModelBuilder' });

export function lowerFirst(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

/**
 * DTO modules live beside the model types, so the alias prefix is dropped there
 */
function stripAlias(typeName: string, alias: string): string {
  const prefix = `${alias}.`;
  return alias !== '' && typeName.startsWith(prefix) ? typeName.slice(prefix.length) : typeName;
}

function emptyValue(mapping: TypeMapping): string {
  return mapping.collection === 'map' ? ' ?? {}' : mapping.collection === 'none' ? '' : ' ?? []';
}

/**
 * Cells are read by position in the select list: unquoted identifiers come back
 * lower-cased in the result metadata, so reading by name misses mixed-case columns
 */
function scanDeclaration(column: ColumnDefinition, position: number, mapping: TypeMapping): string {
  const read = `_row.get(${position})`;
  if (mapping.targetType === 'Date | null') {
    return `const ${column.name}: Date | null = toTimestamp(${read});`;
  }
  return `const ${column.name}: ${mapping.targetType} = ${read}${emptyValue(mapping)};`;
}

function deserializeBlock(column: ColumnDefinition, mapping: TypeMapping): string {
  const { name } = column;
  const target = mapping.serializedElementType;

  if (mapping.collection === 'list') {
    return [
      `    for (const _v of ${name}) {`,
      `      const _value = decodeElement<${target}>(_v);`,
      `      if (_value !== undefined) {`,
      `        _resource.${name}.push(_value);`,
      `      }`,
      `    }`,
    ].join('\n');
  }

  return [
    `    for (const [_k, _v] of Object.entries(${name})) {`,
    `      const _value = decodeElement<${target}>(_v);`,
    `      if (_value !== undefined) {`,
    `        _resource.${name}[_k] = _value;`,
    `      }`,
    `    }`,
  ].join('\n');
}

function serializeBlock(column: ColumnDefinition, mapping: TypeMapping): string {
  const { name } = column;

  if (mapping.collection === 'list') {
    return [
      `    const ${name}: Buffer[] = [];`,
      `    for (const _v of _record.${name}) {`,
      `      try {`,
      `        ${name}.push(encodeElement(_v));`,
      `      } catch (_err) {`,
      `        console.error('Could not marshal value:', _err, _v);`,
      `      }`,
      `    }`,
    ].join('\n');
  }

  return [
    `    const ${name}: Record<string, Buffer> = {};`,
    `    for (const [_k, _v] of Object.entries(_record.${name})) {`,
    `      try {`,
    `        ${name}[_k] = encodeElement(_v);`,
    `      } catch (_err) {`,
    `        console.error('Could not marshal attribute:', _k, _err, _v);`,
    `      }`,
    `    }`,
  ].join('\n');
}

function dtoType(mapping: TypeMapping, alias: string): string {
  if (mapping.serializedElementType === '') {
    return mapping.targetType;
  }

  const element = stripAlias(mapping.serializedElementType, alias);
  return mapping.collection === 'list' ? `${element}[]` : `Record<string, ${element}>`;
}

function buildColumn(
  table: string,
  column: ColumnDefinition,
  position: number,
  alias: string
): { emission: ColumnEmission; imports: ImportFlags } {
  const mapping = mapStorageType(column.storageType, column.deserializeTarget);
  const serialized = mapping.serializedElementType !== '';

  if (!mapping.recognized) {
    logger.warn({ table, column: column.name, storageType: column.storageType }, 'Unrecognized storage type, mapped to unknown');
  }
  if (column.deserializeTarget !== '' && !serialized) {
    logger.warn(
      { table, column: column.name, storageType: column.storageType },
      'deserializeTo is only honored on list<blob> and map<text,blob> columns'
    );
  }

  const emission: ColumnEmission = {
    name: column.name,
    storageType: column.storageType,
    targetType: mapping.targetType,
    serializedElementType: mapping.serializedElementType,
    serialized,
    collection: mapping.collection,
    definition: `    ${column.name} ${column.storageType}`,
    scanDeclaration: scanDeclaration(column, position, mapping),
    resourceField: serialized
      ? `${column.name}: ${mapping.collection === 'list' ? '[]' : '{}'}`
      : `${column.name}: ${column.name}`,
    insertReference: serialized ? column.name : `_record.${column.name}`,
    jsonTag: lowerFirst(column.name),
    dtoField: `${column.name}: ${dtoType(mapping, alias)}`,
    deserializeBlock: serialized ? deserializeBlock(column, mapping) : '',
    serializeBlock: serialized ? serializeBlock(column, mapping) : '',
  };

  return { emission, imports: mapping.imports };
}

function runtimeImports(imports: ImportFlags): string {
  const names = ['BoundedChannel', 'ChannelClosedError', 'toError', 'withSession'];
  if (imports.time) {
    names.push('toTimestamp');
  }
  if (imports.serialization) {
    names.push('decodeElement', 'encodeElement');
  }
  names.push('type SessionProvider', 'type StreamRecord');
  return names.join(', ');
}

function typedParams(keys: readonly string[], columns: readonly ColumnEmission[]): string {
  return keys
    .map((key) => {
      const column = columns.find((c) => c.name === key);
      return `${key}: ${column ? column.targetType : 'unknown'}`;
    })
    .join(', ');
}

/**
 * Build the rendering context for one table
 */
export function buildEmissionModel(config: PersistConfig, table: TableDefinition): EmissionModel {
  const keys = buildKeyStructure(table.tableName, table.columns);
  const built = table.columns.map((column, position) =>
    buildColumn(table.tableName, column, position, config.modelImportAlias)
  );
  const columns = built.map((b) => b.emission);
  const imports = mergeImports(built.map((b) => b.imports));
  const names = columns.map((c) => c.name);

  const modelType =
    config.modelImportAlias === '' ? table.modelName : `${config.modelImportAlias}.${table.modelName}`;

  const model: EmissionModel = {
    keyspace: config.keyspace,
    targetPackage: config.targetPackage,
    modelPackage: config.modelGeneration?.package ?? '',
    table: table.tableName,
    model: table.modelName,
    dao: table.daoName,
    modelType,
    streamType: `${table.modelName}Stream`,
    toJsonName: `${lowerFirst(table.modelName)}ToJson`,
    runtimeModule: config.runtimeModule,
    runtimeImports: runtimeImports(imports),
    additionalImports: [...config.additionalImports],
    modelImports: [...(config.modelGeneration?.imports ?? [])],
    imports,
    columns,
    keys,
    tableDefinition: columns.map((c) => c.definition).join(',\n'),
    selectFields: names.join(', '),
    insertFields: names.join(', '),
    insertValues: names.map(() => '?').join(', '),
    insertParams: columns.map((c) => c.insertReference).join(', '),
    deleteParams: keys.allKeys.map((k) => `_record.${k}`).join(', '),
    allKeysParams: typedParams(keys.allKeys, columns),
    partitionKeysParams: typedParams(keys.partitionKeys, columns),
    serializeBlock: columns
      .filter((c) => c.serialized)
      .map((c) => c.serializeBlock)
      .join('\n\n'),
    deserializeBlock: columns
      .filter((c) => c.serialized)
      .map((c) => c.deserializeBlock)
      .join('\n\n'),
    sourceJson: JSON.stringify(table, null, 2).replace(/\*\//g, '*\\/').split('\n').join('\n * '),
  };

  logger.debug(
    { table: model.table, columns: columns.length, partitionKeys: keys.partitionKeys.length },
    'Emission model built'
  );
  return model;
}
