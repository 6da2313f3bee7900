/**
 * Type Mapper - CQL storage types to TypeScript types
 *
 * Scalars and one level of `list<T>` / `set<T>` are mapped; `list<blob>` and
 * `map<text,blob>` may additionally carry a deserialize target. Anything else
 * maps to the `unknown` sentinel.
 */

import { NO_IMPORTS, type ImportFlags, type TypeMapping } from './types.js';

export const UNKNOWN_TYPE = 'unknown';

interface ScalarMapping {
  /** Type of a standalone column */
  column: string;
  /** Type of a collection element */
  element: string;
  imports: ImportFlags;
}

const SCALARS: Readonly<Record<string, ScalarMapping>> = {
  text: { column: 'string', element: 'string', imports: NO_IMPORTS },
  uuid: { column: 'types.Uuid', element: 'types.Uuid', imports: { ...NO_IMPORTS, identifier: true } },
  timeuuid: { column: 'types.Uuid', element: 'types.Uuid', imports: { ...NO_IMPORTS, identifier: true } },
  int: { column: 'number', element: 'number', imports: NO_IMPORTS },
  double: { column: 'number', element: 'number', imports: NO_IMPORTS },
  timestamp: { column: 'Date | null', element: 'Date', imports: { ...NO_IMPORTS, time: true } },
};

// Element types allowed inside list<T> / set<T>; blob is collection-only
const ELEMENTS: Readonly<Record<string, ScalarMapping>> = {
  ...SCALARS,
  blob: { column: 'Buffer', element: 'Buffer', imports: NO_IMPORTS },
};

const COLLECTION = /^(list|set)<([a-z]+)>$/;

function normalize(storageType: string): string {
  return storageType.replace(/\s+/g, '').toLowerCase();
}

function lookup(table: Readonly<Record<string, ScalarMapping>>, key: string): ScalarMapping | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function blobCollection(
  targetType: string,
  collection: 'list' | 'map',
  deserializeTarget: string
): TypeMapping {
  const serialized = deserializeTarget.trim();
  return {
    targetType,
    serializedElementType: serialized,
    collection,
    recognized: true,
    imports: { ...NO_IMPORTS, serialization: serialized !== '' },
  };
}

/**
 * Map a storage type (and optional deserialize target) to its TypeScript type
 * and the imports that type needs
 */
export function mapStorageType(storageType: string, deserializeTarget = ''): TypeMapping {
  const normalized = normalize(storageType);

  if (normalized === 'list<blob>') {
    return blobCollection('Buffer[]', 'list', deserializeTarget);
  }
  if (normalized === 'map<text,blob>') {
    return blobCollection('Record<string, Buffer>', 'map', deserializeTarget);
  }

  const scalar = lookup(SCALARS, normalized);
  if (scalar) {
    return {
      targetType: scalar.column,
      serializedElementType: '',
      collection: 'none',
      recognized: true,
      imports: scalar.imports,
    };
  }

  const match = COLLECTION.exec(normalized);
  const kind = match?.[1];
  const element = match?.[2] !== undefined ? lookup(ELEMENTS, match[2]) : undefined;
  if ((kind === 'list' || kind === 'set') && element) {
    return {
      targetType: `${element.element}[]`,
      serializedElementType: '',
      collection: kind,
      recognized: true,
      // Collection elements arrive as Date already; only standalone cells are coerced
      imports: { ...element.imports, time: false },
    };
  }

  return {
    targetType: UNKNOWN_TYPE,
    serializedElementType: '',
    collection: 'none',
    recognized: false,
    imports: NO_IMPORTS,
  };
}

/**
 * Union of import flags
 */
export function mergeImports(flags: readonly ImportFlags[]): ImportFlags {
  return flags.reduce<ImportFlags>(
    (acc, f) => ({
      time: acc.time || f.time,
      serialization: acc.serialization || f.serialization,
      identifier: acc.identifier || f.identifier,
    }),
    NO_IMPORTS
  );
}
