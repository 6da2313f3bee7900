/**
 * Schema Loader Tests
 */
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@cqlgen/shared';
import { parseLegacyColumns, parsePersistConfig } from '../schema-loader.js';

const validDocument = {
  keyspace: 'shop',
  package: 'dao',
  imports: ["import * as models from '../models/index.js';"],
  modelPackage: 'models',
  ModelGeneration: { Package: 'models', Location: 'models' },
  tables: [
    {
      modelName: 'Order',
      tableName: 'orders',
      dao: 'OrderDao',
      generatedName: 'Order',
      columns: [
        { name: 'id', type: 'uuid', key: 'partition' },
        { name: 'placedAt', type: 'timestamp', key: 'cluster-desc' },
        { name: 'lines', type: 'list<blob>', deserializeTo: 'models.Line' },
      ],
    },
  ],
};

describe('SchemaLoader', () => {
  describe('parsePersistConfig', () => {
    it('should map document keys onto the persist config', () => {
      const config = parsePersistConfig(validDocument);

      expect(config.keyspace).toBe('shop');
      expect(config.targetPackage).toBe('dao');
      expect(config.additionalImports).toEqual(["import * as models from '../models/index.js';"]);
      expect(config.modelImportAlias).toBe('models');
      expect(config.runtimeModule).toBe('@cqlgen/runtime');
      expect(config.boilerplatePath).toBeUndefined();
      expect(config.modelGeneration).toEqual({ package: 'models', location: 'models', imports: [] });
    });

    it('should map table and column keys', () => {
      const [table] = parsePersistConfig(validDocument).tables;

      expect(table?.daoName).toBe('OrderDao');
      expect(table?.generatedArtifactName).toBe('Order');
      expect(table?.columns).toEqual([
        { name: 'id', storageType: 'uuid', keyRole: 'partition', deserializeTarget: '' },
        { name: 'placedAt', storageType: 'timestamp', keyRole: 'cluster-desc', deserializeTarget: '' },
        { name: 'lines', storageType: 'list<blob>', keyRole: 'none', deserializeTarget: 'models.Line' },
      ]);
    });

    it('should leave model generation unset when absent', () => {
      const withoutModels = { ...validDocument, ModelGeneration: undefined };
      expect(parsePersistConfig(withoutModels).modelGeneration).toBeUndefined();
      expect(parsePersistConfig({ ...validDocument, ModelGeneration: null }).modelGeneration).toBeUndefined();
    });

    it('should reject an empty document', () => {
      expect(() => parsePersistConfig(null)).toThrow('Persist configuration is empty');
    });

    it('should reject a configuration without tables', () => {
      expect(() => parsePersistConfig({ keyspace: 'shop', tables: [] })).toThrow(
        'At least one table must be defined'
      );
    });

    it('should reject a table without columns', () => {
      const document = {
        keyspace: 'shop',
        tables: [{ modelName: 'Empty', tableName: 'empty', dao: 'EmptyDao', generatedName: 'Empty', columns: [] }],
      };

      expect(() => parsePersistConfig(document)).toThrow('Table empty had no columns defined');
    });

    it('should reject duplicate column names', () => {
      const document = {
        keyspace: 'shop',
        tables: [
          {
            modelName: 'Dup',
            tableName: 'dup',
            dao: 'DupDao',
            generatedName: 'Dup',
            columns: [
              { name: 'id', type: 'uuid', key: 'partition' },
              { name: 'id', type: 'text' },
            ],
          },
        ],
      };

      expect(() => parsePersistConfig(document)).toThrow('Table dup defines column id more than once');
    });

    it('should reject column names that do not start with a letter', () => {
      const document = {
        ...validDocument,
        tables: [
          {
            modelName: 'Order',
            tableName: 'orders',
            dao: 'OrderDao',
            generatedName: 'Order',
            columns: [{ name: '_record', type: 'text', key: 'partition' }],
          },
        ],
      };

      expect(() => parsePersistConfig(document)).toThrow(ConfigurationError);
    });

    it('should reject a deserialize target that is not a type name', () => {
      const document = {
        keyspace: 'shop',
        tables: [
          {
            modelName: 'Order',
            tableName: 'orders',
            dao: 'OrderDao',
            generatedName: 'Order',
            columns: [
              { name: 'id', type: 'uuid', key: 'partition' },
              { name: 'lines', type: 'list<blob>', deserializeTo: 'Line; drop' },
            ],
          },
        ],
      };

      expect(() => parsePersistConfig(document)).toThrow('deserializeTo must be a type name');
    });

    it('should treat an unrecognized key role as a regular column', () => {
      const document = {
        keyspace: 'shop',
        tables: [
          {
            modelName: 'Order',
            tableName: 'orders',
            dao: 'OrderDao',
            generatedName: 'Order',
            columns: [
              { name: 'id', type: 'uuid', key: 'partition' },
              { name: 'note', type: 'text', key: 'primary' },
            ],
          },
        ],
      };

      expect(parsePersistConfig(document).tables[0]?.columns[1]?.keyRole).toBe('none');
    });

    it('should read model generation imports and a custom runtime module', () => {
      const config = parsePersistConfig({
        ...validDocument,
        runtime: '../runtime/index.js',
        boilerplate: 'templates/provider.hbs',
        ModelGeneration: { Package: 'models', Location: 'models', Imports: ["import type { Line } from './line.js';"] },
      });

      expect(config.runtimeModule).toBe('../runtime/index.js');
      expect(config.boilerplatePath).toBe('templates/provider.hbs');
      expect(config.modelGeneration?.imports).toEqual(["import type { Line } from './line.js';"]);
    });
  });

  describe('parseLegacyColumns', () => {
    it('should build a single-table config from a column list', () => {
      const config = parseLegacyColumns(
        [
          { name: 'id', type: 'uuid', key: 'partition' },
          { name: 'title', type: 'text' },
        ],
        { model: 'Note', dao: 'NoteDao', keyspace: 'app', targetPackage: 'dao' }
      );

      expect(config.keyspace).toBe('app');
      expect(config.tables).toHaveLength(1);
      expect(config.tables[0]?.tableName).toBe('note');
      expect(config.tables[0]?.modelName).toBe('Note');
      expect(config.tables[0]?.generatedArtifactName).toBe('Note');
      expect(config.tables[0]?.columns.map((c) => c.name)).toEqual(['id', 'title']);
    });

    it('should reject a document that is not a column list', () => {
      expect(() =>
        parseLegacyColumns({ columns: [] }, { model: 'Note', dao: 'NoteDao', keyspace: 'app', targetPackage: 'dao' })
      ).toThrow('Invalid column list for Note');
    });
  });
});
