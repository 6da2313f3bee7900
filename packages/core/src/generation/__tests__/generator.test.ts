/**
 * DAO Generator Tests
 */
import { describe, it, expect } from 'vitest';
import { ConfigurationError, TemplateError } from '@cqlgen/shared';
import { generate } from '../generator.js';
import { parsePersistConfig } from '../schema-loader.js';

const userTable = {
  modelName: 'User',
  tableName: 'users',
  dao: 'UserDao',
  generatedName: 'User',
  columns: [
    { name: 'id', type: 'uuid', key: 'partition' },
    { name: 'email', type: 'text' },
    { name: 'createdAt', type: 'timestamp' },
  ],
};

const sessionTable = {
  modelName: 'Session',
  tableName: 'sessions',
  dao: 'SessionDao',
  generatedName: 'UserSession',
  columns: [
    { name: 'userId', type: 'uuid', key: 'partition' },
    { name: 'startedAt', type: 'timestamp', key: 'cluster-desc' },
    { name: 'scopes', type: 'set<text>' },
  ],
};

describe('DaoGenerator', () => {
  it('should render one DAO per table without model generation', () => {
    const result = generate(parsePersistConfig({ keyspace: 'app', package: 'dao', tables: [userTable, sessionTable] }));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.map((a) => [a.kind, a.table, a.path])).toEqual([
        ['dao', 'users', 'user-dao.gen.ts'],
        ['dao', 'sessions', 'usersession-dao.gen.ts'],
      ]);
      expect(result.value[0]?.content).toContain('export class UserDao {');
    }
  });

  it('should render DTOs into the model location', () => {
    const result = generate(
      parsePersistConfig({
        keyspace: 'app',
        package: 'dao',
        modelPackage: 'models',
        ModelGeneration: { Package: 'models', Location: 'src/models' },
        tables: [userTable],
      })
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.map((a) => a.path)).toEqual(['user-dao.gen.ts', 'src/models/user-dto.gen.ts']);
      expect(result.value[1]?.kind).toBe('dto');
      expect(result.value[1]?.content).toContain('export interface User {');
      expect(result.value[0]?.content).toContain('export type UserStream = StreamRecord<models.User>;');
    }
  });

  it('should splice the boilerplate into every DAO', () => {
    const result = generate(parsePersistConfig({ keyspace: 'app', tables: [userTable, sessionTable] }), {
      boilerplate: '// boilerplate for {{dao}}',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value[0]?.content).toContain('// boilerplate for UserDao\n\nexport type UserStream');
      expect(result.value[1]?.content).toContain('// boilerplate for SessionDao\n\nexport type SessionStream');
    }
  });

  it('should fail the whole run when a later table has no partition key', () => {
    const broken = { ...sessionTable, columns: [{ name: 'userId', type: 'uuid', key: 'cluster' }] };
    const result = generate(parsePersistConfig({ keyspace: 'app', tables: [userTable, broken] }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.message).toBe('Table sessions has no partition key');
    }
  });

  it('should report template failures as a failed result', () => {
    const result = generate(parsePersistConfig({ keyspace: 'app', tables: [userTable] }), {
      boilerplate: '{{unknownField}}',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(TemplateError);
      expect(result.error.context.table).toBe('users');
    }
  });

  it('should produce byte-identical output across runs', () => {
    const config = parsePersistConfig({
      keyspace: 'app',
      ModelGeneration: { Package: 'models', Location: 'models' },
      tables: [userTable, sessionTable],
    });

    const first = generate(config);
    const second = generate(config);

    expect(first).toEqual(second);
  });
});
