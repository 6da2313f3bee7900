/**
 * Generation Cycle E2E Tests
 * Runs the CLI against a complete project fixture and inspects the written modules
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { cp, mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { EXIT_SUCCESS, run } from '../../apps/cli/src/cli.js';
import { SourceFormatter } from '../../apps/cli/src/formatter.js';

const fixture = fileURLToPath(new URL('../fixtures/shop', import.meta.url));

describe('Generation cycle (E2E)', () => {
  let cwd: string;
  let exitCode: number;

  beforeAll(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'cqlgen-e2e-'));
    await cp(fixture, cwd, { recursive: true });
    exitCode = await run(['--out', 'generated'], { cwd, print: () => undefined });
  });

  afterAll(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('should exit successfully', () => {
    expect(exitCode).toBe(EXIT_SUCCESS);
  });

  it('should write one DAO per table and the DTOs beside the models', async () => {
    expect((await readdir(join(cwd, 'generated'))).sort()).toEqual(['models', 'user-dao.gen.ts', 'uservisit-dao.gen.ts']);
    expect((await readdir(join(cwd, 'generated', 'models'))).sort()).toEqual(['user-dto.gen.ts', 'uservisit-dto.gen.ts']);
  });

  it('should splice the session provider before the stream type', async () => {
    const dao = await readFile(join(cwd, 'generated', 'user-dao.gen.ts'), 'utf-8');

    const provider = dao.indexOf('export const UserSessions: SessionProvider');
    const streamType = dao.indexOf('export type UserStream');
    expect(provider).toBeGreaterThan(0);
    expect(streamType).toBeGreaterThan(provider);
    expect(dao).toContain("keyspace: 'shop'");
  });

  it('should write modules that parse', async () => {
    const formatter = new SourceFormatter();
    for (const path of ['user-dao.gen.ts', 'uservisit-dao.gen.ts', 'models/user-dto.gen.ts', 'models/uservisit-dto.gen.ts']) {
      const source = await readFile(join(cwd, 'generated', path), 'utf-8');
      expect(formatter.check(source, path)).toEqual([]);
    }
  });

  it('should order clustering columns as declared', async () => {
    const dao = await readFile(join(cwd, 'generated', 'uservisit-dao.gen.ts'), 'utf-8');

    expect(dao).toContain('PRIMARY KEY ((userId, day), at, path)');
    expect(dao).toContain('WITH CLUSTERING ORDER BY (at DESC)');
    expect(dao).toContain("'DELETE FROM shop.visits WHERE userId=? AND day=? AND at=? AND path=?'");
  });

  it('should type serialized DTO fields with the deserialize target', async () => {
    const dto = await readFile(join(cwd, 'generated', 'models', 'uservisit-dto.gen.ts'), 'utf-8');

    expect(dto).toContain("import type { Tag } from './tag.js';");
    expect(dto).toMatch(/attrs: Record<string, Tag>;/);
  });
});
