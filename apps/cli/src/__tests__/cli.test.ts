/**
 * CLI Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, run } from '../cli.js';
import { USAGE } from '../args.js';

describe('cqlgen CLI', () => {
  let cwd: string;
  const print = vi.fn((_text: string) => undefined);

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'cqlgen-cli-'));
    print.mockReset();
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('should print usage for --help', async () => {
    expect(await run(['--help'], { cwd, print })).toBe(EXIT_SUCCESS);
    expect(print).toHaveBeenCalledWith(USAGE);
  });

  it('should exit with 2 on bad flags', async () => {
    expect(await run(['--nope'], { cwd, print })).toBe(EXIT_USAGE);
    expect(print).toHaveBeenCalledWith(USAGE);
  });

  it('should exit with 1 when the schema file is missing', async () => {
    expect(await run([], { cwd, print })).toBe(EXIT_FAILURE);
  });

  it('should generate in batch mode', async () => {
    await writeFile(
      join(cwd, 'persist-config.json'),
      JSON.stringify({
        keyspace: 'app',
        tables: [
          {
            modelName: 'Note',
            tableName: 'notes',
            dao: 'NoteDao',
            generatedName: 'Note',
            columns: [{ name: 'id', type: 'uuid', key: 'partition' }],
          },
        ],
      }),
      'utf-8'
    );

    expect(await run(['--out', 'gen'], { cwd, print })).toBe(EXIT_SUCCESS);
    expect(await readFile(join(cwd, 'gen', 'note-dao.gen.ts'), 'utf-8')).toContain('export class NoteDao {');
  });

  it('should generate in legacy mode without formatting', async () => {
    await writeFile(
      join(cwd, 'Item.json'),
      JSON.stringify([
        { name: 'sku', type: 'text', key: 'partition' },
        { name: 'price', type: 'double' },
      ]),
      'utf-8'
    );

    const code = await run(['--model', 'Item', '--dao', 'ItemDao', '--keyspace', 'store', '--no-format'], { cwd, print });

    expect(code).toBe(EXIT_SUCCESS);
    const dao = await readFile(join(cwd, 'item-dao.gen.ts'), 'utf-8');
    expect(dao).toContain('CREATE TABLE IF NOT EXISTS store.item (');
    expect(dao).toContain('/** @module dao */');
  });
});
