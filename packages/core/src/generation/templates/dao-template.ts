/**
 * DAO module template
 *
 * Rendered once per table against an EmissionModel, plus `boilerplate` (the
 * already-rendered boilerplate text, possibly empty). Compiled in strict mode
 * without HTML escaping.
 */

// =============================================================================
// HEADER + IMPORTS
// =============================================================================

const DAO_HEADER = `// Code generated by cqlgen; DO NOT EDIT.

/*
 * Model that generated this code:
 * {{sourceJson}}
 */
{{#if targetPackage}}

/** @module {{targetPackage}} */
{{/if}}

import type { Client, types } from 'cassandra-driver';
import { {{runtimeImports}} } from '{{runtimeModule}}';
{{#each additionalImports}}
{{this}}
{{/each}}

{{#if boilerplate}}
{{boilerplate}}

{{/if}}
export type {{streamType}} = StreamRecord<{{modelType}}>;
`;

// =============================================================================
// DAO CLASS
// =============================================================================

const DAO_CLASS = `
export class {{dao}} {
  constructor(private readonly provider: SessionProvider) {}

  async init(_client: Client): Promise<void> {
    const _cql = \`CREATE TABLE IF NOT EXISTS {{keyspace}}.{{table}} (
{{tableDefinition}},
    PRIMARY KEY ({{keys.partitionKeyClause}}{{keys.clusteringColumnsClause}})
){{#if keys.clusteringOrderClause}} {{keys.clusteringOrderClause}}{{/if}};\`;
    await _client.execute(_cql);
  }

  async add(_record: {{modelType}}, _client: Client): Promise<void> {
{{#if serializeBlock}}
{{serializeBlock}}

{{/if}}
    await _client.execute(
      'INSERT INTO {{keyspace}}.{{table}} ({{insertFields}}) VALUES ({{insertValues}})',
      [{{insertParams}}],
      { prepare: true }
    );
  }

  async get({{allKeysParams}}, _client?: Client): Promise<{{modelType}} | null> {
    const _rows = await this.query(
      'SELECT {{selectFields}} FROM {{keyspace}}.{{table}} WHERE {{keys.allKeysEquality}}',
      [{{keys.allKeysClause}}],
      _client
    );
    if (_rows.length > 1) {
      throw new Error('Expected at most one {{table}} row for the full key, found ' + _rows.length);
    }
    return _rows[0] ?? null;
  }

  async list({{partitionKeysParams}}, _client?: Client): Promise<{{modelType}}[]> {
    return this.query(
      'SELECT {{selectFields}} FROM {{keyspace}}.{{table}} WHERE {{keys.partitionKeysEquality}}',
      [{{keys.partitionKeysClause}}],
      _client
    );
  }

  /**
   * Rows are produced on a dedicated session in the background. The producer
   * suspends while the channel is full, so the channel must be drained or
   * closed; closing it stops the producer and releases the session.
   */
  stream({{partitionKeysParams}}): BoundedChannel<{{streamType}}> {
    const _channel = new BoundedChannel<{{streamType}}>(this.provider.capacity());
    this.produce(_channel, [{{keys.partitionKeysClause}}]).catch((_err: unknown) => {
      console.error('Stream producer for {{table}} stopped:', _err);
      _channel.close();
    });
    return _channel;
  }

  async delete(_record: {{modelType}}, _client?: Client): Promise<void> {
    await withSession(this.provider, _client, async (_session) => {
      await _session.execute(
        'DELETE FROM {{keyspace}}.{{table}} WHERE {{keys.allKeysEquality}}',
        [{{deleteParams}}],
        { prepare: true }
      );
    });
  }

  private async query(_cql: string, _params: unknown[], _client?: Client): Promise<{{modelType}}[]> {
    return withSession(this.provider, _client, async (_session) => {
      const _resources: {{modelType}}[] = [];
      const _result = await _session.execute(_cql, _params, { prepare: true, fetchSize: this.provider.pageSize() });
      for await (const _row of _result) {
        _resources.push(this.fromRow(_row));
      }
      return _resources;
    });
  }

  private async produce(_channel: BoundedChannel<{{streamType}}>, _params: unknown[]): Promise<void> {
    const _cql = 'SELECT {{selectFields}} FROM {{keyspace}}.{{table}} WHERE {{keys.partitionKeysEquality}}';
    let _session: Client | null = null;
    try {
      _session = await this.provider.createSession();
      const _result = await _session.execute(_cql, _params, { prepare: true, fetchSize: this.provider.pageSize() });
      // Further pages are fetched as the iteration reaches them
      for await (const _row of _result) {
        await _channel.push({ dto: this.fromRow(_row), err: null });
      }
    } catch (_err) {
      // A closed channel means the consumer has gone away
      if (!(_err instanceof ChannelClosedError)) {
        console.error(_session ? 'Failed to stream {{table}} rows:' : 'Failed to open a session for {{table}}:', _err);
        await this.fail(_channel, _err);
      }
    } finally {
      if (_session) {
        try {
          await _session.shutdown();
        } catch (_err) {
          console.error('Failed to shut down the {{table}} stream session:', _err);
        }
      }
      _channel.close();
    }
  }

  private async fail(_channel: BoundedChannel<{{streamType}}>, _err: unknown): Promise<void> {
    try {
      await _channel.push({ dto: null, err: toError(_err) });
    } catch (_pushErr) {
      if (!(_pushErr instanceof ChannelClosedError)) {
        throw _pushErr;
      }
    }
  }

  private fromRow(_row: types.Row): {{modelType}} {
{{#each columns}}
    {{scanDeclaration}}
{{/each}}

    const _resource: {{modelType}} = {
{{#each columns}}
      {{resourceField}},
{{/each}}
    };
{{#if deserializeBlock}}

{{deserializeBlock}}
{{/if}}

    return _resource;
  }
}
`;

export const DAO_TEMPLATE = DAO_HEADER + DAO_CLASS;
