/**
 * Session scoping for generated DAOs
 */

import type { Client } from 'cassandra-driver';

export interface Closable {
  shutdown(): Promise<void>;
}

/**
 * Supplies sessions and paging settings to a generated DAO.
 * Usually implemented in the boilerplate spliced into the DAO module.
 */
export interface SessionProvider<S extends Closable = Client> {
  /** Open a new session; the caller owns it and shuts it down */
  createSession(): Promise<S>;
  /** Capacity of the channel returned by `stream()` */
  capacity(): number;
  /** Fetch size used for paged queries */
  pageSize(): number;
}

/**
 * Run `fn` with the given session, or with a fresh one from the provider.
 * Only a session opened here is shut down afterwards.
 */
export async function withSession<S extends Closable, T>(
  provider: Pick<SessionProvider<S>, 'createSession'>,
  session: S | undefined,
  fn: (session: S) => Promise<T>
): Promise<T> {
  if (session) {
    return fn(session);
  }

  const owned = await provider.createSession();
  try {
    return await fn(owned);
  } finally {
    await owned.shutdown();
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
