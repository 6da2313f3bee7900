/**
 * Schema and boilerplate file loading
 */

import { access, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigurationError, createChildLogger } from '@cqlgen/shared';

const logger = createChildLogger({ component: 'ConfigFile' });

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find `fileName` in the working directory, then in `configDir` below it
 */
export async function locateFile(fileName: string, cwd: string, configDir: string): Promise<string> {
  const candidates = [join(cwd, fileName), join(cwd, configDir, fileName)];

  for (const candidate of candidates) {
    if (await exists(candidate)) {
      logger.debug({ path: candidate }, 'Schema file located');
      return candidate;
    }
  }

  throw new ConfigurationError(`Could not find ${fileName} in ${cwd} or ${join(cwd, configDir)}`, {
    searched: candidates,
  });
}

/**
 * Read and parse a JSON document. An empty file yields null.
 */
export async function readJsonDocument(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (text.trim() === '') {
    return null;
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new ConfigurationError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Read the boilerplate template named by the persist configuration
 */
export async function readBoilerplate(path: string, cwd: string): Promise<string> {
  const fullPath = resolve(cwd, path);
  try {
    return await readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Could not read boilerplate ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: fullPath }
    );
  }
}
