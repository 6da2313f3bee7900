/**
 * Configuration management for cqlgen
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'path';

// Load environment variables from the working directory
dotenvConfig({ path: resolve(process.cwd(), '.env') });

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : !['false', '0', 'no', ''].includes(val.toLowerCase())));

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  generator: z.object({
    /** Batch-mode schema file name */
    configFile: z.string().min(1).default('persist-config.json'),
    /** Fallback directory searched when the schema file is not in the working directory */
    configDir: z.string().min(1).default('config'),
    /** Root directory generated files are written under */
    outputDir: z.string().min(1).default('.'),
    /** Run rendered output through the formatter before writing */
    format: booleanFlag.default(true),
  }),

  // Defaults for the single-table legacy mode, which has no PersistConfig
  legacy: z.object({
    keyspace: z.string().min(1).default('app'),
    package: z.string().min(1).default('dao'),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    generator: {
      configFile: process.env.CQLGEN_CONFIG_FILE,
      configDir: process.env.CQLGEN_CONFIG_DIR,
      outputDir: process.env.CQLGEN_OUTPUT_DIR,
      format: process.env.CQLGEN_FORMAT,
    },

    legacy: {
      keyspace: process.env.CQLGEN_KEYSPACE,
      package: process.env.CQLGEN_PACKAGE,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}
