/**
 * cqlgen command
 */

import { createChildLogger, getConfig, wrapError } from '@cqlgen/shared';
import { USAGE, UsageError, parseCliArgs, type CliOptions } from './args.js';
import { runPipeline, type PipelineOptions } from './pipeline.js';

const logger = createChildLogger({ component: 'CLI' });

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunContext {
  cwd: string;
  /** Receives usage text */
  print: (text: string) => void;
}

const defaultContext: RunContext = {
  cwd: process.cwd(),
  print: (text) => process.stdout.write(text),
};

/**
 * Run the generator and return the process exit code
 */
export async function run(argv: readonly string[], context: RunContext = defaultContext): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error({ error: error.message }, 'Invalid arguments');
      context.print(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    context.print(USAGE);
    return EXIT_SUCCESS;
  }

  try {
    const config = getConfig();
    const pipeline: PipelineOptions = {
      cwd: context.cwd,
      configFile: config.generator.configFile,
      configDir: config.generator.configDir,
      outputDir: options.out ?? config.generator.outputDir,
      format: options.format && config.generator.format,
      legacy:
        options.model !== undefined && options.dao !== undefined
          ? {
              model: options.model,
              dao: options.dao,
              keyspace: options.keyspace ?? config.legacy.keyspace,
              targetPackage: options.package ?? config.legacy.package,
            }
          : undefined,
    };

    const result = await runPipeline(pipeline);
    logger.info({ files: result.written.length }, 'cqlgen finished');
    return EXIT_SUCCESS;
  } catch (error) {
    const failure = wrapError(error);
    logger.error({ code: failure.code, category: failure.context.category, error: failure.message }, 'cqlgen failed');
    return EXIT_FAILURE;
  }
}
