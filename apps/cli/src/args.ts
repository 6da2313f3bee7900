/**
 * Command line arguments
 */

import { parseArgs } from 'node:util';

export const USAGE = `Usage: cqlgen [options]

Batch mode (no --model): reads persist-config.json from the working directory or config/.
Legacy mode: reads <Model>.json (a column list) and renders a single DAO.

Options:
  --model <Model>      model name for legacy mode
  --dao <Dao>          DAO class name for legacy mode
  --keyspace <name>    keyspace for legacy mode
  --package <name>     module name recorded in legacy-mode headers
  --out <dir>          output root directory
  --no-format          write rendered output without formatting
  -h, --help           show this help
`;

export interface CliOptions {
  model?: string;
  dao?: string;
  keyspace?: string;
  package?: string;
  out?: string;
  format: boolean;
  help: boolean;
}

/**
 * Bad flags; reported with the usage text and exit code 2
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: {
      model: { type: 'string' },
      dao: { type: 'string' },
      keyspace: { type: 'string' },
      package: { type: 'string' },
      out: { type: 'string' },
      'no-format': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values } = parsed;
  const options: CliOptions = {
    model: values.model,
    dao: values.dao,
    keyspace: values.keyspace,
    package: values.package,
    out: values.out,
    format: values['no-format'] !== true,
    help: values.help === true,
  };

  if (!options.help && (options.model === undefined) !== (options.dao === undefined)) {
    throw new UsageError('--model and --dao must be given together');
  }
  if (options.model === undefined && (options.keyspace !== undefined || options.package !== undefined)) {
    throw new UsageError('--keyspace and --package only apply together with --model');
  }

  return options;
}
