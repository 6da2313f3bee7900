/**
 * cqlgen entry point
 */

import { EXIT_FAILURE, run } from './cli.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exit(EXIT_FAILURE);
  });
