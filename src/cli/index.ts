import { createProgram } from './cli.js';
import * as logger from './utils/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.failure(error);
    process.exit(1);
  });
