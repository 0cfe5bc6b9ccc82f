/**
 * Command action wrapper
 */

import * as logger from './logger.js';

/**
 * Run a command handler; any failure prints "[stage] message" and exits 1
 */
export async function runAction(handler: () => Promise<void>): Promise<void> {
  try {
    await handler();
  } catch (error: unknown) {
    console.log();
    logger.failure(error);
    process.exit(1);
  }
}
