/**
 * Persistence Example
 *
 * Saves a sequence to JSON text, then resumes numbering from it.
 * Also shows starting a fresh sequence past identifiers that already exist.
 */

import { deserializeSequence, serializeSequence } from '../../src/codec.js';
import { isSequenceError } from '../../src/error.js';
import { createLogger } from '../../src/logger.js';
import { Sequence } from '../../src/sequence.js';
import { u32, u64 } from '../../src/widths.js';

const logger = createLogger({ level: 'debug', prefix: '[example]' });

function main(): void {
  const orders = Sequence.withStartEndStep(u32, 1000, 1100, 25, { logger });
  logger.info(`Issued ${orders.take(2).join(', ')}`);

  const saved = serializeSequence(orders);
  logger.info(`Saved state: ${saved}`);

  const resumed = deserializeSequence(u32, saved, { logger });
  logger.info(`Resumed with ${[...resumed].join(', ')}`);

  // Resume past the highest id already in use
  const existing = [17n, 4n, 42n];
  const invoices = Sequence.startAfterHighest(u64, existing);
  logger.info(`Next invoice id: ${invoices.next()}`);

  try {
    deserializeSequence(u64, saved);
  } catch (error) {
    if (!isSequenceError(error)) {
      throw error;
    }
    logger.warn(`Could not restore: ${error.message}`);
  }
}

// Run the example
if (import.meta.url === `file://${process.argv[1]}`) {
  main();
}

export { main };
