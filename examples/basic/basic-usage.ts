/**
 * Basic Usage Example
 *
 * Demonstrates fundamental sequence usage including:
 * - Producing values until the width runs out
 * - Skipping ahead with fast-forward
 * - Handling a rejected fast-forward
 * - Resetting an exhausted sequence
 */

import { Sequence } from '../../src/sequence.js';
import { u8, u64 } from '../../src/widths.js';

function main(): void {
  console.log('=== Sequence Basic Example ===\n');

  // Example 1: Count through a small width
  console.log('--- Example 1: Production ---');
  const small = Sequence.withStartAndStep(u8, 240, 5);
  console.log(`Values: ${[...small].join(', ')}`);
  console.log(`Exhausted: ${small.isExhausted()}`);

  // Example 2: Fast-forward
  console.log('\n--- Example 2: Fast-forward ---');
  const ids = Sequence.create(u8);
  const skipped = ids.fastForward(200);
  if (skipped.ok) {
    console.log(`Skipped to ${skipped.current}`);
  }

  const rejected = ids.fastForward(100);
  if (!rejected.ok) {
    console.log(`Rejected: ${rejected.error.message}`);
  }
  console.log(`Next value is still ${ids.next()}`);

  // Example 3: Reset after exhaustion
  console.log('\n--- Example 3: Reset ---');
  const wide = Sequence.withStart(u64, u64.max);
  console.log(`Last value: ${wide.next()}`);
  console.log(`After exhaustion: ${wide.next()}`);
  wide.reset();
  console.log(`After reset: ${wide.next()}`);

  console.log('\nExample completed');
}

// Run the example
if (import.meta.url === `file://${process.argv[1]}`) {
  main();
}

export { main };
