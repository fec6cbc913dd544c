#!/usr/bin/env node
/**
 * CLI: Screenshot Comparison
 *
 * Usage:
 *   pixelverdict <imageA.png> <imageB.png> [options]
 *
 * Example:
 *   pixelverdict expected.png actual.png --threshold 0.98 --report
 */

import { errorMessage } from '../lib/utils/error.js';
import { USAGE, parseArgs, runCompare } from './run.js';

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  if (parsed.kind === 'error') {
    console.error(`❌ ${parsed.message}`);
    console.error(USAGE);
    return 1;
  }

  try {
    return await runCompare(parsed.args, {
      out: line => console.log(line),
    });
  } catch (error) {
    console.error('❌ Error:', errorMessage(error));
    return 1;
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('❌ Error:', errorMessage(error));
    process.exitCode = 1;
  });
