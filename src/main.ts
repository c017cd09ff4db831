#!/usr/bin/env node
/**
 * Command line entry point
 */

import { main } from './app';

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(1);
  });
