#!/usr/bin/env node

import { main } from './index.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  },
);
