#!/usr/bin/env node
// src/cli/bin.ts

import { main } from './index.js';

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
