#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from '../src/cli.js';

runCli(process.argv.slice(2), { env: process.env })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[import-catalog] unexpected failure:', error);
    process.exitCode = 1;
  });
