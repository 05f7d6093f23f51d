#!/usr/bin/env node
import dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';

import { runCli } from './cli';

dotenv.config();

runCli({ argv: hideBin(process.argv) })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Unexpected error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
