#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { runCli } from './index.js';

runCli(process.argv).then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
);
