#!/usr/bin/env node
/**
 * CLI Entry Point Loader
 * Loads environment variables before importing the CLI module
 */

import { existsSync } from 'node:fs';
import process from 'node:process';

// Must run before config.ts is evaluated by any module
for (const envFile of ['.env.local', '.env']) {
  if (existsSync(envFile)) {
    process.loadEnvFile(envFile);
  }
}

const { main } = await import('./index.js');
await main();
