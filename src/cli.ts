#!/usr/bin/env node
import { run } from './run.js';

run(process.env).catch((err: unknown) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
