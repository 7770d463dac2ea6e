#!/usr/bin/env node
import { run } from './cli';

run(process.argv).catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
