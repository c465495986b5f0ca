#!/usr/bin/env -S node --import tsx
import { run } from './index.js';

run().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
