#!/usr/bin/env node
/**
 * tesspipe CLI entry point
 *
 * Compiled to dist/bin/tesspipe.js by TypeScript.
 * Registered as the `tesspipe` binary in package.json.
 */

import dotenv from 'dotenv';
import { TesspipeCLI } from '../cli/cli.js';

dotenv.config();

const cli = new TesspipeCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
