#!/usr/bin/env node
/**
 * iesna CLI entry point
 *
 * Compiled to dist/bin/iesna.js by TypeScript.
 * Registered as the `iesna` binary in package.json.
 */

import dotenv from 'dotenv';
import { IesnaCLI } from '../cli/cli.js';

dotenv.config();

const cli = new IesnaCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
