#!/usr/bin/env node
/**
 * skill-scan CLI entry point
 */

import { argv } from 'node:process';
import { createLogger } from '@/lib/logger';
import { extractErrorMessage } from '@/lib/errors';
import { createProgram } from './program';

createProgram()
  .parseAsync(argv)
  .catch((error: unknown) => {
    const message = extractErrorMessage(error);
    createLogger({ name: 'cli' }).fatal({ error: message }, 'Unhandled CLI failure');
    process.stderr.write(`❌ Unexpected error: ${message}\n`);
    process.exitCode = 1;
  });
