#!/usr/bin/env node
/**
 * roundwatch CLI entry point
 */

import { createProgram } from './program.js';
import { error } from '../../shared/ui/index.js';
import { getErrorMessage } from '../../shared/utils/index.js';

createProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    error(getErrorMessage(e));
    process.exit(1);
  });
