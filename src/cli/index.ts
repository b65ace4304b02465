#!/usr/bin/env node
/**
 * worksession CLI entry point.
 */

import { closeLogger } from '../core/logger.js';
import { createProgram } from './program.js';
import { exitWithError } from './renderers/index.js';

createProgram()
  .parseAsync()
  .then(() => closeLogger())
  .catch((err: unknown) => exitWithError(err));
