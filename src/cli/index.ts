#!/usr/bin/env node

/**
 * kbgen CLI entry point.
 */

import { runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

withErrorHandling(() => runCli(process.argv.slice(2)));
