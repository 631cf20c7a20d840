#!/usr/bin/env node

/**
 * tierconf CLI entry point.
 */

import { runCli } from './app.js';
import { withErrorHandling } from './utils/errorHandling.js';

process.exitCode = withErrorHandling(() => runCli(process.argv.slice(2)));
