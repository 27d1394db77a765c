#!/usr/bin/env node
/**
 * drawio-shapes command line.
 */

import { runCli } from './cli/runCli.js';

process.exitCode = runCli(process.argv.slice(2));
