#!/usr/bin/env tsx

/**
 * CLI entry point for batchrun
 * Handles command-line argument parsing and user interaction
 */

import { createProgram } from "./program";
import { normalizeArgv } from "./argv";

createProgram().parse(normalizeArgv(process.argv));
