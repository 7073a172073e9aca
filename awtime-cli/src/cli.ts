#!/usr/bin/env node

/**
 * awtime CLI
 *
 * Time analysis over ActivityWatch data: daily and weekly summaries,
 * focus sessions, project time, productivity and raw exports.
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
