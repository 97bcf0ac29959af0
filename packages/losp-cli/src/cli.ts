#!/usr/bin/env -S npx tsx
/**
 * losp command line interface
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
