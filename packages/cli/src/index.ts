#!/usr/bin/env node
// packages/cli/src/index.ts — dirsweep entry point

import { buildProgram } from './program.js';

await buildProgram().parseAsync(process.argv);
