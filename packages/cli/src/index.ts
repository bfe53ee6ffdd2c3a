#!/usr/bin/env node
import { createProgram } from './program.js';

export const program = createProgram();

await program.parseAsync();
