#!/usr/bin/env node
import 'reflect-metadata';
import { createProgram } from './cli/program';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(2);
  });
