#!/usr/bin/env node
import { createProgram } from './program';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
