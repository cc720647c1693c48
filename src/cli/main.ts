#!/usr/bin/env node
import 'dotenv/config';

import { createProgram } from './run-command.js';

const program = createProgram({ env: process.env, stdout: process.stdout, stderr: process.stderr });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`[error] ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
