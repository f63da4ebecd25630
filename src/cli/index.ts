#!/usr/bin/env node

// CLI entry point
import { runCli } from './program';
import { getErrorMessage } from '../core/error-handler';

runCli(process.argv, {
  cwd: process.cwd(),
  env: process.env,
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('❌ Unexpected failure:', getErrorMessage(error));
    process.exitCode = 1;
  }
);
