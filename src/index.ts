// Main entry point for the sweeper library

export * from './types';
export * from './core';
export * from './services/local';
export * from './progress';

export { createProgram, runCli } from './cli/program';
export type { CliContext } from './cli/program';
