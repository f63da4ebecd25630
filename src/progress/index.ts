// Operator-facing output
export * from './outcome-reporter';
