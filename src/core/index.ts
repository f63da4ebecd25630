// Sweep configuration, orchestration and support modules
export * from './constants';
export * from './logger';
export * from './error-handler';
export * from './config-manager';
export * from './environment-config';
export * from './duplicate-processor';
