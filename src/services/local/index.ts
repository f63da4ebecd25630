// Local filesystem services
export * from './types';
export * from './path-utils';
export * from './filesystem-walker';
export * from './name-indexer';
export * from './duplicate-policy';
export * from './relocator';
export * from './empty-directory-scanner';
export * from './depth-selector';
export * from './report-writer';
export * from './content-consolidator';
