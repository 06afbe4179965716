export * from './sequence';
export * from './motifs';
export * from './orfs';
export * from './analyzer';
export * from './tables';
export * from './protein';
export * from './comparator';
export * from './hypotheses';
