export * from './memory';
export * from './file';
