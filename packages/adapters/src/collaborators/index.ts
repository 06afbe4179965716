export * from './queue';
export * from './fakes';
