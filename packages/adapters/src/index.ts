export * from './logger';
export * from './checkpoint';
export * from './records';
export * from './openai';
export * from './collaborators';
