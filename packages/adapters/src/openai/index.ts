export * from './textCompletion';
