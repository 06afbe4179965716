export * from './errors';
export * from './result';
export * from './lifecycle';

export * from './entities/session';
export * from './entities/execution';
export * from './entities/analysis';

export * from './contracts/checkpoint';
export * from './contracts/node';

export * from './ports/logger';
export * from './ports/textCompletion';
export * from './ports/literature';
export * from './ports/visualization';
export * from './ports/report';
export * from './ports/recordStore';

export * from './config/defaults';
export * from './config/schema';
export * from './config/resolve';
export * from './config/types';

export * from './utils/json';
export * from './utils/retry';
export * from './utils/timeout';
export * from './utils/classify';
export * from './utils/keyedMutex';
