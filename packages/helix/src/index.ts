export * from './api/createAssistant';
export * from './api/providers';
export * from './config/env';

export * from '@helix/core';
export * from '@helix/analysis';
export * from '@helix/runtime';
export {
  FakeLogger,
  FakeLiteratureSearch,
  FakeReportBuilder,
  FakeTextCompletion,
  FakeVisualizer,
  FileRecordStore,
  MemoryCheckpointSaver,
  MemoryRecordStore,
  OpenAITextCompletion,
  PinoLogger
} from '@helix/adapters';
