export * from './domain';
export * from './services/backendSelector';
export * from './services/backends';
export * from './services/captureStatus';
export * from './services/config';
export * from './services/connectivity';
export * from './services/db';
export * from './services/export';
export * from './services/importService';
export * from './services/jobEvents';
export * from './services/liveSession';
export * from './services/modelCatalog';
export * from './services/orchestrator';
export * from './services/queue';
export * from './streaming';
export * from './utils/nodeFS';
export * from './utils/process';
export * from './utils/transcriptText';
export * from './container';
