export * from './configs';
export * from './errors';
export * from './jobStateMachine';
export * from './models';
export * from './ports';
export * from './whisperModels';
