export * from './processing-status.enum';
export * from './processing-state.enum';
