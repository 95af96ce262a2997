export * from './clear-cache';
export * from './inspect-project';
