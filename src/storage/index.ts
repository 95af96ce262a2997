export * from './store';
export * from './file-store';
