export * from './path-resolver';
export * from './sanitize';
