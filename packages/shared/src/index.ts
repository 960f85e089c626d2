export * from './invoice';
export * from './documents';
export * from './routing';
