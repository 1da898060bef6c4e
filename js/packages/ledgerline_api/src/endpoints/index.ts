export * from './blocks';
export * from './health';
