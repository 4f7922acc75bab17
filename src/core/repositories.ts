export * from './repositories/shared';
export * from './repositories/leads';
export * from './repositories/workers';
export * from './repositories/jobs';
export * from './repositories/messages';
export * from './repositories/cache';
export * from './repositories/system';
