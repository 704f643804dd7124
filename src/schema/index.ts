// src/schema/index.ts

export * from './options';
export * from './structure';
export * from './actions';
export * from './config';

/**
 * Config file base name looked up in the working directory.
 */
export const CONFIG_BASENAME = 'clickstart.config';
