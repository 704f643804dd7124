// src/host/index.ts

export * from './define-structure';
export * from './apply-structure';
export * from './runner';
export {runActions} from '../core/actions';
