// src/ast/index.ts

export * from './cfg-parser';
export * from './cfg-format';
export * from './cfg-edit';
