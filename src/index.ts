// src/index.ts

export * from './schema';
export * from './ast';

export * from './core/actions';
export * from './core/config-loader';
export * from './core/extension';
export * from './core/gitignore';
export * from './core/setup-cfg';
export * from './core/structure';
export * from './core/substitute';
export * from './core/templates';
export * from './core/tests-structure';

export {
    buildActions,
    createProject,
    defaultActions,
    defaultOptions,
    defineStructure,
    hostStructure,
    mayReplace,
    verifyOptions,
    writeStructure,
    VERIFY_OPTIONS,
    type CreateProjectInput,
    type CreateProjectOptions,
    type CreateProjectResult,
    type ProjectInput,
    type WriteOptions,
    type WriteResult,
} from './host';

export {Logger, defaultLogger, parseLogLevel, type LogLevel, type LoggerOptions} from './util/logger';
export {clickstartVersion} from './util/package-info';
