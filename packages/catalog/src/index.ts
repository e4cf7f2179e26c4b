export * from './types.js'
export * from './errors.js'
export * from './status.js'
export * from './record.js'
export * from './builder.js'
export * from './dependencyValidator.js'
export * from './orchestrator.js'
export * from './lifecycle.js'
export * from './registry.js'
export * from './store/configStore.js'
export * from './store/in_memory_store.js'
export * from './store/file_store.js'
export * as catalogConfig from './config/catalog_cfg.js'
