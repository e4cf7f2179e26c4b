export * from './types.js'
export * from './version.js'
export * from './validation.js'
export * from './validator.js'
export * from './heuristics.js'
export * from './errors.js'
