/**
 * Graphform - declarative infrastructure orchestration
 * Main entry point for the package
 */

export * from './core'
export * from './errors'

// Built-in providers
export { builtinProviders, LocalProvider, NullProvider } from './providers'

// Logging
export { getLogger, setLogLevel } from './log/utils'
