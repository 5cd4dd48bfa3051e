/**
 * State management module
 *
 * @description Persisted state schema and stores.
 */

export * from './state'
export * from './store'
