/**
 * Utility exports for the data square core package
 */

export * from './bytes'
