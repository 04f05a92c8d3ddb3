/**
 * Square Package
 *
 * Builds the original data square from a list of transactions and takes
 * it apart again.
 */

export * from './builder'
export * from './element'
export * from './operations'
export * from './square'
