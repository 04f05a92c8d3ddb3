/**
 * Centralized type definitions for the data square workspace.
 *
 * Constants, error classes, the Safe result tuple and the interfaces shared
 * by the codec and packer packages.
 */

export * from './constants'
export * from './errors'
export * from './safe'
export * from './square'
