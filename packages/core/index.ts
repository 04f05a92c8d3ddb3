// Hex strings are viem's template literal type
export type { Hex } from 'viem'
export * from './src/crypto'
export * from './src/env'
export * from './src/logger'
export * from './src/utils'
