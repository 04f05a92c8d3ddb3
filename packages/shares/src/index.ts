export * from './blob'
export * from './compact-share-counter'
export * from './compact-share-splitter'
export * from './info-byte'
export * from './namespace'
export * from './padding'
export * from './parse'
export * from './parse-compact-shares'
export * from './parse-sparse-shares'
export * from './range'
export * from './reserved-bytes'
export * from './sequence'
export * from './share'
export * from './share-builder'
export * from './sparse-share-splitter'
export * from './split'
