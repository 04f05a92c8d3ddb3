export * from './blob-share-commitment-rules'
