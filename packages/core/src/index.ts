export * from './assistant.js'
export * from './audit.js'
export * from './chunker.js'
export * from './citations.js'
export * from './config.js'
export * from './embeddings/index.js'
export * from './errors.js'
export * from './ingest.js'
export * from './llm/openai.js'
export * from './logger.js'
export * from './normalizer/metadata.js'
export * from './normalizer/normalizer.js'
export * from './normalizer/sources.js'
export * from './normalizer/text.js'
export * from './orchestrator.js'
export * from './prompts.js'
export * from './retriever.js'
export * from './store/sqlite-index.js'
export * from './store/write-lock.js'
export type * from './types.js'
