import type { LexciteConfig } from '../config.js'
import type { EmbeddingProvider } from '../types.js'
import { HashingEmbeddingProvider } from './hashing.js'
import { OpenAIEmbeddingProvider } from './openai.js'

export * from './hashing.js'
export * from './openai.js'

export function createEmbeddingProvider(config: LexciteConfig): EmbeddingProvider {
	const { embedding, generation } = config
	if (embedding.provider === 'openai') {
		return new OpenAIEmbeddingProvider({
			model: embedding.model,
			dimension: embedding.dimension,
			batchSize: embedding.batchSize,
			apiKey: generation.apiKey,
			baseURL: generation.baseURL,
		})
	}
	return new HashingEmbeddingProvider({ dimension: embedding.dimension })
}
