import type { LexciteConfig } from './config.js'
import { DEFAULT_CONFIG } from './config.js'
import { NullLogger } from './logger.js'
import type { VectorIndex } from './store/sqlite-index.js'
import type { AnswerMode, EmbeddingProvider, ILogger, RetrievalResult } from './types.js'

export interface RetrieveOptions {
	/** Falls back to the mode's default when missing, non-integer or non-positive. */
	topK?: number
	/** @default 'research' */
	mode?: AnswerMode
}

/** Embeds the query text and looks up its nearest chunks. */
export class Retriever {
	constructor(
		private readonly embeddings: EmbeddingProvider,
		private readonly index: VectorIndex,
		private readonly defaults: LexciteConfig['retrieval']['topK'] = DEFAULT_CONFIG.retrieval.topK,
		private readonly logger: ILogger = new NullLogger(),
	) {}

	async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const topK = this.resolveTopK(options.topK, options.mode ?? 'research')
		if (this.index.count() === 0) {
			this.logger.debug('[Retriever] The index is empty.')
			return []
		}

		const vector = await this.embeddings.embedQuery(query)
		const results = await this.index.query(vector, topK)
		this.logger.debug(`[Retriever] Retrieved ${results.length}/${topK} chunks.`, {
			top: results[0] ? { id: results[0].id, score: results[0].score } : undefined,
		})
		return results
	}

	resolveTopK(topK: number | undefined, mode: AnswerMode): number {
		if (topK !== undefined && Number.isInteger(topK) && topK > 0) {
			return topK
		}
		return this.defaults[mode]
	}
}
