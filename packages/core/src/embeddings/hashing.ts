import { EmbeddingError } from '../errors.js'
import type { EmbeddingProvider } from '../types.js'

export interface HashingEmbeddingOptions {
	/** @default 384 */
	dimension?: number
	/** Adjacent-word bigrams are hashed too, at this weight relative to single words. @default 0.5 */
	bigramWeight?: number
}

/**
 * A deterministic, local embedding model based on feature hashing.
 *
 * Lower-cased word tokens (with a trailing plural `s` folded) and adjacent-word bigrams are
 * hashed with FNV-1a into signed buckets, weighted by `1 + ln(tf)`, then L2-normalized.
 * Identical text always yields a bit-identical vector.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
	readonly dimension: number
	private readonly bigramWeight: number

	constructor(options: HashingEmbeddingOptions = {}) {
		this.dimension = options.dimension ?? 384
		this.bigramWeight = options.bigramWeight ?? 0.5
		if (!Number.isInteger(this.dimension) || this.dimension <= 0) {
			throw new EmbeddingError(`Embedding dimension must be a positive integer, got ${this.dimension}.`)
		}
	}

	async embed(texts: readonly string[]): Promise<number[][]> {
		return texts.map((text, i) => this.embedOne(text, i))
	}

	async embedQuery(text: string): Promise<number[]> {
		return this.embedOne(text)
	}

	private embedOne(text: string, position?: number): number[] {
		const terms = termsOf(text)
		if (terms.length === 0) {
			const where = position === undefined ? '' : ` at position ${position}`
			throw new EmbeddingError(`Cannot embed empty text${where}.`)
		}

		const frequencies = new Map<string, number>()
		for (const term of terms) {
			frequencies.set(term, (frequencies.get(term) ?? 0) + 1)
		}
		for (let i = 1; i < terms.length; i++) {
			const bigram = `${terms[i - 1]} ${terms[i]}`
			frequencies.set(bigram, (frequencies.get(bigram) ?? 0) + 1)
		}

		const vector = new Array<number>(this.dimension).fill(0)
		for (const [feature, count] of frequencies) {
			const hash = fnv1a(feature)
			const bucket = hash % this.dimension
			const sign = (hash & 0x80000000) === 0 ? 1 : -1
			const weight = feature.includes(' ') ? this.bigramWeight : 1
			vector[bucket] = (vector[bucket] ?? 0) + sign * weight * (1 + Math.log(count))
		}

		const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0))
		return norm === 0 ? vector : vector.map(value => value / norm)
	}
}

/** Lower-cased alphanumeric words with a trailing plural `s` folded (`defines` → `define`). */
export function termsOf(text: string): string[] {
	const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []
	return words.map(word => (word.length > 3 && word.endsWith('s') && !word.endsWith('ss') ? word.slice(0, -1) : word))
}

/** 32-bit FNV-1a over the UTF-16 code units of `value`, as an unsigned integer. */
export function fnv1a(value: string): number {
	let hash = 0x811C9DC5
	for (let i = 0; i < value.length; i++) {
		hash ^= value.charCodeAt(i)
		hash = Math.imul(hash, 0x01000193)
	}
	return hash >>> 0
}
