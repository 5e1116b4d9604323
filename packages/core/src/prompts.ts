import type { JudgmentMode, RetrievalResult } from './types.js'

export const JUDGMENT_HEADERS: Record<JudgmentMode, string> = {
	hypothetical: 'HYPOTHETICAL ANALYSIS - NOT LEGAL ADVICE',
	reference: 'REFERENCE ANALYSIS - NOT LEGAL ADVICE',
}

export const RESEARCH_DISCLAIMER = 'For research/educational use only.'

const RESEARCH_TEMPLATE = `You are a legal research assistant for Indian law. Answer using ONLY the legal passages provided below.

RETRIEVED LEGAL PASSAGES:
{{passages}}

USER QUERY: {{query}}

INSTRUCTIONS:
1. Give an executive summary (2-4 sentences) answering the query.
2. List the key points as bullet notes.
3. If several cases or sections are relevant, compare them briefly.
4. Cite sources using ONLY the bracket numbers [1], [2], etc. that appear in the passages above.
5. If the passages are insufficient to answer the query, say so plainly.
6. End with a numbered sources list matching your bracket citations.

OUTPUT FORMAT:
## Executive Summary
## Key Points
## Sources

CRITICAL: Use ONLY the bracket numbers [1] through [{{count}}]. Do not invent citations or refer to sources not provided.
`

const JUDGMENT_TEMPLATE = `You are simulating judicial reasoning for educational purposes. Begin your response with the header: "{{header}}"

RETRIEVED LEGAL PASSAGES:
{{passages}}

CASE FACTS:
{{facts}}

INSTRUCTIONS:
1. Begin with the exact header: "{{header}}"
2. Analyse the facts in light of the retrieved passages under the headings Facts, Issues, Reasoning, Hypothetical Holding(s) and Sources.
3. Use cautious, conditional language (may, could, likely, appears).
4. Cite ONLY with bracket numbers [1], [2], etc. matching the passages above.
5. This is an educational simulation, not legal advice.

OUTPUT FORMAT:
{{header}}

## Facts
## Issues
## Reasoning
## Hypothetical Holding(s)
## Sources

CRITICAL: Cite ONLY using bracket numbers [1] through [{{count}}]. Do not invent case names or citations not present in the passages.
`

const SUMMARIZE_TEMPLATE = `You are a legal headnote generator for Indian case law. Write a headnote with study notes.

{{content}}

INSTRUCTIONS:
1. Extract the Facts, the Issue, the Holding and the Ratio Decidendi.
2. Add 5 numbered study notes on the important aspects.
3. When working from retrieved passages, cite them with bracket numbers [1], [2], etc.

OUTPUT FORMAT:
## Facts
## Issue
## Holding
## Ratio Decidendi
## Study Notes

CRITICAL: Base the summary ONLY on the text provided. Do not add outside information.
`

const RETRY_TEMPLATE = `CRITICAL CORRECTION REQUIRED:
Your previous response contained invalid citations: {{invalid}}
You MUST use ONLY bracket numbers from [1] to [{{count}}].
Do NOT use any other numbers in bracket citations.

`

/** Replaces `{{key}}` placeholders; unknown keys become empty strings. */
export function resolveTemplate(template: string, data: Record<string, string | number>): string {
	return template.replace(/\{\{(.*?)\}\}/g, (_, key: string) => {
		const value = data[key.trim()]
		return value !== undefined ? String(value) : ''
	})
}

/** Numbers the passages from 1, each under a header naming its source, page and case. */
export function formatRetrievedPassages(retrieved: RetrievalResult): string {
	return retrieved
		.map((item, i) => {
			const { sourceFile, pageNumber, caseName } = item.metadata
			let header = `[${i + 1}] Source: ${sourceFile}, Page: ${pageNumber}`
			if (caseName) header += `, Case: ${caseName}`
			return `${header}\n${item.text}\n`
		})
		.join('\n')
}

export function buildResearchPrompt(query: string, retrieved: RetrievalResult): string {
	return resolveTemplate(RESEARCH_TEMPLATE, {
		passages: formatRetrievedPassages(retrieved),
		query,
		count: retrieved.length,
	})
}

export function buildJudgmentPrompt(facts: string, mode: JudgmentMode, retrieved: RetrievalResult): string {
	return resolveTemplate(JUDGMENT_TEMPLATE, {
		header: JUDGMENT_HEADERS[mode],
		passages: formatRetrievedPassages(retrieved),
		facts,
		count: retrieved.length,
	})
}

/** Summarizes `caseText` directly when given, otherwise the retrieved passages. */
export function buildSummarizePrompt(retrieved: RetrievalResult, caseText?: string): string {
	const content = caseText
		? `CASE TEXT TO SUMMARIZE:\n${caseText}`
		: `RETRIEVED PASSAGES:\n${formatRetrievedPassages(retrieved)}`
	return resolveTemplate(SUMMARIZE_TEMPLATE, { content })
}

/** Prepends a correction naming the invalid numbers and the allowed range to the original prompt. */
export function buildRetryPrompt(originalPrompt: string, retrievedCount: number, invalid: readonly number[]): string {
	return resolveTemplate(RETRY_TEMPLATE, {
		invalid: `[${invalid.join(', ')}]`,
		count: retrievedCount,
	}) + originalPrompt
}
