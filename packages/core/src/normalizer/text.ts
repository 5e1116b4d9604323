/**
 * Cleans text extracted from one page.
 *
 * Line endings are normalized, runs of spaces and tabs collapse to one space, lines are trimmed,
 * page-number-only lines and long separator rules are dropped, and three or more newlines
 * collapse into a single blank line. Blank lines between paragraphs survive.
 */
export function cleanPageText(raw: string): string {
	const lines = raw
		.replace(/\r\n?/g, '\n')
		.replace(/\u00a0/g, ' ')
		.split('\n')
		.map(line => line.replace(/[ \t\f\v]+/g, ' ').trim())
		.map(line => line.replace(/[-_=]{5,}/g, '').trim())
		.filter(line => !isPageNumberLine(line))

	return lines
		.join('\n')
		.replace(/\n{3,}/g, '\n\n')
		.trim()
}

function isPageNumberLine(line: string): boolean {
	return /^(?:page\s+)?\d{1,4}(?:\s*(?:of|\/)\s*\d{1,4})?$/i.test(line) || /^-\s*\d{1,4}\s*-$/.test(line)
}

/** Collapses every whitespace run to a single space. */
export function normalizeWhitespace(text: string): string {
	return text.replace(/\s+/g, ' ').trim()
}
