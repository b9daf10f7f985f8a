const WHITESPACE = /\s+/
const LINE_BREAK = /\r\n|\r|\n/

/**
 * Split text into lines of whitespace-separated tokens, dropping blank lines.
 * `\n`, `\r\n` and a lone `\r` all end a line.
 */
export function* tokenizeLines(content: string): Generator<string[]> {
	for (const line of content.split(LINE_BREAK)) {
		const trimmed = line.trim()
		if (trimmed === "") continue
		yield trimmed.split(WHITESPACE)
	}
}
