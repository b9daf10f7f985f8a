import { format, parse } from "node:path"

/**
 * Insert a suffix before the file extension:
 * `graphs/web.txt` -> `graphs/web_normalized.txt`, `web` -> `web_normalized`.
 * Only the last extension counts, and a leading dot does not start one.
 */
export function deriveOutputPath(inputPath: string, suffix: string): string {
	const { dir, root, name, ext } = parse(inputPath)
	return format({ dir, root, name: `${name}${suffix}`, ext })
}

/**
 * Output path without its extension, used as the stem for artifact files
 */
export function stripExtension(filePath: string): string {
	const { dir, root, name } = parse(filePath)
	return format({ dir, root, name })
}
