import path from "node:path"
import type { AbsolutePath, SourceUrl } from "@/src/types/branded"

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

export function coerceAbsolutePathDirect(value: string): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

/**
 * Accept only absolute http(s) URLs. The input is returned as typed,
 * not as URL#href, so it can serve as a stable source identity.
 */
export function coerceSourceUrl(value: string): SourceUrl | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let parsed: URL
	try {
		parsed = new URL(trimmed)
	} catch {
		return null
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		return null
	}

	if (parsed.hostname.length === 0) {
		return null
	}

	return trimmed as SourceUrl
}
