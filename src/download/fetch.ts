import { createHash } from "node:crypto"
import { type FileHandle, open } from "node:fs/promises"
import path from "node:path"
import { consola } from "consola"
import { ensureDir, hashFile, removePath, safeStat } from "@/src/io/fs"
import type { AbsolutePath, SourceUrl } from "@/src/types/branded"
import type { DownloadError, DownloadFailureReason, Result } from "@/src/types/errors"

export type DownloadStatus = "written" | "unchanged"

export interface DownloadOutcome {
	status: DownloadStatus
	path: AbsolutePath
}

export interface DownloadOptions {
	/** Replace an existing destination even when its content differs. */
	overwrite: boolean
	/** Base for a relative destination path. */
	cwd: AbsolutePath
	fetch?: typeof fetch
}

export type DownloadResult = Result<DownloadOutcome, DownloadError>

export type StepResult = Result<void, DownloadError>

export type Fail = (
	reason: DownloadFailureReason,
	message: string,
	extra?: { rawError?: Error; status?: number },
) => DownloadResult

/**
 * Download sourceUrl to destinationPath.
 *
 * An existing destination is left alone when its SHA-256 matches the
 * downloaded bytes. With overwrite off, a mismatch is a conflict and the
 * file is not touched. A destination that was opened for writing is
 * removed again when the write fails.
 */
export async function downloadToFile(
	sourceUrl: SourceUrl,
	destinationPath: string,
	options: DownloadOptions,
): Promise<DownloadResult> {
	const destination = path.resolve(options.cwd, destinationPath) as AbsolutePath
	const fail: Fail = (reason, message, extra = {}) => ({
		error: { ...extra, message, path: destination, reason, type: "download", url: sourceUrl },
		ok: false,
	})

	const fetchImpl = options.fetch ?? fetch
	let response: Response
	try {
		response = await fetchImpl(sourceUrl)
	} catch (error) {
		return fail("network", `Unable to download ${sourceUrl}.`, {
			rawError: error instanceof Error ? error : undefined,
		})
	}

	if (!response.ok) {
		return fail("status", `Downloading ${sourceUrl} returned ${response.status}.`, {
			status: response.status,
		})
	}

	const existing = await safeStat(destination)
	if (!existing.ok) {
		return fail("io", existing.error.message, { rawError: existing.error.rawError })
	}

	if (existing.value?.isDirectory()) {
		return fail("io", `Destination ${destination} is a directory.`)
	}

	if (existing.value && !options.overwrite) {
		return compareWithExisting(response, destination, fail)
	}

	if (!existing.value) {
		const ensured = await ensureDir(path.dirname(destination))
		if (!ensured.ok) {
			return fail("io", ensured.error.message, { rawError: ensured.error.rawError })
		}
	}

	consola.info(`Downloading to '${destination}'.`)

	let handle: FileHandle
	try {
		handle = await open(destination, "w")
	} catch (error) {
		return fail("io", `Unable to open ${destination} for writing.`, {
			rawError: error instanceof Error ? error : undefined,
		})
	}

	const copied = await copyBody(response.body, handle, fail)
	const closed = await closeHandle(handle, fail)
	const failure = !copied.ok ? copied : !closed.ok ? closed : null
	if (failure) {
		const removed = await removePath(destination)
		if (!removed.ok) {
			consola.warn(removed.error.message)
		}
		return failure
	}

	return { ok: true, value: { path: destination, status: "written" } }
}

async function compareWithExisting(
	response: Response,
	destination: AbsolutePath,
	fail: Fail,
): Promise<DownloadResult> {
	let downloaded: Uint8Array
	try {
		downloaded = new Uint8Array(await response.arrayBuffer())
	} catch (error) {
		return fail("network", "Downloading failed.", {
			rawError: error instanceof Error ? error : undefined,
		})
	}

	const existingHash = await hashFile(destination)
	if (!existingHash.ok) {
		return fail("io", existingHash.error.message, { rawError: existingHash.error.rawError })
	}

	const downloadedHash = createHash("sha256").update(downloaded).digest("hex")
	if (downloadedHash !== existingHash.value) {
		return fail(
			"conflict",
			`File '${destination}' already exists with different content. Aborting to avoid conflicts.`,
		)
	}

	consola.info(`Not overwriting existing and matching file '${destination}'.`)
	return { ok: true, value: { path: destination, status: "unchanged" } }
}

/**
 * Stream body into sink chunk by chunk. The body is cancelled when a write fails.
 */
export async function copyBody(
	body: ReadableStream<Uint8Array> | null,
	sink: Pick<FileHandle, "writeFile">,
	fail: Fail,
): Promise<StepResult> {
	if (!body) {
		return { ok: true, value: undefined }
	}

	const reader = body.getReader()
	while (true) {
		let chunk: Awaited<ReturnType<typeof reader.read>>
		try {
			chunk = await reader.read()
		} catch (error) {
			return toStep(
				fail("network", "Downloading failed.", {
					rawError: error instanceof Error ? error : undefined,
				}),
			)
		}

		if (chunk.done) {
			return { ok: true, value: undefined }
		}

		try {
			await sink.writeFile(chunk.value)
		} catch (error) {
			await cancelReader(reader)
			return toStep(
				fail("io", "Writing the download failed.", {
					rawError: error instanceof Error ? error : undefined,
				}),
			)
		}
	}
}

async function cancelReader(reader: { cancel(): Promise<void> }): Promise<void> {
	try {
		await reader.cancel()
	} catch (error) {
		consola.debug(
			`Unable to cancel the download: ${error instanceof Error ? error.message : String(error)}`,
		)
	}
}

async function closeHandle(
	handle: FileHandle,
	fail: Fail,
): Promise<StepResult> {
	try {
		await handle.close()
		return { ok: true, value: undefined }
	} catch (error) {
		return toStep(
			fail("io", "Unable to finish writing the download.", {
				rawError: error instanceof Error ? error : undefined,
			}),
		)
	}
}

function toStep(result: DownloadResult): StepResult {
	return result.ok ? { ok: true, value: undefined } : result
}
