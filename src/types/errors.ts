import type { ZodError } from "zod"
import type { AbsolutePath, SourceUrl } from "@/src/types/branded"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type Result<T, E extends BaseError = ApiRefError> =
	| { ok: true; value: T }
	| { ok: false; error: E }

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: AbsolutePath
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: AbsolutePath
	  })

export interface ParseError extends BaseError {
	type: "parse"
	source: string
	path?: AbsolutePath
}

export interface IoError extends BaseError {
	type: "io"
	path: AbsolutePath
	operation: string
}

export interface NotFoundError extends BaseError {
	type: "not_found"
	target: string
	path?: AbsolutePath
}

export interface NetworkError extends BaseError {
	type: "network"
	source: string
	status?: number
}

export type InstallFailureReason = "missing" | "timeout" | "exit"

export interface InstallError extends BaseError {
	type: "install"
	reason: InstallFailureReason
	packageId: string
	projectDir: AbsolutePath
	exitCode?: number
	stdout: string
	stderr: string
}

export type DownloadFailureReason = "network" | "status" | "conflict" | "io"

export interface DownloadError extends BaseError {
	type: "download"
	reason: DownloadFailureReason
	url: SourceUrl
	path: AbsolutePath
	status?: number
}

export type ApiRefError =
	| ValidationError
	| ParseError
	| IoError
	| NotFoundError
	| NetworkError
	| InstallError
	| DownloadError
