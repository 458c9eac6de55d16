import type { IoError, Result } from "@/src/types/errors"

export type { IoError } from "@/src/types/errors"

export type IoResult<T> = Result<T, IoError>
