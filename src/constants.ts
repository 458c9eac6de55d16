/**
 * Shared constants for manifest handling and reference registration.
 */

/** Project manifest that records API document references */
export const MANIFEST_FILENAME = "apiref.toml"

/** Default download location for `add url`, relative to the working directory */
export const DEFAULT_OPENAPI_DIR = "openapi"
export const DEFAULT_OPENAPI_FILE = "openapi.json"

/** Reference tags, one array of tables per tag in the manifest */
export const OPENAPI_REFERENCE = "openapi-reference"
export const OPENAPI_PROJECT_REFERENCE = "openapi-project-reference"

export const REFERENCE_TAGS = [OPENAPI_REFERENCE, OPENAPI_PROJECT_REFERENCE] as const

/** Metadata key holding the source identity of a downloaded reference */
export const SOURCE_URL_KEY = "source-url"
export const CODE_GENERATOR_KEY = "code-generator"

/** Key holding the local path of a reference item */
export const INCLUDE_KEY = "include"
