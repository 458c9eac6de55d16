export interface PackageRequirement {
	packageId: string
	version: string
}

/**
 * Requirements keyed by lowercased package id.
 */
export type PackageRequirements = ReadonlyMap<string, PackageRequirement>

/**
 * Build a requirement set from (id, version) pairs. Ids compare
 * case-insensitively and a later pair replaces an earlier one.
 */
export function buildRequirements(
	entries: Iterable<readonly [string, string]>,
): PackageRequirements {
	const requirements = new Map<string, PackageRequirement>()
	for (const [packageId, version] of entries) {
		requirements.set(packageId.toLowerCase(), { packageId, version })
	}
	return requirements
}
