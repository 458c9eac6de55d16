import type { AbsolutePath } from "@/src/types/branded"

export type ManifestDiscoveredAt = "cwd" | "parent" | "explicit"

export type ManifestOrigin = {
	sourcePath: AbsolutePath
	discoveredAt: ManifestDiscoveredAt
}
