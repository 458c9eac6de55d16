import { z } from "zod"

const str = () => z.string().trim().min(1)

export const schema = z.object({
	APIREF_INSTALL_TIMEOUT_MS: z.coerce
		.number()
		.int()
		.positive()
		.optional()
		.default(20_000),
	APIREF_NPM_PATH: str().optional().default("npm"),
	APIREF_PACKAGE_VERSIONS_URL: str()
		.url()
		.optional()
		.default("https://aka.apiref.dev/package-versions.json"),
	APIREF_VERSION_LOOKUP_TIMEOUT_MS: z.coerce
		.number()
		.int()
		.positive()
		.optional()
		.default(5_000),
})

export type Env = z.infer<typeof schema>

export const env: Env = schema.parse(process.env)
