export const METADATA_PREFIX = "metadata:";
const DEFAULT_METADATA_HOST = "metadata.google.internal";
const DEFAULT_METADATA_TIMEOUT_MS = 10000;

export type SecretResolver = {
	resolve: (key: string) => Promise<string>;
};

export type MetadataResolverOptions = {
	host?: string;
	timeoutMs?: number;
	fetch?: typeof fetch;
};

/**
 * Reads project attributes from the compute metadata server.
 */
export const createMetadataResolver = (
	options: MetadataResolverOptions = {},
): SecretResolver => {
	const host =
		options.host ?? process.env.GCE_METADATA_HOST ?? DEFAULT_METADATA_HOST;
	const timeoutMs = options.timeoutMs ?? DEFAULT_METADATA_TIMEOUT_MS;
	const fetchImpl = options.fetch ?? fetch;

	return {
		resolve: async (key) => {
			const url = `http://${host}/computeMetadata/v1/project/attributes/${encodeURIComponent(key)}`;
			const response = await fetchImpl(url, {
				headers: { "Metadata-Flavor": "Google" },
				signal: AbortSignal.timeout(timeoutMs),
			});
			if (!response.ok) {
				throw new Error(
					`metadata server returned ${response.status} for attribute '${key}'`,
				);
			}
			return response.text();
		},
	};
};

export const resolveSecretValue = async (
	value: string,
	resolver: SecretResolver,
): Promise<string> => {
	if (!value.startsWith(METADATA_PREFIX)) {
		return value;
	}
	const key = value.slice(METADATA_PREFIX.length);
	try {
		return await resolver.resolve(key);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(
			`Could not get project metadata value "${value}": ${message}`,
		);
	}
};
