const CREDENTIAL_RE = /^(https?:\/\/)([^@]+)@/i;

export const REDACTED_FROM = "<REDACTED (FROM)>";
export const REDACTED_TO = "<REDACTED (TO)>";

export const redactRepoUrl = (repo: string) => {
	// Redact any credentials before @ in HTTP(S) URLs
	let redacted = repo.replace(CREDENTIAL_RE, "$1***@");
	// Also handle user:password@ format anywhere in free text
	redacted = redacted.replace(/\/\/[^@:/\s]+:[^@/\s]+@/g, "//*****:*****@");
	return redacted;
};

export type Endpoints = {
	from: string;
	to: string;
};

const escapeRegExp = (value: string) =>
	value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Replaces every literal occurrence of a job's endpoints with fixed
 * placeholders, then masks any other credential-bearing URL left in the text.
 * Both endpoints go in one pass, so a placeholder is never rewritten.
 */
export const redactEndpoints = (text: string, endpoints: Endpoints) => {
	// Longest first, so an endpoint that contains the other is removed whole
	const replacements = new Map<string, string>();
	for (const [literal, placeholder] of [
		[endpoints.from, REDACTED_FROM],
		[endpoints.to, REDACTED_TO],
	] as const) {
		if (literal.length > 0 && !replacements.has(literal)) {
			replacements.set(literal, placeholder);
		}
	}
	if (replacements.size === 0) {
		return redactRepoUrl(text);
	}
	const pattern = new RegExp(
		[...replacements.keys()]
			.sort((left, right) => right.length - left.length)
			.map(escapeRegExp)
			.join("|"),
		"g",
	);
	return redactRepoUrl(
		text.replace(pattern, (match) => replacements.get(match) ?? match),
	);
};
