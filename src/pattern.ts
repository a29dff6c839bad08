/**
 * Pattern tokenizer.
 *
 * A pattern is a literal template with `{}` wildcards. Paths are split on
 * `/` (one token per segment); query and header values are a single
 * unsegmented run split at each `{}`.
 *
 * Tokenizing is total: every string produces a pattern, and the empty
 * string produces the empty pattern (which only matches an empty subject).
 */

/** The reserved wildcard token. */
export const WILDCARD = "{}";

export interface LiteralToken {
	readonly kind: "literal";
	readonly text: string;
}

export interface WildcardToken {
	readonly kind: "wildcard";
}

export type Token = LiteralToken | WildcardToken;

export type Pattern = readonly Token[];

const WILDCARD_TOKEN: WildcardToken = Object.freeze({ kind: "wildcard" });

export function literal(text: string): LiteralToken {
	return { kind: "literal", text };
}

export function wildcard(): WildcardToken {
	return WILDCARD_TOKEN;
}

/**
 * Tokenize a path pattern, one token per `/`-separated segment.
 *
 * A segment is a wildcard only when it is exactly `{}`; `/a{}` is the
 * literal segment `a{}`. Leading and trailing slashes produce empty literal
 * segments, mirroring how the live path is split.
 */
export function tokenizePath(pattern: string): Pattern {
	if (pattern === "") return [];
	const tokens: Token[] = [];
	let start = 0;
	for (;;) {
		const end = pattern.indexOf("/", start);
		const segment = end < 0 ? pattern.slice(start) : pattern.slice(start, end);
		tokens.push(segment === WILDCARD ? WILDCARD_TOKEN : literal(segment));
		if (end < 0) return tokens;
		start = end + 1;
	}
}

/**
 * Tokenize a query or header value pattern.
 *
 * `Bearer {}` → [literal "Bearer ", wildcard]. Adjacent wildcards collapse
 * into one, and empty literals are dropped.
 */
export function tokenizeValue(pattern: string): Pattern {
	const tokens: Token[] = [];
	let start = 0;
	for (;;) {
		const idx = pattern.indexOf(WILDCARD, start);
		const end = idx < 0 ? pattern.length : idx;
		if (end > start) tokens.push(literal(pattern.slice(start, end)));
		if (idx < 0) return tokens;
		if (tokens.at(-1)?.kind !== "wildcard") tokens.push(WILDCARD_TOKEN);
		start = idx + WILDCARD.length;
	}
}

/** True when the pattern has no wildcard tokens. */
export function isLiteralPattern(pattern: Pattern): boolean {
	return pattern.every((t) => t.kind === "literal");
}

