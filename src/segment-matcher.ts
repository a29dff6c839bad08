/**
 * Positional matching of tokenized patterns against live values.
 *
 * Path matching is per segment and captures wildcards; value matching
 * (query values, header values) runs over the whole string. Both compare
 * byte-exact and case-sensitive, with no percent-decoding.
 */

import { pathSegments } from "./iterators.ts";
import type { Pattern } from "./pattern.ts";

/**
 * Match a path pattern against a live path.
 *
 * Returns the wildcard captures in left-to-right order, or `null` when the
 * path does not match. Segment counts must be equal; a wildcard stands for
 * exactly one non-empty segment.
 */
export function matchPath(pattern: Pattern, path: string): string[] | null {
	if (pattern.length === 0) return path === "" ? [] : null;

	const captures: string[] = [];
	let i = 0;
	for (const segment of pathSegments(path)) {
		const token = pattern[i];
		if (token === undefined) return null;
		if (token.kind === "wildcard") {
			if (segment === "") return null;
			captures.push(segment);
		} else if (token.text !== segment) {
			return null;
		}
		i++;
	}
	return i === pattern.length ? captures : null;
}

/**
 * Match a path pattern against the leading segments of a live path.
 *
 * Whole segments only: `/var` is a prefix of `/var/static` but `/v` is not.
 * A trailing slash on the pattern is ignored, so `/` prefixes every
 * absolute path.
 */
export function matchPathPrefix(pattern: Pattern, path: string): string[] | null {
	if (pattern.length === 0) return path === "" ? [] : null;

	const last = pattern.at(-1);
	const effective =
		pattern.length > 1 && last?.kind === "literal" && last.text === ""
			? pattern.slice(0, -1)
			: pattern;

	const captures: string[] = [];
	const segments = pathSegments(path);
	for (const token of effective) {
		const next = segments.next();
		if (next.done) return null;
		const segment = next.value;
		if (token.kind === "wildcard") {
			if (segment === "") return null;
			captures.push(segment);
		} else if (token.text !== segment) {
			return null;
		}
	}
	return captures;
}

/**
 * Match a value pattern against a query or header value.
 *
 * A literal must sit at the current position; the first literal is thus
 * anchored at the start, and a literal that ends the pattern is anchored at
 * the end. A wildcard absorbs any run (possibly empty) up to the first
 * occurrence of the literal that follows it.
 */
export function matchValue(pattern: Pattern, value: string): boolean {
	if (pattern.length === 0) return value === "";

	let pos = 0;
	for (let i = 0; i < pattern.length; i++) {
		const token = pattern[i];
		if (token === undefined) break;

		if (token.kind === "literal") {
			if (!value.startsWith(token.text, pos)) return false;
			pos += token.text.length;
			continue;
		}

		const next = pattern[i + 1];
		if (next === undefined) return true;
		if (next.kind === "wildcard") continue;

		if (i + 1 === pattern.length - 1) {
			const tail = value.length - next.text.length;
			return tail >= pos && value.endsWith(next.text);
		}
		const found = value.indexOf(next.text, pos);
		if (found < 0) return false;
		pos = found;
	}
	return pos === value.length;
}
