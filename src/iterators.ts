import type { RequestView } from "./http/request.ts";

/** A borrowed `key=value` pair from a raw query string. */
export type QueryPair = readonly [key: string, value: string];

/**
 * Iterate the pairs of a raw query string in textual order.
 *
 * Pairs are `&`-separated and split at the first `=`. A pair without `=`
 * yields an empty value, and a stray `&` yields an empty key and value.
 * Nothing is decoded: `fo+ur` stays `fo+ur`. An absent or empty query
 * yields no pairs.
 */
export function* queryPairs(query: string | null): Generator<QueryPair, void, undefined> {
	if (query === null || query === "") return;
	let start = 0;
	for (;;) {
		const amp = query.indexOf("&", start);
		const end = amp < 0 ? query.length : amp;
		const eq = query.indexOf("=", start);
		if (eq >= 0 && eq < end) {
			yield [query.slice(start, eq), query.slice(eq + 1, end)];
		} else {
			yield [query.slice(start, end), ""];
		}
		if (amp < 0) return;
		start = amp + 1;
	}
}

/**
 * Iterate the `/`-separated segments of a path.
 *
 * Splits the same way `tokenizePath` does, so `/a/b` yields `""`, `"a"`,
 * `"b"`. The empty path yields nothing.
 */
export function* pathSegments(path: string): Generator<string, void, undefined> {
	if (path === "") return;
	let start = 0;
	for (;;) {
		const slash = path.indexOf("/", start);
		if (slash < 0) {
			yield path.slice(start);
			return;
		}
		yield path.slice(start, slash);
		start = slash + 1;
	}
}

/** Query pairs of a request. A fresh iterator is needed to re-scan. */
export function queryIter(request: RequestView): Generator<QueryPair, void, undefined> {
	return queryPairs(request.query);
}

/** Path segments of a request. */
export function pathIter(request: RequestView): Generator<string, void, undefined> {
	return pathSegments(request.path);
}
