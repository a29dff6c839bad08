import { Extensions } from "./extensions.ts";
import { HeaderMap, type HeaderInit } from "./headers.ts";

/**
 * Read-only view of an inbound request.
 *
 * This is everything the filters look at. The core never mutates it and
 * holds it only for the duration of one dispatch.
 */
export interface RequestView {
	readonly method: string;
	/** `https`, `http`, ... or null for origin-form targets. */
	readonly scheme: string | null;
	readonly authority: string | null;
	/** Path without query or fragment, still percent-encoded. */
	readonly path: string;
	/** Raw query string without the `?`, or null when there is none. */
	readonly query: string | null;
	readonly headers: HeaderMap;
	readonly extensions: Extensions;
}

/** Components of a request target. Nothing is decoded or normalized. */
export interface RequestTarget {
	readonly scheme: string | null;
	readonly authority: string | null;
	readonly path: string;
	readonly query: string | null;
}

const SCHEME_PREFIX = /^([A-Za-z][A-Za-z0-9+.-]*):\/\//;

/**
 * Split a request target into scheme, authority, path and query.
 *
 * Accepts absolute form (`https://host/a?b`) and origin form (`/a?b`). An
 * absolute URI without a path gets `/`. The fragment is dropped.
 */
export function parseTarget(uri: string): RequestTarget {
	let rest = uri;
	const hash = rest.indexOf("#");
	if (hash >= 0) rest = rest.slice(0, hash);

	let scheme: string | null = null;
	let authority: string | null = null;
	const prefix = SCHEME_PREFIX.exec(rest);
	if (prefix !== null) {
		scheme = prefix[1] ?? null;
		rest = rest.slice(prefix[0].length);
		const end = rest.search(/[/?]/);
		authority = end < 0 ? rest : rest.slice(0, end);
		rest = end < 0 ? "" : rest.slice(end);
		if (!rest.startsWith("/")) rest = `/${rest}`;
	}

	const q = rest.indexOf("?");
	if (q < 0) return { scheme, authority, path: rest, query: null };
	return { scheme, authority, path: rest.slice(0, q), query: rest.slice(q + 1) };
}

/**
 * Plain RequestView built from a method, a target URI and headers.
 *
 * Headers are looked up case-insensitively.
 */
export class HttpRequest implements RequestView {
	readonly scheme: string | null;
	readonly authority: string | null;
	readonly path: string;
	readonly query: string | null;
	readonly headers: HeaderMap;

	constructor(
		readonly method: string = "GET",
		readonly uri: string = "/",
		headers: HeaderInit = {},
		readonly extensions: Extensions = new Extensions(),
	) {
		const target = parseTarget(uri);
		this.scheme = target.scheme;
		this.authority = target.authority;
		this.path = target.path;
		this.query = target.query;
		this.headers = new HeaderMap(headers);
	}

	header(name: string): string | null {
		return this.headers.get(name);
	}
}
