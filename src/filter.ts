/**
 * Short-circuiting filter chain over a request view.
 *
 * The chain state is either qualified (the request is still a candidate)
 * or disqualified (some predicate failed). Every step is a total
 * `FilterState → FilterState` function that leaves a disqualified state
 * untouched, so once a predicate fails no later predicate runs and the
 * chain cannot become qualified again.
 */

import { type Outcome, failed, matched, noMatch } from "./dispatch.ts";
import type { RequestView } from "./http/request.ts";
import { queryIter } from "./iterators.ts";
import { WILDCARD, tokenizePath, tokenizeValue } from "./pattern.ts";
import { matchPath, matchPathPrefix, matchValue } from "./segment-matcher.ts";

/** Which kind of predicate disqualified a chain. */
export type FilterStatus =
	| "FailMethod"
	| "FailScheme"
	| "FailPath"
	| "FailHeader"
	| "FailQuery"
	| "FailCustom";

export interface Qualified<Req extends RequestView> {
	readonly kind: "qualified";
	readonly request: Req;
	/** Captures of the most recent path filter; a later one replaces them. */
	readonly pathVars: readonly string[];
}

export interface Disqualified {
	readonly kind: "disqualified";
	readonly status: FilterStatus;
}

export type FilterState<Req extends RequestView> = Qualified<Req> | Disqualified;

export function qualify<Req extends RequestView>(
	request: Req,
	pathVars: readonly string[] = [],
): Qualified<Req> {
	return { kind: "qualified", request, pathVars };
}

export function disqualify(status: FilterStatus): Disqualified {
	return { kind: "disqualified", status };
}

// =====================================================================
// State transitions
// =====================================================================

/** Run `check` on a qualified state; pass a disqualified one through. */
function guard<Req extends RequestView>(
	state: FilterState<Req>,
	status: FilterStatus,
	check: (request: Req) => boolean,
): FilterState<Req> {
	if (state.kind === "disqualified") return state;
	return check(state.request) ? state : disqualify(status);
}

export function applyMethod<Req extends RequestView>(
	state: FilterState<Req>,
	method: string | readonly string[],
): FilterState<Req> {
	return guard(state, "FailMethod", (req) =>
		typeof method === "string" ? req.method === method : method.includes(req.method),
	);
}

export function applyScheme<Req extends RequestView>(
	state: FilterState<Req>,
	scheme: string,
): FilterState<Req> {
	const expected = scheme.toLowerCase();
	return guard(state, "FailScheme", (req) => req.scheme?.toLowerCase() === expected);
}

export function applyPath<Req extends RequestView>(
	state: FilterState<Req>,
	pattern: string,
	prefix = false,
): FilterState<Req> {
	if (state.kind === "disqualified") return state;
	const tokens = tokenizePath(pattern);
	const captures = prefix
		? matchPathPrefix(tokens, state.request.path)
		: matchPath(tokens, state.request.path);
	return captures === null ? disqualify("FailPath") : qualify(state.request, captures);
}

export function applyHeader<Req extends RequestView>(
	state: FilterState<Req>,
	name: string,
	pattern: string,
): FilterState<Req> {
	return guard(state, "FailHeader", (req) => {
		const tokens = tokenizeValue(pattern);
		if (name === WILDCARD) {
			for (const value of req.headers.values()) {
				if (matchValue(tokens, value)) return true;
			}
			return false;
		}
		const value = req.headers.get(name);
		return value !== null && matchValue(tokens, value);
	});
}

export function applyQuery<Req extends RequestView>(
	state: FilterState<Req>,
	key: string,
	pattern: string,
): FilterState<Req> {
	return guard(state, "FailQuery", (req) => {
		const tokens = tokenizeValue(pattern);
		for (const [k, v] of queryIter(req)) {
			if (key === WILDCARD) {
				if (matchValue(tokens, v)) return true;
			} else if (k === key) {
				return matchValue(tokens, v);
			}
		}
		return false;
	});
}

export function applyCustom<Req extends RequestView>(
	state: FilterState<Req>,
	predicate: (request: Req) => boolean,
): FilterState<Req> {
	return guard(state, "FailCustom", predicate);
}

// =====================================================================
// Fluent chain
// =====================================================================

/** A request that passed every filter, with its path captures. */
export class Matched<Req extends RequestView = RequestView> {
	constructor(
		readonly request: Req,
		readonly pathVars: readonly string[],
	) {}

	/** 1-based: `pathVar(1)` is the first wildcard of the last path filter. */
	pathVar(index: number): string | null {
		if (!Number.isInteger(index) || index < 1) return null;
		return this.pathVars[index - 1] ?? null;
	}
}

/**
 * Fluent wrapper around a FilterState.
 *
 *   filter(request)
 *     .filterMethod("GET")
 *     .filterPath("/item/{}")
 *     .filterQuery("cool", "yes")
 *     .handle((m) => new Response(`Got any ${m.pathVar(1)}?`));
 */
export class Filter<Req extends RequestView = RequestView> {
	constructor(readonly state: FilterState<Req>) {}

	get isQualified(): boolean {
		return this.state.kind === "qualified";
	}

	/** The request, or null once disqualified. */
	get request(): Req | null {
		return this.state.kind === "qualified" ? this.state.request : null;
	}

	/** Captures of the last path filter; empty once disqualified. */
	get pathVars(): readonly string[] {
		return this.state.kind === "qualified" ? this.state.pathVars : [];
	}

	/** Why the chain was disqualified, or null while it is qualified. */
	get status(): FilterStatus | null {
		return this.state.kind === "disqualified" ? this.state.status : null;
	}

	pathVar(index: number): string | null {
		return this.andThen((m) => m.pathVar(index));
	}

	/** Exact, case-sensitive method. A list accepts any of its members. */
	filterMethod(method: string | readonly string[]): Filter<Req> {
		return this.next(applyMethod(this.state, method));
	}

	/** Case-insensitive scheme; origin-form requests have none and fail. */
	filterScheme(scheme: string): Filter<Req> {
		return this.next(applyScheme(this.state, scheme));
	}

	/**
	 * Whole-path match. `{}` matches exactly one non-empty segment, so
	 * `/{}` matches `/any` but not `/any/more`.
	 */
	filterPath(pattern: string): Filter<Req> {
		return this.next(applyPath(this.state, pattern));
	}

	/** Leading-segments match: `/api` matches `/api/users` but not `/apis`. */
	filterPathPrefix(pattern: string): Filter<Req> {
		return this.next(applyPath(this.state, pattern, true));
	}

	/**
	 * The first value of header `name` matches `pattern`. A `{}` name
	 * matches any header value.
	 */
	filterHeader(name: string, pattern: string): Filter<Req> {
		return this.next(applyHeader(this.state, name, pattern));
	}

	/**
	 * The first query pair with key `key` has a value matching `pattern`.
	 * Neither side is decoded: `also+cool` must be written as such.
	 */
	filterQuery(key: string, pattern: string): Filter<Req> {
		return this.next(applyQuery(this.state, key, pattern));
	}

	/** Caller predicate; never invoked on a disqualified chain. */
	filterCustom(predicate: (request: Req) => boolean): Filter<Req> {
		return this.next(applyCustom(this.state, predicate));
	}

	/** `f(matched)` when qualified, null otherwise. */
	andThen<T>(f: (match: Matched<Req>) => T): T | null {
		if (this.state.kind === "disqualified") return null;
		return f(new Matched(this.state.request, this.state.pathVars));
	}

	/**
	 * Run a synchronous handler when qualified.
	 *
	 * A thrown error becomes a `failed` outcome; a disqualified chain yields
	 * `no-match` without calling `handler`.
	 */
	handle<Res = Response>(handler: (match: Matched<Req>) => Res): Outcome<Res> {
		if (this.state.kind === "disqualified") return noMatch([this.state.status]);
		try {
			return matched(handler(new Matched(this.state.request, this.state.pathVars)));
		} catch (error) {
			return failed(error);
		}
	}

	/**
	 * Run an asynchronous handler when qualified.
	 *
	 * Filtering has already happened synchronously; the only suspension is
	 * inside `handler`.
	 */
	async asyncHandle<Res = Response>(
		handler: (match: Matched<Req>) => Promise<Res>,
	): Promise<Outcome<Res>> {
		if (this.state.kind === "disqualified") return noMatch([this.state.status]);
		try {
			return matched(await handler(new Matched(this.state.request, this.state.pathVars)));
		} catch (error) {
			return failed(error);
		}
	}

	private next(state: FilterState<Req>): Filter<Req> {
		return state === this.state ? this : new Filter(state);
	}
}

/** Lift a request view into a qualified filter chain. */
export function filter<Req extends RequestView>(request: Req): Filter<Req> {
	return new Filter(qualify(request));
}
