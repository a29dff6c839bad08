/**
 * Response construction and response-side filters.
 *
 * Responses are WHATWG Fetch `Response` objects, as shipped by Node.js.
 */

import { STATUS_CODES } from "node:http";

import { HttpError } from "../errors.ts";
import { WILDCARD, tokenizeValue } from "../pattern.ts";
import { matchValue } from "../segment-matcher.ts";

/** Empty-bodied response with the given status. */
export function responseFromStatus(status: number): Response {
	return new Response(null, { status });
}

/** Empty response with an explicit zero Content-Length. */
export function failureResponse(status: number): Response {
	return new Response(null, { status, headers: { "content-length": "0" } });
}

/** Statuses a Fetch `Response` can carry. */
function isResponseStatus(status: number): boolean {
	return Number.isInteger(status) && status >= 200 && status <= 599;
}

/** String form of a thrown value; `Object.create(null)` has none. */
function describeThrown(value: unknown): string {
	try {
		return String(value);
	} catch {
		return Object.prototype.toString.call(value);
	}
}

/**
 * Render a handler error as a response. Never throws.
 *
 * An HttpError keeps its status, with its body or else the status's reason
 * phrase. When that response cannot be built (a body on a 204, a status
 * outside 200-599) it degrades to an empty response with the status, or an
 * empty 500. Anything else becomes a 500 whose body is the error message.
 */
export function responseFromError(error: unknown): Response {
	if (error instanceof HttpError) {
		try {
			return new Response(error.body ?? STATUS_CODES[error.status] ?? null, {
				status: error.status,
			});
		} catch {
			return responseFromStatus(isResponseStatus(error.status) ? error.status : 500);
		}
	}
	const message = error instanceof Error ? error.message : describeThrown(error);
	return new Response(message, {
		status: 500,
		headers: { "content-type": "text/plain; charset=utf-8" },
	});
}

/**
 * Filter chain over a response, the response-side twin of `Filter`.
 *
 * Each step is skipped once the chain has failed.
 */
export class ResponseFilter {
	private static readonly FAILED = new ResponseFilter(null);

	private constructor(private readonly response: Response | null) {}

	static of(response: Response): ResponseFilter {
		return new ResponseFilter(response);
	}

	get isQualified(): boolean {
		return this.response !== null;
	}

	/** Status equals `status`, or satisfies it when given a range check. */
	filterStatus(status: number | ((status: number) => boolean)): ResponseFilter {
		return this.step((res) =>
			typeof status === "number" ? res.status === status : status(res.status),
		);
	}

	/**
	 * Header `name` has a value matching `pattern`. A `{}` name matches any
	 * header with such a value.
	 */
	filterHeader(name: string, pattern: string): ResponseFilter {
		const tokens = tokenizeValue(pattern);
		return this.step((res) => {
			if (name === WILDCARD) {
				for (const [, value] of res.headers) {
					if (matchValue(tokens, value)) return true;
				}
				return false;
			}
			const value = res.headers.get(name);
			return value !== null && matchValue(tokens, value);
		});
	}

	filterCustom(predicate: (response: Response) => boolean): ResponseFilter {
		return this.step(predicate);
	}

	andThen<T>(f: (response: Response) => T): T | null {
		return this.response === null ? null : f(this.response);
	}

	private step(check: (response: Response) => boolean): ResponseFilter {
		if (this.response === null || !check(this.response)) return ResponseFilter.FAILED;
		return this;
	}
}

/** Start a filter chain over a response. */
export function filterResponse(response: Response): ResponseFilter {
	return ResponseFilter.of(response);
}
