/**
 * Dispatch outcomes and the combinators over them.
 *
 * A candidate route resolves to one of three outcomes. `no-match` means
 * "not this route" and lets the next candidate run; `failed` means the
 * route matched and its handler threw, which ends dispatch for the request.
 */

import type { FilterStatus } from "./filter.ts";
import { failureResponse, responseFromError, responseFromStatus } from "./http/response.ts";

export interface MatchedOutcome<Res> {
	readonly kind: "matched";
	readonly response: Res;
}

export interface FailedOutcome {
	readonly kind: "failed";
	readonly error: unknown;
}

export interface NoMatchOutcome {
	readonly kind: "no-match";
	/** Why each candidate tried so far was disqualified, in order. */
	readonly reasons: readonly FilterStatus[];
}

export type Outcome<Res = Response> = MatchedOutcome<Res> | FailedOutcome | NoMatchOutcome;

export function matched<Res>(response: Res): MatchedOutcome<Res> {
	return { kind: "matched", response };
}

export function failed(error: unknown): FailedOutcome {
	return { kind: "failed", error };
}

export function noMatch(reasons: readonly FilterStatus[] = []): NoMatchOutcome {
	return { kind: "no-match", reasons };
}

/**
 * Try `next` only once `first` has settled as `no-match`.
 *
 * The first `matched` or `failed` outcome wins. Reasons from consecutive
 * misses are concatenated.
 */
export async function orElse<Res>(
	first: Outcome<Res> | Promise<Outcome<Res>>,
	next: () => Outcome<Res> | Promise<Outcome<Res>>,
): Promise<Outcome<Res>> {
	const a = await first;
	if (a.kind !== "no-match") return a;
	const b = await next();
	if (b.kind !== "no-match") return b;
	return noMatch([...a.reasons, ...b.reasons]);
}

/**
 * Evaluate candidates strictly in order until one matches or fails.
 *
 * Later candidates are not started until the earlier ones have settled.
 */
export async function firstMatch<Res>(
	candidates: Iterable<() => Outcome<Res> | Promise<Outcome<Res>>>,
): Promise<Outcome<Res>> {
	const reasons: FilterStatus[] = [];
	for (const candidate of candidates) {
		const outcome = await candidate();
		if (outcome.kind !== "no-match") return outcome;
		reasons.push(...outcome.reasons);
	}
	return noMatch(reasons);
}

/** How no-match and failed outcomes become responses. */
export interface FallbackOptions {
	/** Response when no candidate matched. Defaults to an empty 404. */
	readonly onNoMatch?: (reasons: readonly FilterStatus[]) => Response;
	/** Response when a matched handler threw. Defaults to `responseFromError`. */
	readonly onError?: (error: unknown) => Response;
}

/**
 * Collapse an outcome into the response sent to the client. Never throws.
 *
 * A throwing `onError` falls back to `responseFromError` for the original
 * error; a throwing `onNoMatch` is rendered as that hook's error.
 */
export function resolveOutcome(outcome: Outcome, options: FallbackOptions = {}): Response {
	switch (outcome.kind) {
		case "matched":
			return outcome.response;
		case "failed": {
			if (options.onError === undefined) return responseFromError(outcome.error);
			try {
				return options.onError(outcome.error);
			} catch {
				return responseFromError(outcome.error);
			}
		}
		case "no-match": {
			if (options.onNoMatch === undefined) return responseFromStatus(404);
			try {
				return options.onNoMatch(outcome.reasons);
			} catch (error) {
				return responseFromError(error);
			}
		}
	}
}

/**
 * Pick one status for a set of disqualification reasons.
 *
 * 405 when some candidate failed on its method, 404 when some failed on
 * its path (or there were no candidates), 400 otherwise.
 */
export function statusForFailures(reasons: readonly FilterStatus[]): number {
	if (reasons.includes("FailMethod")) return 405;
	if (reasons.length === 0 || reasons.includes("FailPath")) return 404;
	return 400;
}

/** `onNoMatch` that answers with `statusForFailures`. */
export function statusFallback(reasons: readonly FilterStatus[]): Response {
	return failureResponse(statusForFailures(reasons));
}

