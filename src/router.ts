import {
	type FallbackOptions,
	type Outcome,
	failed,
	firstMatch,
	resolveOutcome,
	statusFallback,
} from "./dispatch.ts";
import { Filter, type FilterStatus, type Matched, qualify } from "./filter.ts";
import type { RequestView } from "./http/request.ts";
import { type DispatchLogger, requestId, silentLogger } from "./logger.ts";

/** Narrows a fresh chain down to the requests a route accepts. */
export type FilterBuilder<Req extends RequestView> = (chain: Filter<Req>) => Filter<Req>;

/** Produces the response for a matched request, synchronously or not. */
export type Handler<Req extends RequestView> = (
	match: Matched<Req>,
) => Response | Promise<Response>;

/** One candidate: a filter builder paired with its handler. */
export class Route<Req extends RequestView> {
	constructor(
		readonly when: FilterBuilder<Req>,
		readonly handler: Handler<Req>,
		readonly name: string | null = null,
	) {}

	/**
	 * Filter `request` and, if it qualifies, run the handler.
	 *
	 * Filtering is synchronous. A filter builder or predicate that throws,
	 * and a handler that throws or rejects, both yield a `failed` outcome.
	 */
	async evaluate(request: Req): Promise<Outcome> {
		let chain: Filter<Req>;
		try {
			chain = this.when(new Filter(qualify(request)));
		} catch (error) {
			return failed(error);
		}
		return chain.asyncHandle(async (match) => this.handler(match));
	}
}

/**
 * What to answer when no route matched: `"not_found"` is always an empty
 * 404; `"status"` picks 404, 405 or 400 from the disqualification reasons.
 */
export type FallbackPolicy = "not_found" | "status";

export interface RouterOptions {
	readonly fallback?: FallbackPolicy;
	/** Overrides `fallback` when given. */
	readonly onNoMatch?: (reasons: readonly FilterStatus[]) => Response;
	readonly onError?: (error: unknown) => Response;
	readonly logger?: DispatchLogger;
}

/**
 * Ordered route list with first-match-wins dispatch.
 *
 * Routes are tried strictly in registration order, each one only after the
 * previous has settled as no-match. A route whose handler fails ends
 * dispatch: later routes are not tried.
 */
export class Router<Req extends RequestView = RequestView> {
	private readonly routes: Route<Req>[] = [];
	private readonly fallback: FallbackOptions;
	private readonly logger: DispatchLogger;

	constructor(options: RouterOptions = {}) {
		const onNoMatch =
			options.onNoMatch ?? (options.fallback === "status" ? statusFallback : undefined);
		this.fallback = { onNoMatch, onError: options.onError };
		this.logger = options.logger ?? silentLogger;
	}

	/** Append a route. Earlier routes take precedence. */
	route(when: FilterBuilder<Req>, handler: Handler<Req>, name?: string): this {
		this.routes.push(new Route(when, handler, name ?? null));
		return this;
	}

	/** Number of registered routes. */
	get size(): number {
		return this.routes.length;
	}

	/** Route names in precedence order; unnamed routes appear as null. */
	names(): (string | null)[] {
		return this.routes.map((r) => r.name);
	}

	/** Evaluate routes in order and return the first decisive outcome. */
	async evaluate(request: Req): Promise<Outcome> {
		const { outcome } = await this.select(request);
		return outcome;
	}

	/** Evaluate and turn the outcome into the response to send. */
	async dispatch(request: Req): Promise<Response> {
		const id = requestId();
		const startTime = Date.now();
		this.logger.request({ id, startTime, method: request.method, path: request.path });

		const { outcome, route } = await this.select(request);
		const response = resolveOutcome(outcome, this.fallback);

		const endTime = Date.now();
		this.logger.response({
			id,
			startTime,
			endTime,
			deltaTime: endTime - startTime,
			status: response.status,
			outcome: outcome.kind,
			route: route?.name ?? null,
		});
		return response;
	}

	private async select(request: Req): Promise<{ outcome: Outcome; route: Route<Req> | null }> {
		let decided: Route<Req> | null = null;
		const outcome = await firstMatch(
			this.routes.map((route) => async () => {
				const result = await route.evaluate(request);
				if (result.kind !== "no-match") decided = route;
				return result;
			}),
		);
		return { outcome, route: decided };
	}
}
