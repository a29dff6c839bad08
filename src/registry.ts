/**
 * Handler registry for config-driven routers.
 *
 * Route tables name their handlers; the registry maps those names to
 * functions and compiles a RouteTableConfig into a Router.
 *
 *   const registry = new HandlerRegistryBuilder()
 *     .handler("item", (m) => new Response(`Got any ${m.pathVar(1)}?`))
 *     .build();
 *
 *   const router = registry.loadRouter(parseRouteConfigYaml(text));
 */

import type { RouteConfig, RouteTableConfig } from "./config.ts";
import { RouteError } from "./errors.ts";
import type { Filter } from "./filter.ts";
import type { RequestView } from "./http/request.ts";
import { type Handler, Router, type RouterOptions } from "./router.ts";

// =====================================================================
// Limits
// =====================================================================

export const MAX_ROUTES = 256;
export const MAX_PATTERN_LENGTH = 8192;

// =====================================================================
// Error types
// =====================================================================

/** A route names a handler that was never registered. */
export class UnknownHandlerError extends RouteError {
	readonly handler: string;
	readonly available: string[];

	constructor(handler: string, available: string[]) {
		const sorted = [...available].sort();
		const msg =
			sorted.length > 0
				? `unknown handler: "${handler}" (registered: ${sorted.join(", ")})`
				: `unknown handler: "${handler}" (no handlers are registered)`;
		super(msg);
		this.name = "UnknownHandlerError";
		this.handler = handler;
		this.available = sorted;
	}
}

/** Route table has too many routes. */
export class TooManyRoutesError extends RouteError {
	readonly count: number;
	readonly max: number;

	constructor(count: number, max: number) {
		super(`too many routes: ${count} exceeds maximum ${max}`);
		this.name = "TooManyRoutesError";
		this.count = count;
		this.max = max;
	}
}

/** A path, header or query pattern exceeds the length limit. */
export class PatternTooLongError extends RouteError {
	readonly length: number;
	readonly max: number;

	constructor(length: number, max: number) {
		super(`pattern length ${length} exceeds maximum ${max}`);
		this.name = "PatternTooLongError";
		this.length = length;
		this.max = max;
	}
}

// =====================================================================
// Builder
// =====================================================================

/**
 * Builder for a HandlerRegistry. Registering a name twice keeps the later
 * handler.
 */
export class HandlerRegistryBuilder<Req extends RequestView = RequestView> {
	private readonly handlers = new Map<string, Handler<Req>>();

	handler(name: string, handler: Handler<Req>): this {
		this.handlers.set(name, handler);
		return this;
	}

	/** Freeze the registry. No further registration is possible. */
	build(): HandlerRegistry<Req> {
		return new HandlerRegistry(new Map(this.handlers));
	}
}

// =====================================================================
// Registry
// =====================================================================

export class HandlerRegistry<Req extends RequestView = RequestView> {
	private readonly handlers: ReadonlyMap<string, Handler<Req>>;

	constructor(handlers: Map<string, Handler<Req>>) {
		this.handlers = handlers;
		Object.freeze(this);
	}

	/**
	 * Compile a route table into a Router.
	 *
	 * Every handler name is resolved and every pattern length checked up
	 * front, so a bad table fails here rather than at dispatch time.
	 * `options.fallback` is taken from the table unless given explicitly.
	 */
	loadRouter(config: RouteTableConfig, options: RouterOptions = {}): Router<Req> {
		if (config.routes.length > MAX_ROUTES) {
			throw new TooManyRoutesError(config.routes.length, MAX_ROUTES);
		}

		const router = new Router<Req>({ ...options, fallback: options.fallback ?? config.fallback });
		for (const route of config.routes) {
			const handler = this.handlers.get(route.handler);
			if (handler === undefined) {
				throw new UnknownHandlerError(route.handler, [...this.handlers.keys()]);
			}
			router.route(compileRoute(route), handler, route.name ?? route.handler);
		}
		return router;
	}

	/** Number of registered handlers. */
	get size(): number {
		return this.handlers.size;
	}

	has(name: string): boolean {
		return this.handlers.has(name);
	}

	/** Registered handler names (sorted). */
	names(): string[] {
		return [...this.handlers.keys()].sort();
	}
}

// =====================================================================
// Route compilation
// =====================================================================

function checkPatternLength(pattern: string): void {
	if (pattern.length > MAX_PATTERN_LENGTH) {
		throw new PatternTooLongError(pattern.length, MAX_PATTERN_LENGTH);
	}
}

/**
 * Turn a route's match config into a filter builder. Conditions apply in a
 * fixed order: scheme, method, path, headers, query.
 */
function compileRoute<Req extends RequestView>(
	route: RouteConfig,
): (chain: Filter<Req>) => Filter<Req> {
	const { methods, scheme, path, headers, query } = route.match;
	if (path !== null) checkPatternLength(path.pattern);
	for (const h of headers) checkPatternLength(h.value);
	for (const q of query) checkPatternLength(q.value);

	return (chain) => {
		let f = chain;
		if (scheme !== null) f = f.filterScheme(scheme);
		if (methods !== null) f = f.filterMethod(methods);
		if (path !== null) {
			f = path.type === "Exact" ? f.filterPath(path.pattern) : f.filterPathPrefix(path.pattern);
		}
		for (const h of headers) f = f.filterHeader(h.name, h.value);
		for (const q of query) f = f.filterQuery(q.key, q.value);
		return f;
	};
}
