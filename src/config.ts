/**
 * Route table configuration.
 *
 * A route table is plain data (JSON, or YAML via parseRouteConfigYaml) that
 * names its handlers instead of holding them. Config-driven router path:
 *   data -> parseRouteConfig() -> RouteTableConfig -> HandlerRegistry.loadRouter() -> Router
 *
 *   routes:
 *     - match:
 *         method: [GET, HEAD]
 *         path: /item/{}
 *         query: [{ key: cool, value: yes }]
 *       handler: item
 *   fallback: status
 */

import { load } from "js-yaml";

import { RouteError } from "./errors.ts";
import type { FallbackPolicy } from "./router.ts";

// =====================================================================
// Config types
// =====================================================================

/** Path condition: whole-path or leading-segments match. */
export class PathMatchConfig {
	constructor(
		readonly type: "Exact" | "Prefix",
		readonly pattern: string,
	) {}
}

export class HeaderMatchConfig {
	constructor(
		readonly name: string,
		readonly value: string,
	) {}
}

export class QueryMatchConfig {
	constructor(
		readonly key: string,
		readonly value: string,
	) {}
}

/** All conditions of a route, ANDed. Absent conditions accept anything. */
export class RouteMatchConfig {
	constructor(
		readonly methods: readonly string[] | null = null,
		readonly scheme: string | null = null,
		readonly path: PathMatchConfig | null = null,
		readonly headers: readonly HeaderMatchConfig[] = [],
		readonly query: readonly QueryMatchConfig[] = [],
	) {}
}

export class RouteConfig {
	constructor(
		readonly match: RouteMatchConfig,
		readonly handler: string,
		readonly name: string | null = null,
	) {}
}

export class RouteTableConfig {
	constructor(
		readonly routes: readonly RouteConfig[],
		readonly fallback: FallbackPolicy = "not_found",
	) {}
}

// =====================================================================
// Parsing (unknown -> config types)
// =====================================================================

const FALLBACK_POLICIES: readonly FallbackPolicy[] = ["not_found", "status"];

/** Error parsing data into config types. */
export class ConfigParseError extends RouteError {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}

function expectString(value: unknown, what: string): string {
	if (typeof value !== "string") {
		throw new ConfigParseError(`${what} must be a string, got ${describe(value)}`);
	}
	return value;
}

/**
 * Parse an unknown value into a RouteTableConfig.
 *
 * Unknown keys are rejected so that typos (`paht:`) fail loudly.
 */
export function parseRouteConfig(data: unknown): RouteTableConfig {
	if (!isRecord(data)) {
		throw new ConfigParseError(`expected object, got ${describe(data)}`);
	}
	rejectUnknownKeys(data, ["routes", "fallback"], "route table");

	const rawRoutes = data.routes;
	if (rawRoutes === undefined) {
		throw new ConfigParseError("missing required field 'routes'");
	}
	if (!Array.isArray(rawRoutes)) {
		throw new ConfigParseError(`'routes' must be an array, got ${describe(rawRoutes)}`);
	}

	const routes = rawRoutes.map((r, i) => parseRoute(r, i));

	let fallback: FallbackPolicy = "not_found";
	if (data.fallback !== undefined) {
		const raw = expectString(data.fallback, "'fallback'");
		const policy = FALLBACK_POLICIES.find((p) => p === raw);
		if (policy === undefined) {
			throw new ConfigParseError(
				`unknown fallback "${raw}" (expected one of: ${FALLBACK_POLICIES.join(", ")})`,
			);
		}
		fallback = policy;
	}

	return new RouteTableConfig(routes, fallback);
}

/** Parse a YAML document into a RouteTableConfig. */
export function parseRouteConfigYaml(text: string): RouteTableConfig {
	let data: unknown;
	try {
		data = load(text);
	} catch (e) {
		throw new ConfigParseError(
			`invalid YAML: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	return parseRouteConfig(data);
}

function rejectUnknownKeys(obj: Record<string, unknown>, allowed: string[], what: string): void {
	const unknown = Object.keys(obj).filter((k) => !allowed.includes(k));
	if (unknown.length > 0) {
		throw new ConfigParseError(
			`${what} has unknown field(s): ${unknown.sort().join(", ")}`,
		);
	}
}

function parseRoute(data: unknown, index: number): RouteConfig {
	const what = `routes[${index}]`;
	if (!isRecord(data)) {
		throw new ConfigParseError(`${what} must be an object, got ${describe(data)}`);
	}
	rejectUnknownKeys(data, ["match", "handler", "name"], what);

	if (!("handler" in data)) {
		throw new ConfigParseError(`${what} missing required field 'handler'`);
	}
	const handler = expectString(data.handler, `${what}.handler`);
	const name = data.name === undefined ? null : expectString(data.name, `${what}.name`);
	const match = data.match === undefined ? new RouteMatchConfig() : parseMatch(data.match, what);
	return new RouteConfig(match, handler, name);
}

function parseMatch(data: unknown, route: string): RouteMatchConfig {
	const what = `${route}.match`;
	if (!isRecord(data)) {
		throw new ConfigParseError(`${what} must be an object, got ${describe(data)}`);
	}
	rejectUnknownKeys(data, ["method", "scheme", "path", "path_prefix", "headers", "query"], what);

	if (data.path !== undefined && data.path_prefix !== undefined) {
		throw new ConfigParseError(`${what}: at most one of 'path' or 'path_prefix' may be set`);
	}

	let methods: string[] | null = null;
	if (data.method !== undefined) {
		const raw = data.method;
		methods = Array.isArray(raw)
			? raw.map((m, i) => expectString(m, `${what}.method[${i}]`))
			: [expectString(raw, `${what}.method`)];
		if (methods.length === 0) {
			throw new ConfigParseError(`${what}.method must not be empty`);
		}
	}

	const scheme = data.scheme === undefined ? null : expectString(data.scheme, `${what}.scheme`);

	let path: PathMatchConfig | null = null;
	if (data.path !== undefined) {
		path = new PathMatchConfig("Exact", expectString(data.path, `${what}.path`));
	} else if (data.path_prefix !== undefined) {
		path = new PathMatchConfig("Prefix", expectString(data.path_prefix, `${what}.path_prefix`));
	}

	const headers = parseList(data.headers, `${what}.headers`, (entry, at) => {
		rejectUnknownKeys(entry, ["name", "value"], at);
		return new HeaderMatchConfig(
			expectString(entry.name, `${at}.name`),
			expectString(entry.value, `${at}.value`),
		);
	});
	const query = parseList(data.query, `${what}.query`, (entry, at) => {
		rejectUnknownKeys(entry, ["key", "value"], at);
		return new QueryMatchConfig(
			expectString(entry.key, `${at}.key`),
			expectString(entry.value, `${at}.value`),
		);
	});

	return new RouteMatchConfig(methods, scheme, path, headers, query);
}

function parseList<T>(
	data: unknown,
	what: string,
	parse: (entry: Record<string, unknown>, at: string) => T,
): T[] {
	if (data === undefined) return [];
	if (!Array.isArray(data)) {
		throw new ConfigParseError(`${what} must be an array, got ${describe(data)}`);
	}
	return data.map((entry, i) => {
		const at = `${what}[${i}]`;
		if (!isRecord(entry)) {
			throw new ConfigParseError(`${at} must be an object, got ${describe(entry)}`);
		}
		return parse(entry, at);
	});
}
