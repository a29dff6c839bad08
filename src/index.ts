// HTTP boundary types: import from "routesift/http"
// Test utilities (mockRequest): import from "routesift/testing"

// Patterns
export {
	WILDCARD,
	isLiteralPattern,
	literal,
	tokenizePath,
	tokenizeValue,
	wildcard,
} from "./pattern.ts";
export type { LiteralToken, Pattern, Token, WildcardToken } from "./pattern.ts";
export { matchPath, matchPathPrefix, matchValue } from "./segment-matcher.ts";
export { pathIter, pathSegments, queryIter, queryPairs } from "./iterators.ts";
export type { QueryPair } from "./iterators.ts";

// Filter chain
export {
	Filter,
	Matched,
	applyCustom,
	applyHeader,
	applyMethod,
	applyPath,
	applyQuery,
	applyScheme,
	disqualify,
	filter,
	qualify,
} from "./filter.ts";
export type { Disqualified, FilterState, FilterStatus, Qualified } from "./filter.ts";

// Dispatch
export {
	failed,
	firstMatch,
	matched,
	noMatch,
	orElse,
	resolveOutcome,
	statusFallback,
	statusForFailures,
} from "./dispatch.ts";
export type {
	FailedOutcome,
	FallbackOptions,
	MatchedOutcome,
	NoMatchOutcome,
	Outcome,
} from "./dispatch.ts";
export { Route, Router } from "./router.ts";
export type { FallbackPolicy, FilterBuilder, Handler, RouterOptions } from "./router.ts";
export { HttpError, RouteError } from "./errors.ts";

// Config
export {
	ConfigParseError,
	HeaderMatchConfig,
	PathMatchConfig,
	QueryMatchConfig,
	RouteConfig,
	RouteMatchConfig,
	RouteTableConfig,
	parseRouteConfig,
	parseRouteConfigYaml,
} from "./config.ts";

// Registry
export {
	HandlerRegistry,
	HandlerRegistryBuilder,
	MAX_PATTERN_LENGTH,
	MAX_ROUTES,
	PatternTooLongError,
	TooManyRoutesError,
	UnknownHandlerError,
} from "./registry.ts";

// Logging
export { consoleLogger, requestId, silentLogger } from "./logger.ts";
export type { DispatchLogger, RequestLogEntry, ResponseLogEntry } from "./logger.ts";
