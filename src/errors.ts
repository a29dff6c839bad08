/** Base class for errors raised by routesift itself. */
export class RouteError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RouteError";
	}
}

/**
 * Thrown by a handler to choose the fallback response.
 *
 * A matched handler that throws an HttpError is rendered with its status
 * and body; any other thrown value becomes a 500.
 */
export class HttpError extends RouteError {
	readonly status: number;
	readonly body: string | null;

	constructor(status: number, body: string | null = null) {
		super(body ?? `HTTP ${status}`);
		this.name = "HttpError";
		this.status = status;
		this.body = body;
	}
}
