import { Extensions } from "./http/extensions.ts";
import type { HeaderInit } from "./http/headers.ts";
import { HttpRequest } from "./http/request.ts";

export interface MockRequestInit {
	readonly method?: string;
	readonly headers?: HeaderInit;
	readonly extensions?: Extensions;
}

/**
 * HttpRequest for tests and examples.
 *
 * `mockRequest("https://example.test/a?b=c", { method: "POST" })`
 */
export function mockRequest(uri = "/", init: MockRequestInit = {}): HttpRequest {
	return new HttpRequest(
		init.method ?? "GET",
		uri,
		init.headers ?? {},
		init.extensions ?? new Extensions(),
	);
}

/** Status and text body of a response, for compact assertions. */
export async function readResponse(response: Response): Promise<{ status: number; body: string }> {
	return { status: response.status, body: await response.text() };
}
