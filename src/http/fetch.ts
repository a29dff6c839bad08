/**
 * Adapters between the WHATWG Fetch types Node.js ships and the router.
 */

import type { Router } from "../router.ts";
import { Extensions } from "./extensions.ts";
import { HttpRequest, type RequestView } from "./request.ts";

/** View a Fetch `Request` as a RequestView. The body is left untouched. */
export function fromFetchRequest(
	request: Request,
	extensions: Extensions = new Extensions(),
): HttpRequest {
	return new HttpRequest(request.method, request.url, request.headers, extensions);
}

/** Wrap a router as a `(Request) => Promise<Response>` fetch handler. */
export function toFetchHandler(
	router: Router<RequestView>,
): (request: Request) => Promise<Response> {
	return (request) => router.dispatch(fromFetchRequest(request));
}
