export { HttpRequest, parseTarget } from "./request.ts";
export type { RequestTarget, RequestView } from "./request.ts";
export { HeaderMap } from "./headers.ts";
export type { HeaderInit } from "./headers.ts";
export { ExtensionKey, Extensions } from "./extensions.ts";
export {
	ResponseFilter,
	failureResponse,
	filterResponse,
	responseFromError,
	responseFromStatus,
} from "./response.ts";
export { fromFetchRequest, toFetchHandler } from "./fetch.ts";
