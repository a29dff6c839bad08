import { describe, expect, it } from "vitest";
import { ExtensionKey, Extensions } from "../src/http/extensions.ts";
import { fromFetchRequest, toFetchHandler } from "../src/http/fetch.ts";
import { HeaderMap } from "../src/http/headers.ts";
import { HttpRequest, parseTarget } from "../src/http/request.ts";
import {
	ResponseFilter,
	failureResponse,
	filterResponse,
	responseFromError,
	responseFromStatus,
} from "../src/http/response.ts";
import { HttpError, RouteError } from "../src/errors.ts";
import { Router } from "../src/router.ts";
import { readResponse } from "../src/testing.ts";

describe("parseTarget", () => {
	it("absolute form", () => {
		expect(parseTarget("https://www.example.test/a/b?x=1#top")).toEqual({
			scheme: "https",
			authority: "www.example.test",
			path: "/a/b",
			query: "x=1",
		});
	});

	it("absolute form without a path", () => {
		expect(parseTarget("https://www.example.test")).toEqual({
			scheme: "https",
			authority: "www.example.test",
			path: "/",
			query: null,
		});
		expect(parseTarget("http://host:8080?q")).toEqual({
			scheme: "http",
			authority: "host:8080",
			path: "/",
			query: "q",
		});
	});

	it("origin form", () => {
		expect(parseTarget("/item/grapes?cool=yes")).toEqual({
			scheme: null,
			authority: null,
			path: "/item/grapes",
			query: "cool=yes",
		});
	});

	it("empty query is not absent", () => {
		expect(parseTarget("/a?").query).toBe("");
		expect(parseTarget("/a").query).toBeNull();
	});

	it("nothing is decoded", () => {
		expect(parseTarget("/a%20b?q=a+b").path).toBe("/a%20b");
		expect(parseTarget("/a%20b?q=a+b").query).toBe("q=a+b");
	});
});

describe("HttpRequest", () => {
	it("defaults to GET /", () => {
		const req = new HttpRequest();
		expect(req.method).toBe("GET");
		expect(req.path).toBe("/");
		expect(req.uri).toBe("/");
		expect(req.headers.size).toBe(0);
		expect(req.extensions.size).toBe(0);
	});

	it("exposes the parsed target and headers", () => {
		const req = new HttpRequest("PUT", "https://example.test/x?y=z", { Accept: "text/html" });
		expect(req.scheme).toBe("https");
		expect(req.authority).toBe("example.test");
		expect(req.path).toBe("/x");
		expect(req.query).toBe("y=z");
		expect(req.header("accept")).toBe("text/html");
		expect(req.header("missing")).toBeNull();
	});
});

describe("HeaderMap", () => {
	it("looks names up case-insensitively", () => {
		const headers = new HeaderMap({ "Content-Type": "text/plain" });
		expect(headers.get("content-type")).toBe("text/plain");
		expect(headers.get("CONTENT-TYPE")).toBe("text/plain");
		expect(headers.has("Content-type")).toBe(true);
	});

	it("keeps repeated values in order", () => {
		const headers = new HeaderMap([
			["Accept", "text/html"],
			["accept", "application/json"],
		]);
		expect(headers.get("accept")).toBe("text/html");
		expect(headers.getAll("accept")).toEqual(["text/html", "application/json"]);
		expect(headers.size).toBe(1);
	});

	it("accepts value lists in a record", () => {
		const headers = new HeaderMap({ vary: ["accept", "origin"], host: "example.test" });
		expect([...headers.values()]).toEqual(["accept", "origin", "example.test"]);
		expect([...headers]).toEqual([
			["vary", "accept"],
			["vary", "origin"],
			["host", "example.test"],
		]);
	});

	it("absent names", () => {
		const headers = new HeaderMap();
		expect(headers.get("x")).toBeNull();
		expect(headers.getAll("x")).toEqual([]);
		expect(headers.has("x")).toBe(false);
	});

	it("accepts Fetch Headers", () => {
		const headers = new HeaderMap(new Headers({ "X-Trace": "abc" }));
		expect(headers.get("x-trace")).toBe("abc");
	});
});

describe("Extensions", () => {
	const USER = new ExtensionKey<{ id: number }>("user");
	const TRACE = new ExtensionKey<string>("trace");

	it("stores typed values by key", () => {
		const bag = new Extensions().insert(USER, { id: 7 }).insert(TRACE, "t-1");
		expect(bag.get(USER)).toEqual({ id: 7 });
		expect(bag.get(TRACE)).toBe("t-1");
		expect(bag.has(USER)).toBe(true);
		expect(bag.size).toBe(2);
		expect(bag.names()).toEqual(["user", "trace"]);
	});

	it("bags are independent", () => {
		const a = new Extensions().insert(TRACE, "a");
		const b = new Extensions();
		expect(b.get(TRACE)).toBeUndefined();
		expect(b.has(TRACE)).toBe(false);
		expect(a.get(TRACE)).toBe("a");
	});

	it("re-inserting replaces the value", () => {
		const bag = new Extensions().insert(TRACE, "a").insert(TRACE, "b");
		expect(bag.get(TRACE)).toBe("b");
		expect(bag.size).toBe(1);
	});
});

describe("responses", () => {
	it("responseFromStatus has no body", async () => {
		expect(await readResponse(responseFromStatus(204))).toEqual({ status: 204, body: "" });
	});

	it("failureResponse sets a zero content length", () => {
		const res = failureResponse(400);
		expect(res.status).toBe(400);
		expect(res.headers.get("content-length")).toBe("0");
	});

	it("responseFromError", async () => {
		expect(await readResponse(responseFromError(new HttpError(422, "bad item")))).toEqual({
			status: 422,
			body: "bad item",
		});
		expect(await readResponse(responseFromError(new TypeError("nope")))).toEqual({
			status: 500,
			body: "nope",
		});
	});

	it("responseFromError falls back to the reason phrase", async () => {
		expect(await readResponse(responseFromError(new HttpError(404)))).toEqual({
			status: 404,
			body: "Not Found",
		});
		expect(await readResponse(responseFromError(new HttpError(599)))).toEqual({
			status: 599,
			body: "",
		});
	});

	it("HttpError message and hierarchy", () => {
		const err = new HttpError(404);
		expect(err.message).toBe("HTTP 404");
		expect(err.body).toBeNull();
		expect(err.name).toBe("HttpError");
		expect(err).toBeInstanceOf(RouteError);
	});
});

describe("ResponseFilter", () => {
	const ok = () =>
		new Response("{}", { status: 200, headers: { "content-type": "application/json" } });

	it("status checks", () => {
		expect(filterResponse(ok()).filterStatus(200).isQualified).toBe(true);
		expect(filterResponse(ok()).filterStatus(201).isQualified).toBe(false);
		expect(filterResponse(ok()).filterStatus((s) => s >= 200 && s < 300).isQualified).toBe(true);
	});

	it("header checks", () => {
		expect(filterResponse(ok()).filterHeader("Content-Type", "application/{}").isQualified).toBe(
			true,
		);
		expect(filterResponse(ok()).filterHeader("content-type", "text/{}").isQualified).toBe(false);
		expect(filterResponse(ok()).filterHeader("{}", "application/json").isQualified).toBe(true);
		expect(filterResponse(ok()).filterHeader("etag", "{}").isQualified).toBe(false);
	});

	it("short-circuits after a failure", () => {
		let called = false;
		const chain = ResponseFilter.of(ok())
			.filterStatus(500)
			.filterCustom(() => {
				called = true;
				return true;
			});
		expect(called).toBe(false);
		expect(chain.isQualified).toBe(false);
		expect(chain.andThen((r) => r.status)).toBeNull();
	});

	it("andThen on a qualified chain", () => {
		expect(filterResponse(ok()).filterStatus(200).andThen((r) => r.status)).toBe(200);
	});
});

describe("fetch adapters", () => {
	it("fromFetchRequest views a Fetch request", () => {
		const req = fromFetchRequest(
			new Request("https://example.test/item/grapes?cool=yes", {
				method: "POST",
				headers: { "X-Key": "v" },
			}),
		);
		expect(req.method).toBe("POST");
		expect(req.scheme).toBe("https");
		expect(req.authority).toBe("example.test");
		expect(req.path).toBe("/item/grapes");
		expect(req.query).toBe("cool=yes");
		expect(req.header("x-key")).toBe("v");
	});

	it("fromFetchRequest keeps supplied extensions", () => {
		const TRACE = new ExtensionKey<string>("trace");
		const bag = new Extensions().insert(TRACE, "t-9");
		const req = fromFetchRequest(new Request("https://example.test/"), bag);
		expect(req.extensions.get(TRACE)).toBe("t-9");
	});

	it("toFetchHandler dispatches through the router", async () => {
		const handler = toFetchHandler(
			new Router().route(
				(f) => f.filterScheme("https").filterPath("/item/{}"),
				(m) => new Response(`Got any ${m.pathVar(1)}?`),
			),
		);
		expect(await readResponse(await handler(new Request("https://example.test/item/grapes")))).toEqual(
			{ status: 200, body: "Got any grapes?" },
		);
		expect((await handler(new Request("https://example.test/"))).status).toBe(404);
	});
});
