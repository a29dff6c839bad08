/**
 * Dispatch benchmarks.
 *
 * Measures the hot path: pattern matching, filter chains, first-match-wins
 * scanning over many routes, and miss-heavy workloads.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import {
	Router,
	filter,
	matchPath,
	matchValue,
	tokenizePath,
	tokenizeValue,
} from "../src/index.ts";
import { mockRequest } from "../src/testing.ts";

// ── Matchers ─────────────────────────────────────────────────────────────────

summary(() => {
	const exact = tokenizePath("/api/v1/users");
	const captured = tokenizePath("/api/{}/users/{}");

	bench("path_exact_hit", () => matchPath(exact, "/api/v1/users"));
	bench("path_exact_miss", () => matchPath(exact, "/api/v2/users"));
	bench("path_capture_hit", () => matchPath(captured, "/api/v2/users/12345"));
});

summary(() => {
	const bearer = tokenizeValue("Bearer {}");
	const inner = tokenizeValue("{}/{}+json");

	bench("value_prefix_hit", () => matchValue(bearer, "Bearer test-token"));
	bench("value_inner_hit", () => matchValue(inner, "application/vnd.example+json"));
});

// ── Filter chains ────────────────────────────────────────────────────────────

summary(() => {
	const req = mockRequest("https://www.example.test/item/grapes?cool=yes", {
		headers: { accept: "text/html" },
	});

	bench("chain_full_hit", () =>
		filter(req)
			.filterScheme("https")
			.filterMethod("GET")
			.filterPath("/item/{}")
			.filterHeader("accept", "text/{}")
			.filterQuery("cool", "yes")
			.handle((m) => m.pathVar(1)),
	);
	bench("chain_early_miss", () =>
		filter(req)
			.filterMethod("POST")
			.filterPath("/item/{}")
			.filterQuery("cool", "yes")
			.handle((m) => m.pathVar(1)),
	);
});

// ── Scaling: route count ─────────────────────────────────────────────────────

function makeRouter(n: number, includeTarget: boolean): Router {
	const count = includeTarget ? n - 1 : n;
	const router = new Router();
	for (let i = 0; i < count; i++) {
		router.route((f) => f.filterPath(`/route_${i}/{}`), () => new Response(`route_${i}`));
	}
	if (includeTarget) {
		router.route((f) => f.filterPath("/target/{}"), () => new Response("found"));
	}
	return router;
}

summary(() => {
	const req = mockRequest("/target/x");
	for (const n of [10, 50, 100, 200]) {
		const router = makeRouter(n, true);
		bench(`route_count_${n}_last_match`, async () => router.dispatch(req));
	}
});

summary(() => {
	const req = mockRequest("/no_match/x");
	for (const n of [10, 100]) {
		const router = makeRouter(n, false);
		bench(`route_count_${n}_miss`, async () => router.dispatch(req));
	}
});

await run();
