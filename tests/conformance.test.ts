import { describe, expect, it } from "vitest";
import { readResponse } from "../src/testing.ts";
import { loadFixtures } from "./helpers/fixture-loader.ts";

const cases = loadFixtures();

describe("conformance fixtures", () => {
	it("loaded fixtures", () => {
		expect(cases.length).toBeGreaterThan(0);
	});

	for (const c of cases) {
		it(`${c.fixtureName} / ${c.caseName}`, async () => {
			const response = await c.router.dispatch(c.request);
			expect(await readResponse(response)).toEqual(c.expect);
		});
	}
});
