import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	clampVerbosity,
	DEFAULT_VERBOSITY,
	MAX_VERBOSITY,
	MIN_VERBOSITY,
} from "../../../src/core/command/verbosity.js";

describe("clampVerbosity", () => {
	it.each([
		[7, 4],
		[4, 4],
		[0, 0],
		[-3, 0],
		[2.9, 2],
		[Number.POSITIVE_INFINITY, 4],
		[Number.NEGATIVE_INFINITY, 0],
	])("clamps %d to %d", (level, expected) => {
		expect(clampVerbosity(level)).toBe(expected);
	});

	it("falls back to the default for NaN", () => {
		expect(clampVerbosity(Number.NaN)).toBe(DEFAULT_VERBOSITY);
	});

	it("always lands in range and is idempotent", () => {
		fc.assert(
			fc.property(fc.double(), (level) => {
				const once = clampVerbosity(level);
				expect(once).toBeGreaterThanOrEqual(MIN_VERBOSITY);
				expect(once).toBeLessThanOrEqual(MAX_VERBOSITY);
				expect(clampVerbosity(once)).toBe(once);
			}),
		);
	});

	it("is monotonic", () => {
		fc.assert(
			fc.property(
				fc.integer({ min: -50, max: 50 }),
				fc.integer({ min: -50, max: 50 }),
				(a, b) => {
					const [low, high] = a <= b ? [a, b] : [b, a];
					expect(clampVerbosity(low)).toBeLessThanOrEqual(
						clampVerbosity(high),
					);
				},
			),
		);
	});
});
