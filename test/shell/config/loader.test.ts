import * as path from "node:path";
import { Effect, Either } from "effect";
import { describe, expect, it, vi } from "vitest";

import {
	CONFIG_FILE_NAME,
	loadSettings,
	parseConfigText,
} from "../../../src/shell/config/index.js";
import { expectLeft, expectRight } from "../../utils/builders.js";
import { withTempDir, writeFile } from "../../utils/tempDir.js";

describe("parseConfigText", () => {
	it("parses valid settings", () => {
		expect(
			expectRight(parseConfigText('{ "verbosity": 4 }', "/w/c.json")),
		).toEqual({ verbosity: 4 });
	});

	it("reports invalid JSON with the file", () => {
		const error = expectLeft(parseConfigText("{", "/w/c.json"));
		expect(error.detail.startsWith("Invalid JSON: ")).toBe(true);
		expect(error.path).toBe("/w/c.json");
	});

	it("reports the first invalid field", () => {
		const error = expectLeft(
			parseConfigText('{ "verbosity": "loud" }', "/w/c.json"),
		);
		expect(error.detail).toBe('"verbosity" must be a number');
	});

	it("warns about unknown keys and keeps going", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		expect(
			expectRight(
				parseConfigText('{ "verbose": true, "scriptFile": "a.nsi" }', "/w/c.json"),
			),
		).toEqual({ scriptFile: "a.nsi" });
		expect(warn).toHaveBeenCalledWith(
			'[WARN] Unknown setting "verbose" in /w/c.json is ignored',
		);
	});
});

describe("loadSettings", () => {
	it("reads the default file from the project directory", async () => {
		await withTempDir(async (root) => {
			await writeFile(
				path.join(root, CONFIG_FILE_NAME),
				JSON.stringify({ outputFile: "app-setup.exe" }),
			);
			expect(await Effect.runPromise(loadSettings(root))).toEqual({
				outputFile: "app-setup.exe",
			});
		});
	});

	it("treats a missing default file as empty settings", async () => {
		await withTempDir(async (root) => {
			expect(await Effect.runPromise(loadSettings(root))).toEqual({});
		});
	});

	it("requires an explicitly named file to exist", async () => {
		await withTempDir(async (root) => {
			const result = await Effect.runPromise(
				Effect.either(loadSettings(root, "custom.json")),
			);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left.path).toBe(path.join(root, "custom.json"));
				expect(
					result.left.detail.startsWith("Unable to read configuration: "),
				).toBe(true);
			}
		});
	});
});
