import { Effect } from "effect";
import { describe, expect, it, vi } from "vitest";

import { runCommand } from "../../src/app/run.js";
import { main } from "../../src/main.js";
import { USAGE } from "../../src/shell/config/index.js";
import { scriptedSpawner } from "../utils/fakeChild.js";
import { linux } from "../utils/platforms.js";

describe("runCommand", () => {
	it("prints usage for help without spawning anything", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const { spawner, calls } = scriptedSpawner(() => undefined);

		const code = await Effect.runPromise(
			runCommand(
				{ command: "help", projectDir: "/work", settings: {} },
				{ platform: linux, env: {}, sink: () => undefined, spawner },
			),
		);

		expect(code).toBe(0);
		expect(log).toHaveBeenCalledWith(USAGE);
		expect(calls).toHaveLength(0);
	});
});

describe("main", () => {
	it("reports bad arguments with usage and exits with 1", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		expect(await main(["--bogus"])).toBe(1);
		expect(error).toHaveBeenNthCalledWith(1, "[ERROR] Unknown option --bogus");
		expect(error).toHaveBeenNthCalledWith(2, USAGE);
	});

	it("runs help", async () => {
		vi.spyOn(console, "log").mockImplementation(() => undefined);
		expect(await main(["help"])).toBe(0);
	});
});
