import { Effect, Either, Fiber } from "effect";
import { describe, expect, it } from "vitest";

import { INTERRUPTED_EXIT_CODE } from "../../../src/core/decision.js";
import { evaluateExit, waitForExit } from "../../../src/shell/process/exit.js";
import type {
	ExitStatus,
	RunningProcess,
} from "../../../src/shell/process/runner.js";
import { FakeChild } from "../../utils/fakeChild.js";

const exitedWith = (
	status: ExitStatus,
): { readonly child: FakeChild; readonly running: RunningProcess } => {
	const child = new FakeChild();
	return {
		child,
		running: { executable: "makensis", child, exited: Promise.resolve(status) },
	};
};

const neverExits = (): {
	readonly child: FakeChild;
	readonly running: RunningProcess;
} => {
	const child = new FakeChild();
	return {
		child,
		running: {
			executable: "makensis",
			child,
			exited: new Promise<ExitStatus>(() => undefined),
		},
	};
};

describe("waitForExit", () => {
	it("returns the exit code", async () => {
		const { running } = exitedWith({ code: 3, signal: null });
		expect(await Effect.runPromise(waitForExit(running, undefined))).toBe(3);
	});

	it("maps a signal death to 128 + signal", async () => {
		const { running } = exitedWith({ code: null, signal: "SIGTERM" });
		expect(await Effect.runPromise(waitForExit(running, undefined))).toBe(143);
	});

	it("kills the child when the signal is already aborted", async () => {
		const { child, running } = neverExits();
		const controller = new AbortController();
		controller.abort();
		expect(
			await Effect.runPromise(waitForExit(running, controller.signal)),
		).toBe(INTERRUPTED_EXIT_CODE);
		expect(child.killedWith).toEqual([undefined]);
	});

	it("kills the child when aborted while waiting", async () => {
		const { child, running } = neverExits();
		const controller = new AbortController();
		const pending = Effect.runPromise(waitForExit(running, controller.signal));
		setTimeout(() => {
			controller.abort();
		}, 5);
		expect(await pending).toBe(INTERRUPTED_EXIT_CODE);
		expect(child.killedWith).toHaveLength(1);
	});

	it("kills the child when the wait is interrupted", async () => {
		const { child, running } = neverExits();
		await Effect.runPromise(
			Effect.gen(function* () {
				const fiber = yield* Effect.fork(waitForExit(running, undefined));
				yield* Effect.sleep("10 millis");
				yield* Fiber.interrupt(fiber);
			}),
		);
		expect(child.killedWith).toHaveLength(1);
	});
});

describe("evaluateExit", () => {
	it("reports the elapsed time on success", async () => {
		const { running } = exitedWith({ code: 0, signal: null });
		const lines: string[] = [];
		const result = await Effect.runPromise(
			evaluateExit(running, {
				startedAt: 1000,
				now: () => 1500,
				sink: (line) => lines.push(line),
			}),
		);
		expect(result).toEqual({ exitCode: 0, elapsedMillis: 500 });
		expect(lines).toEqual(["Execution completed in 500ms"]);
	});

	it("fails with CompilerFailure on a non-zero exit", async () => {
		const { running } = exitedWith({ code: 3, signal: null });
		const lines: string[] = [];
		const result = await Effect.runPromise(
			Effect.either(
				evaluateExit(running, {
					startedAt: 0,
					sink: (line) => lines.push(line),
				}),
			),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("CompilerFailure");
			expect(result.left.exitCode).toBe(3);
		}
		expect(lines).toEqual([]);
	});
});
