// FORMAT THEOREM: evaluateExit(p) succeeds ⇔ exitStatus(p) = 0
// PURITY: SHELL
// EFFECT: Effect<ProcessResult, CompilerFailure>
// INVARIANT: An aborted or interrupted wait never leaves the child running
// COMPLEXITY: O(1)

import { constants } from "node:os";
import { Effect } from "effect";

import {
	exitStatusOf,
	INTERRUPTED_EXIT_CODE,
	isSuccessfulExit,
} from "../../core/decision.js";
import { CompilerFailure } from "../../core/errors.js";
import type { LineSink, ProcessResult } from "../../core/models.js";
import { debugLog } from "../utils/log.js";
import type { RunningProcess } from "./runner.js";

export interface EvaluateOptions {
	/** Epoch millis taken right before launch. */
	readonly startedAt: number;
	readonly sink: LineSink;
	readonly signal?: AbortSignal;
	readonly now?: () => number;
}

function signalNumber(signal: NodeJS.Signals | null): number | undefined {
	if (signal === null) return undefined;
	const entry = Object.entries(constants.signals).find(
		([name]) => name === signal,
	);
	const value: unknown = entry?.[1];
	return typeof value === "number" ? value : undefined;
}

/**
 * Waits for the child's exit status. Aborting the signal (or interrupting
 * the fiber) kills the child; an abort yields INTERRUPTED_EXIT_CODE.
 *
 * @effect Effect<number, never>
 */
export function waitForExit(
	running: RunningProcess,
	signal: AbortSignal | undefined,
): Effect.Effect<number> {
	return Effect.async<number>((resume) => {
		let settled = false;
		const settle = (code: number): void => {
			if (settled) return;
			settled = true;
			signal?.removeEventListener("abort", onAbort);
			resume(Effect.succeed(code));
		};
		function onAbort(): void {
			debugLog("Interrupted while waiting for makensis, destroying the process");
			running.child.kill();
			settle(INTERRUPTED_EXIT_CODE);
		}

		if (signal?.aborted === true) {
			onAbort();
			return;
		}
		signal?.addEventListener("abort", onAbort, { once: true });
		void running.exited.then((status) => {
			settle(exitStatusOf(status.code, signalNumber(status.signal)));
		});

		return Effect.sync(() => {
			signal?.removeEventListener("abort", onAbort);
			if (!settled) running.child.kill();
		});
	});
}

/**
 * Maps the compiler's exit to success or CompilerFailure.
 *
 * On success the elapsed time is reported through the sink, after any
 * output lines already delivered.
 *
 * @pure false
 * @effect Effect<ProcessResult, CompilerFailure>
 * @postcondition result.exitCode = 0
 */
export function evaluateExit(
	running: RunningProcess,
	options: EvaluateOptions,
): Effect.Effect<ProcessResult, CompilerFailure> {
	const now = options.now ?? Date.now;
	return Effect.gen(function* () {
		const exitCode = yield* waitForExit(running, options.signal);
		const elapsedMillis = now() - options.startedAt;
		if (!isSuccessfulExit(exitCode)) {
			return yield* Effect.fail(new CompilerFailure({ exitCode }));
		}
		options.sink(`Execution completed in ${elapsedMillis}ms`);
		return { exitCode, elapsedMillis };
	});
}
