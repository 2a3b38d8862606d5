// FORMAT THEOREM: ∀c ∈ ℤ: isSuccessfulExit(c) ⇔ c = 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping status → ExitCode
// COMPLEXITY: O(1)

import { pipe } from "effect";

import type { ExitCode } from "./models.js";

/** Reported when the wait for makensis was interrupted and the process destroyed. */
export const INTERRUPTED_EXIT_CODE = -1;

/**
 * Maps a child's raw exit status to a single integer.
 *
 * @param code - Exit code, or null if the child died from a signal
 * @param signalNumber - Number of the terminating signal, if known
 * @returns code, or 128 + signal for signal deaths, or INTERRUPTED_EXIT_CODE
 *
 * @pure true
 * @postcondition code !== null → result = code
 */
export function exitStatusOf(
	code: number | null,
	signalNumber: number | undefined,
): number {
	if (code !== null) return code;
	return signalNumber === undefined
		? INTERRUPTED_EXIT_CODE
		: 128 + signalNumber;
}

/**
 * @pure true
 */
export const isSuccessfulExit = (status: number): boolean => status === 0;

/**
 * Computes the runner's own exit code from the compiler status.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode(0); // 0
 * computeExitCode(3); // 1
 * ```
 */
export const computeExitCode = (status: number): ExitCode =>
	pipe(status, isSuccessfulExit, (ok): ExitCode => (ok ? 0 : 1));
