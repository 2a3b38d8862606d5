#!/usr/bin/env node

// FORMAT THEOREM: exitCode = main(argv, signal) → the runner terminates with exitCode
// PURITY: SHELL (BIN layer)
// INVARIANT: SIGINT/SIGTERM abort the running makensis instead of killing the runner
// COMPLEXITY: O(1) (delegates to main)

import { main } from "../main.js";

const controller = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
	process.once(signal, () => {
		controller.abort();
	});
}

/**
 * CLI entry point for makensis-runner.
 *
 * @remarks
 * - @pure false (process termination, signal handlers, console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await main(process.argv.slice(2), controller.signal);
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
