// PURITY: SHELL
// INVARIANT: Debug output is emitted only when MAKENSIS_RUNNER_DEBUG=1
// COMPLEXITY: O(1)

const ENV: NodeJS.ProcessEnv & { MAKENSIS_RUNNER_DEBUG?: string } = process.env;

/**
 * @pure false (reads the environment)
 */
export function isDebugEnabled(): boolean {
	return ENV.MAKENSIS_RUNNER_DEBUG === "1";
}

export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error("[DEBUG]", message);
	}
}

export function warn(message: string): void {
	console.warn(`[WARN] ${message}`);
}

export function reportError(message: string): void {
	console.error(`[ERROR] ${message}`);
}
