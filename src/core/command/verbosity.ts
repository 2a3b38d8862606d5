// FORMAT THEOREM: ∀v: clampVerbosity(v) ∈ [0,4] ∧ clampVerbosity(clampVerbosity(v)) = clampVerbosity(v)
// PURITY: CORE
// COMPLEXITY: O(1)

export const MIN_VERBOSITY = 0;
export const MAX_VERBOSITY = 4;
export const DEFAULT_VERBOSITY = 2;

/**
 * Corrects any verbosity level into the range makensis accepts.
 *
 * Fractions are truncated, NaN falls back to the default level.
 *
 * @pure true
 * @invariant monotonic: a ≤ b → clamp(a) ≤ clamp(b)
 */
export function clampVerbosity(level: number): number {
	if (Number.isNaN(level)) return DEFAULT_VERBOSITY;
	const whole = Number.isFinite(level) ? Math.trunc(level) : level;
	return Math.min(MAX_VERBOSITY, Math.max(MIN_VERBOSITY, whole));
}
