// FORMAT THEOREM: ∀t ∉ NeedsQuotes, t ≠ "": formatArgument(p, t, false) = t
// PURITY: CORE
// INVARIANT: Output matches the makensis command-line tokenizer for the given platform
// COMPLEXITY: O(n) where n = |token|

import type { Platform } from "../models.js";

/** Whitespace (as makensis sees it) and the three quote characters. */
const QUOTES_NEEDED = /[ \t\n\v\f\r"'`]/u;

/**
 * Formats a value so it can be used as the payload of a `/X` or `-X`
 * script command on the makensis command line.
 *
 * @param platform - Target platform; selects quote and escape sequences
 * @param token - Raw value (typically a path)
 * @param forceQuote - Quote even if the content doesn't require it
 * @returns The formatted token
 *
 * @pure true
 * @invariant token = "" → result is an empty quoted pair
 * @complexity O(n)
 *
 * @example
 * ```ts
 * formatArgument(linux, "/tmp/my app.exe", false); // "\"/tmp/my app.exe\""
 * formatArgument(windows, "C:\\a b", false); // "\\\"C:\\\\a b\\\""
 * ```
 */
export function formatArgument(
	platform: Platform,
	token: string,
	forceQuote: boolean,
): string {
	const quote = platform.isWindows ? '\\"' : '"';
	if (token.length === 0) {
		return quote + quote;
	}
	if (!forceQuote && !QUOTES_NEEDED.test(token)) {
		return token;
	}
	const escaped = platform.isWindows
		? token.replaceAll("\\", "\\\\").replaceAll('"', '$\\\\\\"')
		: token.replaceAll('"', '$\\"');
	return quote + escaped + quote;
}

/**
 * Quotes one argv entry for a Windows command line that is passed to the
 * child verbatim: entries with a space or tab are wrapped in double quotes
 * unless they already are, and a trailing backslash is doubled so it does
 * not escape the closing quote.
 *
 * @pure true
 *
 * @example
 * ```ts
 * windowsCommandLineArgument("C:\\Program Files\\NSIS\\makensis.exe");
 * // "\"C:\\Program Files\\NSIS\\makensis.exe\""
 * windowsCommandLineArgument("/V2"); // "/V2"
 * ```
 */
export function windowsCommandLineArgument(token: string): string {
	if (token.length === 0) return '""';
	if (token.length >= 2 && token.startsWith('"') && token.endsWith('"')) {
		return token;
	}
	if (!/[ \t]/u.test(token)) return token;
	return `"${token}${token.endsWith("\\") ? "\\" : ""}"`;
}
