// FORMAT THEOREM: ∀s ∈ String: detectPlatform(s) ∈ {linux, macos, windows, other}
// PURITY: CORE
// INVARIANT: Total function, no side effects; unknown names map to "other"
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { Platform, PlatformKind } from "./models.js";

/**
 * Classifies a host OS name.
 *
 * Accepts both Node's `process.platform` values (`linux`, `darwin`, `win32`)
 * and descriptive names such as `Mac OS X` or `Windows 10`.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * detectPlatform("win32"); // "windows"
 * detectPlatform("Darwin"); // "macos"
 * detectPlatform("sunos"); // "other"
 * ```
 */
export function detectPlatform(osName: string): PlatformKind {
	const name = osName.trim().toLowerCase();
	if (name.startsWith("linux")) return "linux";
	if (name.startsWith("mac") || name.startsWith("darwin")) return "macos";
	if (name.startsWith("win")) return "windows";
	return "other";
}

/**
 * Derives the platform facts for a kind.
 *
 * @pure true
 * @invariant result.isWindows ⇔ kind = "windows"
 */
export const createPlatform = (kind: PlatformKind): Platform =>
	match(kind)
		.with(
			"windows",
			(): Platform => ({
				kind,
				isWindows: true,
				optionPrefix: "/",
				pathDelimiter: ";",
			}),
		)
		.with(
			"linux",
			"macos",
			"other",
			(): Platform => ({
				kind,
				isWindows: false,
				optionPrefix: "-",
				pathDelimiter: ":",
			}),
		)
		.exhaustive();

/**
 * Default console encoding makensis uses on each platform.
 *
 * @pure true
 */
export const defaultOutputEncoding = (platform: Platform): string =>
	platform.isWindows ? "windows-1252" : "utf-8";
