// FORMAT THEOREM: isDefaultCompression(c) → compressorFlags(p, c) = []
// PURITY: CORE
// INVARIANT: Dictionary size is emitted only for lzma with a non-default size
// COMPLEXITY: O(1)

import type {
	CompressionAlgorithm,
	CompressionSpec,
	Platform,
} from "../models.js";

export const DEFAULT_COMPRESSION: CompressionAlgorithm = "zlib";
export const DEFAULT_LZMA_DICT_SIZE = 8;

export const COMPRESSION_ALGORITHMS: readonly CompressionAlgorithm[] = [
	"zlib",
	"bzip2",
	"lzma",
];

export function isCompressionAlgorithm(
	value: string,
): value is CompressionAlgorithm {
	return COMPRESSION_ALGORITHMS.some((a) => a === value);
}

/**
 * True when the settings add nothing to makensis' built-in defaults, i.e.
 * no compressor flags need to be emitted.
 *
 * @pure true
 */
export function isDefaultCompression(spec: CompressionSpec): boolean {
	return (
		spec.algorithm === DEFAULT_COMPRESSION && !spec.isFinal && !spec.isSolid
	);
}

/**
 * Builds the `SetCompressor` (and `SetCompressorDictSize`) command tokens.
 *
 * @returns [] | [setCompressor] | [setCompressor, setDictSize]
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * compressorFlags(windows, { algorithm: "lzma", isFinal: true, isSolid: false, dictionarySizeKB: 64 });
 * // ["/XSetCompressor /FINAL lzma", "/XSetCompressorDictSize 64"]
 * ```
 */
export function compressorFlags(
	platform: Platform,
	spec: CompressionSpec | undefined,
): readonly string[] {
	if (spec === undefined || isDefaultCompression(spec)) return [];

	const prefix = platform.optionPrefix;
	const modifiers = [
		spec.isFinal ? "/FINAL " : "",
		spec.isSolid ? "/SOLID " : "",
	].join("");
	const setCompressor = `${prefix}XSetCompressor ${modifiers}${spec.algorithm}`;

	if (
		spec.algorithm === "lzma" &&
		spec.dictionarySizeKB !== DEFAULT_LZMA_DICT_SIZE
	) {
		return [
			setCompressor,
			`${prefix}XSetCompressorDictSize ${spec.dictionarySizeKB}`,
		];
	}
	return [setCompressor];
}
