import { describe, expect, it } from "vitest";

import {
	compressorFlags,
	isCompressionAlgorithm,
	isDefaultCompression,
} from "../../../src/core/command/compression.js";
import type { CompressionSpec } from "../../../src/core/models.js";
import { linux, windows } from "../../utils/platforms.js";

const spec = (over: Partial<CompressionSpec> = {}): CompressionSpec => ({
	algorithm: "zlib",
	isFinal: false,
	isSolid: false,
	dictionarySizeKB: 8,
	...over,
});

describe("isDefaultCompression", () => {
	it("is true only for plain zlib", () => {
		expect(isDefaultCompression(spec())).toBe(true);
		expect(isDefaultCompression(spec({ isFinal: true }))).toBe(false);
		expect(isDefaultCompression(spec({ isSolid: true }))).toBe(false);
		expect(isDefaultCompression(spec({ algorithm: "bzip2" }))).toBe(false);
	});
});

describe("isCompressionAlgorithm", () => {
	it("accepts the lower-case names only", () => {
		expect(isCompressionAlgorithm("lzma")).toBe(true);
		expect(isCompressionAlgorithm("LZMA")).toBe(false);
		expect(isCompressionAlgorithm("zip")).toBe(false);
	});
});

describe("compressorFlags", () => {
	it("emits nothing without a spec or for the default spec", () => {
		expect(compressorFlags(linux, undefined)).toEqual([]);
		expect(compressorFlags(linux, spec())).toEqual([]);
	});

	it("emits /FINAL and the dictionary size for lzma", () => {
		expect(
			compressorFlags(
				windows,
				spec({ algorithm: "lzma", isFinal: true, dictionarySizeKB: 64 }),
			),
		).toEqual(["/XSetCompressor /FINAL lzma", "/XSetCompressorDictSize 64"]);
	});

	it("omits the dictionary size when it is the lzma default", () => {
		expect(compressorFlags(linux, spec({ algorithm: "lzma" }))).toEqual([
			"-XSetCompressor lzma",
		]);
	});

	it("never emits a dictionary size for other algorithms", () => {
		expect(
			compressorFlags(
				linux,
				spec({ algorithm: "bzip2", isSolid: true, dictionarySizeKB: 64 }),
			),
		).toEqual(["-XSetCompressor /SOLID bzip2"]);
	});

	it("puts /FINAL before /SOLID", () => {
		expect(
			compressorFlags(linux, spec({ isFinal: true, isSolid: true })),
		).toEqual(["-XSetCompressor /FINAL /SOLID zlib"]);
	});
});
