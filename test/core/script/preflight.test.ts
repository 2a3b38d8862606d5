import { Option } from "effect";
import { describe, expect, it } from "vitest";

import {
	FINAL_COMPRESSION_CHECK,
	findScriptConflict,
	OUTFILE_CHECK,
	preflightChecks,
} from "../../../src/core/script/preflight.js";
import { invocation } from "../../utils/builders.js";

const lzmaFinal = {
	algorithm: "lzma",
	isFinal: true,
	isSolid: false,
	dictionarySizeKB: 8,
} as const;

describe("preflightChecks", () => {
	it("checks nothing when the runner injects nothing", () => {
		expect(preflightChecks(invocation())).toEqual([]);
	});

	it("checks OutFile when an output file is configured", () => {
		expect(
			preflightChecks(invocation({ outputFilePath: "app.exe" })),
		).toEqual([OUTFILE_CHECK]);
	});

	it("checks SetCompressor /FINAL for final compression", () => {
		expect(preflightChecks(invocation({ compression: lzmaFinal }))).toEqual([
			FINAL_COMPRESSION_CHECK,
		]);
		expect(
			preflightChecks(
				invocation({ compression: { ...lzmaFinal, isFinal: false } }),
			),
		).toEqual([]);
	});

	it("keeps OutFile first when both apply", () => {
		expect(
			preflightChecks(
				invocation({ outputFilePath: "app.exe", compression: lzmaFinal }),
			),
		).toEqual([OUTFILE_CHECK, FINAL_COMPRESSION_CHECK]);
	});
});

describe("findScriptConflict", () => {
	const both = [OUTFILE_CHECK, FINAL_COMPRESSION_CHECK];

	it("reports the 1-based line of the first match", () => {
		expect(
			findScriptConflict('Name "x"\n  OutFile "x.exe"\n', [OUTFILE_CHECK]),
		).toEqual(Option.some({ line: 2, check: OUTFILE_CHECK }));
	});

	it("counts CRLF and CR line breaks", () => {
		expect(
			findScriptConflict("a\r\nb\rOutFile x.exe", [OUTFILE_CHECK]),
		).toEqual(Option.some({ line: 3, check: OUTFILE_CHECK }));
	});

	it("finds /FINAL after other modifiers", () => {
		expect(
			findScriptConflict("SetCompressor /SOLID /FINAL lzma", both),
		).toEqual(Option.some({ line: 1, check: FINAL_COMPRESSION_CHECK }));
	});

	it("returns the earliest line across checks", () => {
		expect(
			findScriptConflict("SetCompressor /FINAL zlib\nOutFile a.exe", both),
		).toEqual(Option.some({ line: 1, check: FINAL_COMPRESSION_CHECK }));
	});

	it.each([
		"; OutFile commented out",
		"OutFileName x",
		"outfile lower-case",
		"SetCompressor lzma",
		"!define FINAL 1",
		"SetCompressor lzma ; /FINAL later",
		"SetCompressor zlib # /FINAL",
	])("does not flag %j", (line) => {
		expect(findScriptConflict(line, both)).toEqual(Option.none());
	});

	it("skips the scan without checks", () => {
		expect(findScriptConflict("OutFile a.exe", [])).toEqual(Option.none());
	});
});
