// CHANGE: Unit tests for command-line parsing
// WHY: Every flag maps to exactly one setting; bad values must be rejected, not guessed

import { describe, expect, it } from "vitest";

import { parseCLIArgs } from "../../../src/shell/config/index.js";
import { expectLeft, expectRight } from "../../utils/builders.js";

const parse = (args: readonly string[]) => parseCLIArgs(args, "/work");

describe("parseCLIArgs: commands", () => {
	it("defaults to make in the current directory", () => {
		expect(expectRight(parse([]))).toEqual({
			command: "make",
			projectDir: "/work",
			settings: {},
		});
	});

	it("accepts the command anywhere and ignores empty arguments", () => {
		const options = expectRight(
			parse(["--project-dir", "app", "", "generate-header"]),
		);
		expect(options.command).toBe("generate-header");
		expect(options.projectDir).toBe("/work/app");
	});

	it("selects help for --help, -h and help", () => {
		expect(expectRight(parse(["--help"])).command).toBe("help");
		expect(expectRight(parse(["make", "-h"])).command).toBe("help");
		expect(expectRight(parse(["help"])).command).toBe("help");
	});

	it("resolves --config against the working directory", () => {
		expect(expectRight(parse(["--config", "cfg/m.json"])).configPath).toBe(
			"/work/cfg/m.json",
		);
		expect(expectRight(parse([])).configPath).toBeUndefined();
	});
});

describe("parseCLIArgs: settings", () => {
	it("parses value flags and switches", () => {
		expect(
			expectRight(
				parse([
					"--makensis",
					"/opt/nsis/makensis",
					"--output",
					"app-setup.exe",
					"--verbosity",
					"3",
					"--final",
					"--solid",
					"--compression",
					"LZMA",
					"--dict-size=64",
					"--no-header",
					"--no-auto-nsis-dir",
					"--no-attach",
				]),
			).settings,
		).toEqual({
			makensisBin: "/opt/nsis/makensis",
			outputFile: "app-setup.exe",
			verbosity: 3,
			compressionIsFinal: true,
			compressionIsSolid: true,
			compression: "lzma",
			compressionDictSize: 64,
			injectHeaderFile: false,
			autoNsisDir: false,
			attachArtifact: false,
		});
	});

	it("collects repeated --env and --define assignments", () => {
		expect(
			expectRight(
				parse(["--env", "A=1", "--env=B=x=y", "--define", "VENDOR=Acme"]),
			).settings,
		).toEqual({
			environmentVariables: { A: "1", B: "x=y" },
			defines: { VENDOR: "Acme" },
		});
	});

	it("does not treat a flag's value as a command", () => {
		const options = expectRight(parse(["--script", "make"]));
		expect(options.command).toBe("make");
		expect(options.settings.scriptFile).toBe("make");
	});
});

describe("parseCLIArgs: errors", () => {
	it.each([
		[["--nope"], "Unknown option --nope"],
		[["--final=yes"], "Unknown option --final=yes"],
		[["stray"], 'Unexpected argument "stray"'],
		[["make", "make"], 'Unexpected argument "make"'],
		[["--output"], "--output requires a value"],
		[["--verbosity", "high"], '--verbosity expects an integer, got "high"'],
		[["--verbosity", ""], '--verbosity expects an integer, got ""'],
		[["--dict-size", "0"], "--dict-size must be positive, got 0"],
		[
			["--compression", "zip"],
			'--compression expects zlib, bzip2 or lzma, got "zip"',
		],
		[["--env", "NOEQ"], '--env expects NAME=VALUE, got "NOEQ"'],
		[["--define", "=x"], '--define expects NAME=VALUE, got "=x"'],
	])("rejects %j", (args, detail) => {
		const error = expectLeft(parse(args));
		expect(error._tag).toBe("ConfigError");
		expect(error.detail).toBe(detail);
	});
});
