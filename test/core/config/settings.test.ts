import { describe, expect, it } from "vitest";

import {
	compressionOf,
	headerFileOf,
	mergeSettings,
	toInvocationConfig,
} from "../../../src/core/config/settings.js";

describe("mergeSettings", () => {
	it("lets command-line values win and merges records key by key", () => {
		expect(
			mergeSettings(
				{
					verbosity: 1,
					scriptFile: "a.nsi",
					environmentVariables: { A: "1", B: "2" },
				},
				{ verbosity: 3, environmentVariables: { B: "3" }, defines: { X: "y" } },
			),
		).toEqual({
			verbosity: 3,
			scriptFile: "a.nsi",
			environmentVariables: { A: "1", B: "3" },
			defines: { X: "y" },
		});
	});
});

describe("compressionOf", () => {
	it("is absent when nothing about compression is configured", () => {
		expect(compressionOf({})).toBeUndefined();
		expect(compressionOf({ compressionDictSize: 64 })).toBeUndefined();
	});

	it("fills in zlib and the default dictionary size", () => {
		expect(compressionOf({ compressionIsFinal: true })).toEqual({
			algorithm: "zlib",
			isFinal: true,
			isSolid: false,
			dictionarySizeKB: 8,
		});
		expect(
			compressionOf({ compression: "lzma", compressionDictSize: 64 }),
		).toEqual({
			algorithm: "lzma",
			isFinal: false,
			isSolid: false,
			dictionarySizeKB: 64,
		});
	});
});

describe("headerFileOf", () => {
	it("defaults to project.nsh in the build directory", () => {
		expect(headerFileOf({}, "/work")).toBe("/work/dist/project.nsh");
		expect(headerFileOf({ buildDirectory: "out" }, "/work")).toBe(
			"/work/out/project.nsh",
		);
		expect(headerFileOf({ headerFile: "inc/p.nsh" }, "/work")).toBe(
			"/work/inc/p.nsh",
		);
	});
});

describe("toInvocationConfig", () => {
	it("applies defaults", () => {
		expect(toInvocationConfig({}, "/work")).toEqual({
			projectDirectory: "/work",
			executablePath: "makensis",
			scriptFilePath: "/work/setup.nsi",
			buildDirectory: "/work/dist",
			verbosityLevel: 2,
			injectHeaderFile: true,
			headerFilePath: "/work/dist/project.nsh",
			environmentOverrides: {},
			autoDetectAuxDir: true,
			attachArtifact: true,
		});
	});

	it("resolves directories against the project", () => {
		const config = toInvocationConfig(
			{
				makensisBin: "tools/makensis",
				scriptFile: "installer/main.nsi",
				workingDirectory: "build",
				nsisDir: "nsis",
				outputFile: "app-setup.exe",
				classifier: "x64",
				outputEncoding: "utf-8",
			},
			"/work",
		);
		expect(config.executablePath).toBe("/work/tools/makensis");
		expect(config.scriptFilePath).toBe("/work/installer/main.nsi");
		expect(config.workingFolder).toBe("/work/build");
		expect(config.auxDirOverride).toBe("/work/nsis");
		expect(config.outputFilePath).toBe("app-setup.exe");
		expect(config.classifier).toBe("x64");
		expect(config.outputEncoding).toBe("utf-8");
	});

	it("keeps bare binary names for the search path", () => {
		expect(
			toInvocationConfig({ makensisBin: "makensis.exe" }, "/work")
				.executablePath,
		).toBe("makensis.exe");
		expect(
			toInvocationConfig({ makensisBin: "/opt/nsis/makensis" }, "/work")
				.executablePath,
		).toBe("/opt/nsis/makensis");
	});
});
