// PURITY: SHELL (reads process.argv and process.cwd by default)
// EFFECT: Either<CLIOptions, ConfigError>
// INVARIANT: Every recognised flag maps to exactly one setting; unknown flags are errors
// COMPLEXITY: O(n) where n = |argv|

import * as path from "node:path";
import { Either } from "effect";

import { isCompressionAlgorithm } from "../../core/command/compression.js";
import { ConfigError } from "../../core/errors.js";
import type {
	CLIOptions,
	RunnerCommand,
	RunnerSettings,
} from "../../core/types/index.js";

type SettingsDraft = { -readonly [K in keyof RunnerSettings]: RunnerSettings[K] };

interface ParseState {
	command: RunnerCommand | undefined;
	projectDir: string | undefined;
	configPath: string | undefined;
	readonly settings: SettingsDraft;
}

/** Returns an error message, or undefined when the value was applied. */
type ValueFlagHandler = (value: string, state: ParseState) => string | undefined;

type SwitchHandler = (settings: SettingsDraft) => void;

const COMMANDS: readonly RunnerCommand[] = ["make", "generate-header", "help"];

const isCommand = (value: string): value is RunnerCommand =>
	COMMANDS.some((command) => command === value);

function parseInteger(flag: string, value: string): number | string {
	const parsed = Number(value);
	return value.trim().length > 0 && Number.isInteger(parsed)
		? parsed
		: `${flag} expects an integer, got "${value}"`;
}

function parseAssignment(
	flag: string,
	value: string,
): readonly [string, string] | string {
	const eq = value.indexOf("=");
	return eq <= 0
		? `${flag} expects NAME=VALUE, got "${value}"`
		: [value.slice(0, eq), value.slice(eq + 1)];
}

function stringFlag(
	key:
		| "makensisBin"
		| "scriptFile"
		| "outputFile"
		| "classifier"
		| "buildDirectory"
		| "workingDirectory"
		| "headerFile"
		| "nsisDir"
		| "outputEncoding",
): ValueFlagHandler {
	return (value, { settings }) => {
		settings[key] = value;
		return undefined;
	};
}

function recordFlag(
	flag: string,
	key: "environmentVariables" | "defines",
): ValueFlagHandler {
	return (value, { settings }) => {
		const assignment = parseAssignment(flag, value);
		if (typeof assignment === "string") return assignment;
		const [name, content] = assignment;
		settings[key] = { ...settings[key], [name]: content };
		return undefined;
	};
}

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--project-dir": (value, state) => {
		state.projectDir = value;
		return undefined;
	},
	"--config": (value, state) => {
		state.configPath = value;
		return undefined;
	},
	"--makensis": stringFlag("makensisBin"),
	"--script": stringFlag("scriptFile"),
	"--output": stringFlag("outputFile"),
	"--classifier": stringFlag("classifier"),
	"--build-dir": stringFlag("buildDirectory"),
	"--working-dir": stringFlag("workingDirectory"),
	"--header": stringFlag("headerFile"),
	"--nsis-dir": stringFlag("nsisDir"),
	"--encoding": stringFlag("outputEncoding"),
	"--env": recordFlag("--env", "environmentVariables"),
	"--define": recordFlag("--define", "defines"),
	"--verbosity": (value, { settings }) => {
		const level = parseInteger("--verbosity", value);
		if (typeof level === "string") return level;
		settings.verbosity = level;
		return undefined;
	},
	"--dict-size": (value, { settings }) => {
		const size = parseInteger("--dict-size", value);
		if (typeof size === "string") return size;
		if (size <= 0) return `--dict-size must be positive, got ${size}`;
		settings.compressionDictSize = size;
		return undefined;
	},
	"--compression": (value, { settings }) => {
		const algorithm = value.toLowerCase();
		if (!isCompressionAlgorithm(algorithm)) {
			return `--compression expects zlib, bzip2 or lzma, got "${value}"`;
		}
		settings.compression = algorithm;
		return undefined;
	},
};

const switchHandlers: Readonly<Record<string, SwitchHandler | undefined>> = {
	"--final": (s) => {
		s.compressionIsFinal = true;
	},
	"--solid": (s) => {
		s.compressionIsSolid = true;
	},
	"--no-header": (s) => {
		s.injectHeaderFile = false;
	},
	"--no-auto-nsis-dir": (s) => {
		s.autoNsisDir = false;
	},
	"--no-attach": (s) => {
		s.attachArtifact = false;
	},
	"--disabled": (s) => {
		s.disabled = true;
	},
};

/** Splits `--flag=value` into its parts. */
function splitInlineValue(arg: string): readonly [string, string | undefined] {
	const eq = arg.indexOf("=");
	return arg.startsWith("--") && eq > 2
		? [arg.slice(0, eq), arg.slice(eq + 1)]
		: [arg, undefined];
}

/**
 * Applies one argument. Returns how many following tokens it consumed, or
 * an error message.
 */
function processArgument(
	arg: string,
	next: string | undefined,
	state: ParseState,
): number | string {
	if (arg === "--help" || arg === "-h") {
		state.command = "help";
		return 0;
	}
	const [flag, inline] = splitInlineValue(arg);

	const toggle = switchHandlers[flag];
	if (toggle !== undefined && inline === undefined) {
		toggle(state.settings);
		return 0;
	}

	const handler = valueHandlers[flag];
	if (handler !== undefined) {
		const value = inline ?? next;
		if (value === undefined) return `${flag} requires a value`;
		const problem = handler(value, state);
		if (problem !== undefined) return problem;
		return inline === undefined ? 1 : 0;
	}

	if (!arg.startsWith("-") && isCommand(arg) && state.command === undefined) {
		state.command = arg;
		return 0;
	}
	return arg.startsWith("-")
		? `Unknown option ${arg}`
		: `Unexpected argument "${arg}"`;
}

/**
 * Parses the command line.
 *
 * @param args - Arguments after the script name
 * @param cwd - Base for relative `--project-dir` and `--config`
 * @returns Options, or ConfigError for unknown flags and bad values
 *
 * @example
 * ```ts
 * parseCLIArgs(["make", "--verbosity", "3", "--final"], "/work");
 * // Right({ command: "make", projectDir: "/work", settings: { verbosity: 3, compressionIsFinal: true } })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
	cwd: string = process.cwd(),
): Either.Either<CLIOptions, ConfigError> {
	const state: ParseState = {
		command: undefined,
		projectDir: undefined,
		configPath: undefined,
		settings: {},
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args.at(i) ?? "";
		if (arg.length === 0) continue;
		const result = processArgument(arg, args.at(i + 1), state);
		if (typeof result === "string") {
			return Either.left(new ConfigError({ detail: result }));
		}
		i += result;
	}

	const base: CLIOptions = {
		command: state.command ?? "make",
		projectDir: path.resolve(cwd, state.projectDir ?? "."),
		settings: state.settings,
	};
	// exactOptionalPropertyTypes: an absent --config stays absent
	return Either.right(
		state.configPath === undefined
			? base
			: { ...base, configPath: path.resolve(cwd, state.configPath) },
	);
}

export const USAGE = `Usage: makensis-runner [make|generate-header|help] [options]

Options:
  --project-dir <dir>     Project directory (default: current directory)
  --config <file>         Configuration file (default: <project-dir>/makensis.config.json)
  --makensis <bin>        makensis binary name or path (default: makensis)
  --script <file>         NSIS script (default: setup.nsi)
  --output <file>         Installer file, relative to the build directory
  --classifier <name>     Classifier appended to the installer name
  --build-dir <dir>       Build directory (default: dist)
  --working-dir <dir>     Working directory for makensis (adds NOCD)
  --verbosity <0-4>       makensis verbosity (default: 2)
  --compression <alg>     zlib, bzip2 or lzma
  --final                 Add /FINAL to SetCompressor
  --solid                 Add /SOLID to SetCompressor
  --dict-size <kb>        LZMA dictionary size in KB (default: 8)
  --header <file>         Header file (default: <build-dir>/project.nsh)
  --no-header             Don't inject the header file
  --nsis-dir <dir>        NSISDIR passed to makensis
  --no-auto-nsis-dir      Don't detect NSISDIR
  --env NAME=VALUE        Extra environment variable for makensis (repeatable)
  --define NAME=VALUE     Extra header define (repeatable)
  --no-attach             Don't register the installer in artifacts.json
  --encoding <label>      Encoding of makensis output
  --disabled              Do nothing and succeed
`;
