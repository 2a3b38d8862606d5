// PURITY: SHELL (spawns child processes)
// EFFECT: Effect<RunningProcess, LaunchError>
// INVARIANT: The exit listener is attached before launch resolves, so no exit is missed
// COMPLEXITY: O(n) where n = |env| + |argv|

import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import { Effect, Option } from "effect";

import { LaunchError, toError } from "../../core/errors.js";
import { windowsCommandLineArgument } from "../../core/format/argument.js";
import type { Command, InvocationConfig, Platform } from "../../core/models.js";
import { NSISDIR_VARIABLE } from "../resolve/nsis-dir.js";
import { type Environment, readEnv } from "../resolve/executable.js";
import { debugLog } from "../utils/log.js";

/**
 * The part of a Node.js ChildProcess the runner depends on.
 * `ChildProcess` satisfies it; tests substitute an in-process fake.
 */
export interface ChildProcessLike {
	readonly stdout: Readable | null;
	readonly stderr: Readable | null;
	kill(signal?: NodeJS.Signals): boolean;
	once(event: "spawn", listener: () => void): unknown;
	once(event: "error", listener: (error: Error) => void): unknown;
	once(
		event: "exit",
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): unknown;
}

export type Spawner = (
	command: string,
	args: readonly string[],
	options: SpawnOptions,
) => ChildProcessLike;

export const nodeSpawner: Spawner = (command, args, options) =>
	spawn(command, args, options);

export interface ExitStatus {
	readonly code: number | null;
	readonly signal: NodeJS.Signals | null;
}

/**
 * A started compiler process.
 *
 * @property exited Settles once with the raw exit status
 */
export interface RunningProcess {
	readonly executable: string;
	readonly child: ChildProcessLike;
	readonly exited: Promise<ExitStatus>;
}

export interface LaunchOptions {
	readonly platform: Platform;
	readonly cwd: string;
	readonly env: Readonly<Record<string, string>>;
	readonly spawner?: Spawner;
}

function setVariable(
	env: Record<string, string>,
	name: string,
	value: string,
	platform: Platform,
): void {
	if (platform.isWindows) {
		const upper = name.toUpperCase();
		for (const key of Object.keys(env)) {
			if (key !== name && key.toUpperCase() === upper) delete env[key];
		}
	}
	env[name] = value;
}

/**
 * Builds the child environment: the inherited variables, then a detected
 * NSISDIR unless one was inherited, then the configured overrides, then an
 * explicit NSISDIR.
 *
 * @pure true
 * @postcondition config.auxDirOverride set → result.NSISDIR = config.auxDirOverride
 */
export function buildEnvironment(
	inherited: Environment,
	config: Pick<InvocationConfig, "environmentOverrides" | "auxDirOverride">,
	detectedNsisDir: Option.Option<string>,
	platform: Platform,
): Record<string, string> {
	const env: Record<string, string> = {};
	for (const [name, value] of Object.entries(inherited)) {
		if (value !== undefined) env[name] = value;
	}
	if (
		Option.isSome(detectedNsisDir) &&
		readEnv(inherited, NSISDIR_VARIABLE, platform) === undefined
	) {
		setVariable(env, NSISDIR_VARIABLE, detectedNsisDir.value, platform);
	}
	for (const [name, value] of Object.entries(config.environmentOverrides)) {
		setVariable(env, name, value, platform);
	}
	if (config.auxDirOverride !== undefined) {
		setVariable(env, NSISDIR_VARIABLE, config.auxDirOverride, platform);
	}
	return env;
}

function spawnOptions(
	executable: string,
	options: LaunchOptions,
): SpawnOptions {
	const base: SpawnOptions = {
		cwd: options.cwd,
		env: options.env,
		stdio: ["ignore", "pipe", "pipe"],
		windowsHide: true,
	};
	// the formatted tokens already carry makensis' own escaping
	return options.platform.isWindows
		? {
				...base,
				windowsVerbatimArguments: true,
				argv0: windowsCommandLineArgument(executable),
			}
		: base;
}

/**
 * Starts makensis with piped stdout and stderr.
 *
 * Resolves on the child's `spawn` event; an `error` before it (binary
 * missing, not executable, bad working directory) fails with LaunchError.
 *
 * @param command - Full argv; index 0 is the executable
 *
 * @pure false
 * @effect Effect<RunningProcess, LaunchError>
 */
export function launch(
	command: Command,
	options: LaunchOptions,
): Effect.Effect<RunningProcess, LaunchError> {
	const [executable, ...args] = command;
	if (executable === undefined) {
		return Effect.fail(
			new LaunchError({
				executable: "",
				reason: new Error("Empty command"),
			}),
		);
	}
	const spawner = options.spawner ?? nodeSpawner;
	const argv = options.platform.isWindows
		? args.map(windowsCommandLineArgument)
		: args;

	return Effect.async<RunningProcess, LaunchError>((resume) => {
		debugLog(`Executing ${[executable, ...args].join(" ")} in ${options.cwd}`);

		let child: ChildProcessLike;
		try {
			child = spawner(executable, argv, spawnOptions(executable, options));
		} catch (error) {
			resume(
				Effect.fail(new LaunchError({ executable, reason: toError(error) })),
			);
			return;
		}

		const exited = new Promise<ExitStatus>((resolve) => {
			child.once("exit", (code, signal) => {
				resolve({ code, signal });
			});
		});

		let started = false;
		child.once("error", (error) => {
			if (started) {
				debugLog(`makensis process error: ${error.message}`);
				return;
			}
			resume(Effect.fail(new LaunchError({ executable, reason: error })));
		});
		child.once("spawn", () => {
			started = true;
			resume(Effect.succeed({ executable, child, exited }));
		});
	});
}
