// FORMAT THEOREM: drain(p, s) calls s(l) once per complete line l of stdout ∪ stderr
// PURITY: SHELL
// EFFECT: Effect<void, never>
// INVARIANT: Lines of one pipe reach the sink in order; read errors end draining quietly
// COMPLEXITY: O(n) where n = bytes of output; memory bounded by OUTPUT_BUFFER_CAPACITY lines

import type { Readable } from "node:stream";
import { Effect, Stream } from "effect";

import { toError } from "../../core/errors.js";
import type { LineSink } from "../../core/models.js";
import { debugLog, warn } from "../utils/log.js";
import type { RunningProcess } from "./runner.js";

/** Lines held between the pipe readers and a slow sink. */
export const OUTPUT_BUFFER_CAPACITY = 256;

export const FALLBACK_ENCODING = "utf-8";

export interface DrainOptions {
	readonly encoding: string;
}

/**
 * Returns the label if TextDecoder knows it, else the fallback.
 *
 * @pure false (may log a warning)
 */
export function supportedEncoding(label: string): string {
	try {
		return new TextDecoder(label).encoding;
	} catch (error) {
		warn(
			`Unsupported output encoding "${label}" (${toError(error).message}), using ${FALLBACK_ENCODING}`,
		);
		return FALLBACK_ENCODING;
	}
}

const pipeLines = (
	readable: Readable | null,
	encoding: string,
): Stream.Stream<string, Error> =>
	readable === null
		? Stream.empty
		: Stream.fromAsyncIterable<Uint8Array, Error>(readable, toError).pipe(
				Stream.decodeText(encoding),
				Stream.splitLines,
			);

/**
 * Streams the combined compiler output to a sink, one line at a time.
 * Meant to be forked right after launch; it completes when both pipes end.
 *
 * @param running - Started process whose pipes are read
 * @param sink - Called once per line, on the draining fiber
 *
 * @pure false
 * @effect Effect<void, never>
 * @postcondition both pipes are destroyed
 */
export function drainOutput(
	running: RunningProcess,
	sink: LineSink,
	options: DrainOptions,
): Effect.Effect<void> {
	const { stdout, stderr } = running.child;
	const encoding = supportedEncoding(options.encoding);

	return pipeLines(stdout, encoding).pipe(
		Stream.merge(pipeLines(stderr, encoding)),
		Stream.buffer({ capacity: OUTPUT_BUFFER_CAPACITY }),
		Stream.catchAll((error) => {
			debugLog(`Error while reading makensis output: ${error.message}`);
			return Stream.empty;
		}),
		Stream.runForEach((line) => Effect.sync(() => sink(line))),
		Effect.ensuring(
			Effect.sync(() => {
				stdout?.destroy();
				stderr?.destroy();
			}),
		),
	);
}
