// PURITY: SHELL
// EFFECT: Effect<void, ArtifactError>
// INVARIANT: One entry per (file, classifier); other entries keep their order
// COMPLEXITY: O(n) where n = entries already in the manifest

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Effect } from "effect";

import { ArtifactError, toError } from "../../core/errors.js";
import { isArray, isJSONObject } from "../../core/json.js";

export const ARTIFACT_MANIFEST = "artifacts.json";

/**
 * A build output handed to the rest of the pipeline.
 */
export interface Artifact {
	readonly file: string;
	readonly type: "exe";
	readonly classifier?: string;
}

/**
 * Receives produced installers.
 */
export interface ArtifactRegistry {
	readonly attach: (artifact: Artifact) => Effect.Effect<void, ArtifactError>;
}

const readEntries = (manifest: string): Promise<readonly unknown[]> =>
	fs.readFile(manifest, "utf8").then(
		(raw) => {
			const parsed: unknown = JSON.parse(raw);
			if (!isArray(parsed)) {
				throw new Error(`${manifest} must contain a JSON array`);
			}
			return parsed;
		},
		(error: NodeJS.ErrnoException) => {
			if (error.code === "ENOENT") return [];
			throw error;
		},
	);

const sameOutput = (entry: unknown, artifact: Artifact): boolean =>
	isJSONObject(entry) &&
	entry["file"] === artifact.file &&
	entry["classifier"] === artifact.classifier;

/**
 * Entries with `artifact` registered once: an entry for the same file and
 * classifier is replaced in place, otherwise the artifact is appended.
 *
 * @pure true
 */
export function withArtifact(
	entries: readonly unknown[],
	artifact: Artifact,
): readonly unknown[] {
	const index = entries.findIndex((entry) => sameOutput(entry, artifact));
	return index === -1
		? [...entries, artifact]
		: entries.map((entry, i) => (i === index ? artifact : entry));
}

/**
 * Registry backed by a JSON manifest in the build directory.
 *
 * @param buildDirectory - Directory holding `artifacts.json`
 *
 * @example
 * ```ts
 * const registry = manifestRegistry("/work/dist");
 * yield* registry.attach({ file: "/work/dist/app-setup.exe", type: "exe" });
 * ```
 */
export function manifestRegistry(buildDirectory: string): ArtifactRegistry {
	const manifest = path.join(buildDirectory, ARTIFACT_MANIFEST);
	return {
		attach: (artifact) =>
			Effect.tryPromise({
				try: async () => {
					const entries = await readEntries(manifest);
					await fs.mkdir(buildDirectory, { recursive: true });
					await fs.writeFile(
						manifest,
						`${JSON.stringify(withArtifact(entries, artifact), null, 2)}\n`,
						"utf8",
					);
				},
				catch: (error) =>
					new ArtifactError({ file: artifact.file, reason: toError(error) }),
			}),
	};
}
