import * as path from "node:path";
import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { readProjectMetadata } from "../../../src/shell/project/metadata.js";
import { withTempDir, writeFile } from "../../utils/tempDir.js";

const readIn = (root: string) =>
	Effect.runPromise(
		Effect.either(
			readProjectMetadata(root, { buildDirectory: path.join(root, "dist") }),
		),
	);

describe("readProjectMetadata", () => {
	it("derives the metadata from package.json", async () => {
		await withTempDir(async (root) => {
			await writeFile(
				path.join(root, "package.json"),
				JSON.stringify({ name: "@acme/setup", version: "1.2.3", license: "MIT" }),
			);
			const result = await readIn(root);
			expect(Either.isRight(result)).toBe(true);
			if (Either.isRight(result)) {
				expect(result.right.basedir).toBe(root);
				expect(result.right.buildDirectory).toBe(path.join(root, "dist"));
				expect(result.right.finalName).toBe("setup-1.2.3");
				expect(result.right.groupId).toBe("acme");
				expect(result.right.licenses).toEqual([{ name: "MIT" }]);
			}
		});
	});

	it("fails when package.json is missing", async () => {
		await withTempDir(async (root) => {
			const result = await readIn(root);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left._tag).toBe("MetadataError");
				expect(result.left.path).toBe(path.join(root, "package.json"));
			}
		});
	});

	it("fails on invalid JSON and on missing fields", async () => {
		await withTempDir(async (root) => {
			const file = path.join(root, "package.json");
			await writeFile(file, "{ not json");
			expect(Either.isLeft(await readIn(root))).toBe(true);

			await writeFile(file, JSON.stringify({ name: "setup" }));
			const result = await readIn(root);
			expect(Either.isLeft(result)).toBe(true);
			if (Either.isLeft(result)) {
				expect(result.left.detail).toBe('"version" is missing');
			}
		});
	});
});
