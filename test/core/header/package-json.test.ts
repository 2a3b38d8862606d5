import { describe, expect, it } from "vitest";

import {
	licensesOf,
	metadataFromPackageJson,
	parsePerson,
	splitPackageName,
} from "../../../src/core/header/package-json.js";
import { expectLeft, expectRight } from "../../utils/builders.js";

const context = { basedir: "/work", buildDirectory: "/work/dist" };

describe("splitPackageName", () => {
	it("separates the scope", () => {
		expect(splitPackageName("@acme/setup")).toEqual({
			scope: "acme",
			name: "setup",
		});
		expect(splitPackageName("setup")).toEqual({ name: "setup" });
	});
});

describe("parsePerson", () => {
	it("reads name and url from the shorthand", () => {
		expect(
			parsePerson("Jane Doe <jane@example.com> (https://jane.example)"),
		).toEqual({ name: "Jane Doe", url: "https://jane.example" });
		expect(parsePerson("Acme")).toEqual({ name: "Acme" });
		expect(parsePerson("Acme <team@acme.example>")).toEqual({ name: "Acme" });
	});

	it("rejects entries without a name", () => {
		expect(parsePerson("<team@acme.example>")).toBeUndefined();
		expect(parsePerson("  ")).toBeUndefined();
	});
});

describe("licensesOf", () => {
	it("reads SPDX strings and legacy objects", () => {
		expect(licensesOf({ license: "MIT" })).toEqual([{ name: "MIT" }]);
		expect(
			licensesOf({ license: { type: "BSD", url: "https://b.example" } }),
		).toEqual([{ name: "BSD", url: "https://b.example" }]);
	});

	it("appends the deprecated licenses array", () => {
		expect(
			licensesOf({ license: "MIT", licenses: [{ type: "GPL" }, 3] }),
		).toEqual([{ name: "MIT" }, { name: "GPL" }]);
		expect(licensesOf({})).toEqual([]);
	});
});

describe("metadataFromPackageJson", () => {
	it("maps package.json fields", () => {
		const metadata = expectRight(
			metadataFromPackageJson(
				{
					name: "@acme/setup",
					version: "1.2.3",
					productName: "Acme Setup",
					homepage: "https://example.com",
					license: "MIT",
					author: "Jane <jane@example.com> (https://jane.example)",
				},
				context,
			),
		);
		expect(metadata).toEqual({
			basedir: "/work",
			buildDirectory: "/work/dist",
			finalName: "setup-1.2.3",
			groupId: "acme",
			artifactId: "setup",
			name: "Acme Setup",
			version: "1.2.3",
			packaging: "npm",
			url: "https://example.com",
			licenses: [{ name: "MIT" }],
			organization: { name: "Jane", url: "https://jane.example" },
		});
	});

	it("falls back to the package name and prefers the configured organization", () => {
		const metadata = expectRight(
			metadataFromPackageJson(
				{ name: "setup", version: "2.0.0", author: { name: "Jane" } },
				{ ...context, classifier: "x64", organization: { name: "Acme" } },
			),
		);
		expect(metadata.name).toBe("setup");
		expect(metadata.groupId).toBeUndefined();
		expect(metadata.classifier).toBe("x64");
		expect(metadata.organization).toEqual({ name: "Acme" });
	});

	it("requires an object with name and version", () => {
		expect(expectLeft(metadataFromPackageJson([], context))).toBe(
			"package.json must contain a JSON object",
		);
		expect(
			expectLeft(metadataFromPackageJson({ version: "1.0.0" }, context)),
		).toBe('"name" is missing');
		expect(
			expectLeft(metadataFromPackageJson({ name: "setup", version: " " }, context)),
		).toBe('"version" is missing');
	});
});
