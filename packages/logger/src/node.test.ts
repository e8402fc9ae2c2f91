/**
 * Node Logger Tests
 */

import { describe, expect, test } from "vitest";
import { createNodeLogger, withDocumentContext } from "./node.js";
import { DEFAULT_REDACT_PATHS, mergeRedactPaths } from "./redaction.js";

describe("mergeRedactPaths", () => {
	test("returns the defaults when nothing is added", () => {
		expect(mergeRedactPaths()).toEqual([...DEFAULT_REDACT_PATHS]);
	});

	test("appends extra paths without duplicates", () => {
		expect(mergeRedactPaths(["html", "*.content"])).toEqual([...DEFAULT_REDACT_PATHS, "*.content"]);
	});
});

describe("createNodeLogger", () => {
	test("uses the requested level", () => {
		const logger = createNodeLogger({ service: "test", level: "warn", pretty: false });

		expect(logger.level).toBe("warn");
		expect(logger.isLevelEnabled("error")).toBe(true);
		expect(logger.isLevelEnabled("info")).toBe(false);
	});

	test("stops logging once destroyed", async () => {
		let calls = 0;
		const logger = createNodeLogger({
			service: "test",
			level: "info",
			pretty: false,
			pinoOptions: {
				hooks: {
					logMethod() {
						calls++;
					},
				},
			},
		});

		logger.info("before");
		await logger.destroy();
		logger.info("after");

		expect(calls).toBe(1);
	});

	test("destroy can be called twice", async () => {
		const logger = createNodeLogger({ service: "test", level: "silent", pretty: false });

		await logger.destroy();
		await expect(logger.destroy()).resolves.toBeUndefined();
	});
});

describe("withDocumentContext", () => {
	test("binds the document fields next to the service", () => {
		const logger = createNodeLogger({ service: "test", level: "silent", pretty: false });

		const child = withDocumentContext(logger, { documentId: "doc-1", sourcePath: "in/doc-1.htm" });

		expect(child.bindings()).toEqual({ service: "test", documentId: "doc-1", sourcePath: "in/doc-1.htm" });
	});
});

describe("package exports", () => {
	test("exposes the logger factory, context helper and redaction paths only", async () => {
		const loggerModule = await import("./index.js");

		expect(Object.keys(loggerModule).sort()).toEqual([
			"DEFAULT_REDACT_PATHS",
			"createNodeLogger",
			"mergeRedactPaths",
			"withDocumentContext",
		]);
	});
});
