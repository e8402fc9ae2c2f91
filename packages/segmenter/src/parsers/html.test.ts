/**
 * HTML Markup Parser Tests
 */

import { describe, expect, test } from "vitest";
import { extractHtmlContent, parseHtml } from "./html.js";

// ============================================
// Test Fixtures
// ============================================

const EDGAR_SUBMISSION = `<SEC-DOCUMENT>0000000000-24-000001.txt : 20240301
<SEC-HEADER>
CONFORMED SUBMISSION TYPE:	8-K
</SEC-HEADER>
<DOCUMENT>
<TYPE>8-K
<TEXT>
<HTML><BODY><P>Hello</P></BODY></HTML>
</TEXT>
</DOCUMENT>
<DOCUMENT>
<TYPE>EX-99.1
<TEXT>
<html><body><p>Exhibit</p></body></html>
</TEXT>
</DOCUMENT>
</SEC-DOCUMENT>`;

// ============================================
// extractHtmlContent
// ============================================

describe("extractHtmlContent", () => {
	test("takes the first html document out of a submission", () => {
		expect(extractHtmlContent(EDGAR_SUBMISSION)).toBe("<HTML><BODY><P>Hello</P></BODY></HTML>");
	});

	test("runs to the end when the html element is never closed", () => {
		expect(extractHtmlContent("junk <html><body>open")).toBe("<html><body>open");
	});

	test("content without an html tag starts at its first tag", () => {
		expect(extractHtmlContent("header junk <div>x</div>")).toBe("<div>x</div>");
	});

	test("content without tags is returned as is", () => {
		expect(extractHtmlContent("plain text only")).toBe("plain text only");
	});

	test("a plain html document is unchanged", () => {
		const html = "<html><body><p>x</p></body></html>";
		expect(extractHtmlContent(html)).toBe(html);
	});
});

// ============================================
// parseHtml
// ============================================

describe("parseHtml", () => {
	test("returns the body with lower-cased tags", () => {
		const root = parseHtml("<HTML><BODY><P>Hello</P></BODY></HTML>");

		expect(root).toEqual({
			kind: "element",
			tag: "body",
			attributes: {},
			children: [{ kind: "element", tag: "p", attributes: {}, children: [{ kind: "text", text: "Hello" }] }],
		});
	});

	test("copies attributes", () => {
		const root = parseHtml('<div style="font-weight:bold" class="title">x</div>');

		const [div] = root.children;
		expect(div?.kind === "element" ? div.attributes : undefined).toEqual({
			style: "font-weight:bold",
			class: "title",
		});
	});

	test("drops comments", () => {
		const root = parseHtml("<p>a<!-- hidden -->b</p>");

		const [p] = root.children;
		expect(p?.kind === "element" ? p.children : undefined).toEqual([
			{ kind: "text", text: "a" },
			{ kind: "text", text: "b" },
		]);
	});

	test("decodes entities", () => {
		const root = parseHtml("<p>Smith &amp; Jones&nbsp;LLP</p>");

		const [p] = root.children;
		expect(p?.kind === "element" ? p.children : undefined).toEqual([{ kind: "text", text: "Smith & Jones\u00a0LLP" }]);
	});

	test("fragments and empty input still get a body", () => {
		expect(parseHtml("").tag).toBe("body");
		expect(parseHtml("").children).toEqual([]);
		expect(parseHtml("<p>x</p>").children).toHaveLength(1);
	});
});
