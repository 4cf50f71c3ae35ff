import { describe, expect, it } from "vitest";
import type { Inline } from "../ast";
import { MarkdownParser } from "../markdown-parser";

const str = (text: string): Inline => ({ type: "str", text });

function link(children: Array<Inline>, url: string, title = ""): Inline {
	return {
		type: "link",
		attr: { id: "", classes: [], attributes: [] },
		children,
		target: { url, title },
	};
}

describe("MarkdownParser", () => {
	it("returns an empty document for empty input", () => {
		expect(new MarkdownParser().parse("")).toEqual({ meta: {}, blocks: [] });
	});

	it("resolves references defined after their use", () => {
		const { blocks } = new MarkdownParser().parse("[foo]\n\n[foo]: /url");
		expect(blocks).toEqual([
			{ type: "paragraph", children: [link([str("foo")], "/url")] },
		]);
	});

	it("drops a paragraph made only of definitions", () => {
		const { blocks } = new MarkdownParser().parse('[a]: /a\n[b]: /b "B"');
		expect(blocks).toEqual([]);
	});

	it("reads definitions inside containers", () => {
		const { blocks } = new MarkdownParser().parse("> [foo]: /url\n\n[foo]");
		expect(blocks).toEqual([
			{ type: "block-quote", children: [] },
			{ type: "paragraph", children: [link([str("foo")], "/url")] },
		]);
	});

	it("reads the line after definitions as a line of its own when it underlines nothing", () => {
		const { blocks } = new MarkdownParser().parse("[foo]: /url\n===");
		expect(blocks).toEqual([{ type: "paragraph", children: [str("===")] }]);
	});

	it("lets preset references win over definitions in the text", () => {
		const parser = new MarkdownParser({
			references: [["x", { destination: "/preset" }]],
		});
		const { blocks } = parser.parse("[x]\n\n[x]: /text");
		expect(blocks).toEqual([
			{ type: "paragraph", children: [link([str("x")], "/preset")] },
		]);
	});

	it("can leave definitions as text", () => {
		const { blocks } = new MarkdownParser().parse("[foo]: /url", {
			linkReferenceDefinitions: false,
		});
		expect(blocks).toEqual([
			{
				type: "paragraph",
				children: [str("[foo]:"), { type: "space" }, str("/url")],
			},
		]);
	});

	it("copies the given metadata", () => {
		const meta = { title: { type: "string", value: "Notes" } } as const;
		const document = new MarkdownParser().parse("x", { meta });
		expect(document.meta).toEqual({ title: { type: "string", value: "Notes" } });
		expect(document.meta).not.toBe(meta);
	});

	it("lets options given to parse override the constructor's", () => {
		const parser = new MarkdownParser({ tables: false });
		expect(parser.parse("a|b\n-|-").blocks[0]?.type).toBe("paragraph");
		expect(parser.parse("a|b\n-|-", { tables: true }).blocks[0]?.type).toBe("table");
	});

	it("replaces NUL characters", () => {
		const { blocks } = new MarkdownParser().parse("a\0b");
		expect(blocks).toEqual([{ type: "paragraph", children: [str("a�b")] }]);
	});

	it.each([
		"> - > 1. ```\n> ",
		"-\n-\n-\n\n\n-",
		"***foo_ bar__*",
		"[[[[]]]](((",
		"| |\n|-|\n||||",
		"\t>\t-\t`",
		"1.\n   2)\n      3.",
		"&#;&#x;&;",
		"![[a](b)](c)",
	])("never throws on %j", (input) => {
		expect(() => new MarkdownParser().parse(input)).not.toThrow();
	});
});
