import {
	type Block,
	type Inline,
	UnsupportedConstructError,
	createTable,
	emptyAttr,
} from "@doctree/markdown-parser";
import { describe, expect, it } from "vitest";
import { TypstWriter, escapeTypst } from "../typst-writer";

function write(...blocks: Array<Block>): string {
	return new TypstWriter().write({ meta: {}, blocks });
}

const str = (text: string): Inline => ({ type: "str", text });
const plain = (text: string): Block => ({ type: "plain", children: [str(text)] });
const paragraph = (...children: Array<Inline>): Block => ({ type: "paragraph", children });

describe("TypstWriter", () => {
	it("writes headings and paragraphs", () => {
		expect(
			write(
				{ type: "heading", level: 2, attr: emptyAttr(), children: [str("Title")] },
				paragraph(str("Hello"), { type: "space" }, { type: "emphasis", children: [str("world")] }),
			),
		).toBe("\n== Title\n\nHello _world_\n");
	});

	it("does not repeat markers of nested emphasis", () => {
		expect(
			write(
				paragraph({
					type: "strong",
					children: [
						str("a"),
						{ type: "strong", children: [str("b")] },
						{ type: "emphasis", children: [str("c")] },
					],
				}),
			),
		).toBe("\n*ab_c_*\n");
	});

	it("writes strikeout and breaks", () => {
		expect(
			write(
				paragraph(
					{ type: "strikeout", children: [str("old")] },
					{ type: "soft-break" },
					str("a"),
					{ type: "line-break" },
					str("b"),
				),
			),
		).toBe("\n#strike[old] a\\\nb\n");
	});

	it("writes inline code as raw text", () => {
		expect(write(plain("x"), { type: "plain", children: [{ type: "code", attr: emptyAttr(), text: "a" }] })).toBe(
			"x`a`",
		);
		expect(write({ type: "plain", children: [{ type: "code", attr: emptyAttr(), text: 'a`"b' }] })).toBe(
			'#raw("a`\\"b")',
		);
	});

	it("makes code fences longer than any backtick run inside", () => {
		expect(write({ type: "code-block", attr: emptyAttr(), text: "x" })).toBe("\n```\nx\n```\n");
		expect(
			write({ type: "code-block", attr: { ...emptyAttr(), classes: ["md"] }, text: "```\nx" }),
		).toBe("\n````md\n```\nx\n````\n");
	});

	it("writes links and images", () => {
		const link: Inline = {
			type: "link",
			attr: emptyAttr(),
			children: [str("site")],
			target: { url: 'https://example.com/"q"', title: "" },
		};
		const image: Inline = {
			type: "image",
			attr: emptyAttr(),
			children: [],
			target: { url: "/a.png", title: "" },
		};
		expect(write({ type: "plain", children: [link, image] })).toBe(
			'#link("https://example.com/\\"q\\"")[site]#figure(image("/a.png", width: 100%))',
		);
	});

	it("writes block quotes and rules", () => {
		expect(
			write({ type: "block-quote", children: [paragraph(str("q"))] }, { type: "thematic-break" }),
		).toBe("\n#quote(block: true)[\nq\n]\n\n#line(length: 100%)\n");
	});

	it("numbers ordered lists from their start", () => {
		const list: Block = {
			type: "ordered-list",
			attributes: { start: 9, style: "decimal", delimiter: "period" },
			items: [[plain("a")], [plain("b")]],
		};
		expect(write(list)).toBe("\n9. a\n10. b\n\n");
	});

	it("indents the content of list items by the marker width", () => {
		const list: Block = {
			type: "bullet-list",
			items: [[plain("a"), { type: "code-block", attr: emptyAttr(), text: "x" }]],
		};
		expect(write(list)).toBe("\n- a\n  ```\n  x\n  ```\n  \n\n");
	});

	it("writes tables with one row per line", () => {
		const table = createTable(
			["left", "default"],
			[[str("a")], [str("b")]],
			[[[str("1")], [str("2")]], [[str("3")]]],
		);
		expect(write(table)).toBe(
			[
				"",
				"#table(",
				"  columns: 2,",
				"  align: (col, row) => (left, auto,).at(col),",
				"  [a], [b],",
				"  [\\1], [\\2],",
				"  [\\3], [],",
				")",
				"",
			].join("\n"),
		);
	});

	it.each<Block>([
		{ type: "raw-block", format: "html", text: "<hr>" },
		{ type: "figure", attr: emptyAttr(), caption: { children: [] }, children: [] },
		{ type: "plain", children: [{ type: "underline", children: [] }] },
		{ type: "plain", children: [{ type: "span", attr: emptyAttr(), children: [] }] },
	])("throws on unsupported constructs (%#)", (block) => {
		expect(() => write(block)).toThrow(UnsupportedConstructError);
	});
});

describe("escapeTypst", () => {
	it("escapes markup characters and digits", () => {
		expect(escapeTypst("1. *a* #x_[y]")).toBe("\\1. \\*a\\* \\#x\\_\\[y\\]");
	});

	it("leaves other text alone", () => {
		expect(escapeTypst("plain, text!")).toBe("plain, text!");
	});
});
