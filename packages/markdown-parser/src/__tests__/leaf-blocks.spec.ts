import { describe, expect, it } from "vitest";
import { type Block, type Inline, emptyAttr } from "../ast";
import { MarkdownParser } from "../markdown-parser";

function parse(input: string): Array<Block> {
	return new MarkdownParser().parse(input).blocks;
}

const str = (text: string): Inline => ({ type: "str", text });
const space: Inline = { type: "space" };
const softBreak: Inline = { type: "soft-break" };

function heading(level: number, children: Array<Inline>): Block {
	return { type: "heading", level, attr: emptyAttr(), children };
}

function code(text: string, classes: Array<string> = []): Block {
	return {
		type: "code-block",
		attr: { id: "", classes, attributes: [] },
		text,
	};
}

describe("thematic breaks", () => {
	it.each(["***", "---", "___", " ***", "* * *", "-- -", "_\t_ _"])(
		"parses %j as a thematic break",
		(input) => {
			expect(parse(input)).toEqual([{ type: "thematic-break" }]);
		},
	);

	it("parses a 4-space indented break as indented code", () => {
		expect(parse("    ***")).toEqual([code("***")]);
	});

	it("needs three markers", () => {
		expect(parse("--")).toEqual([{ type: "paragraph", children: [str("--")] }]);
	});

	it("interrupts a paragraph", () => {
		expect(parse("foo\n***\nbar")).toEqual([
			{ type: "paragraph", children: [str("foo")] },
			{ type: "thematic-break" },
			{ type: "paragraph", children: [str("bar")] },
		]);
	});
});

describe("ATX headings", () => {
	it("parses levels 1 to 6", () => {
		expect(parse("# foo")).toEqual([heading(1, [str("foo")])]);
		expect(parse("###### foo")).toEqual([heading(6, [str("foo")])]);
	});

	it("treats 7 hashes as paragraph text", () => {
		expect(parse("####### foo")).toEqual([
			{ type: "paragraph", children: [str("#######"), space, str("foo")] },
		]);
	});

	it("strips the closing sequence", () => {
		expect(parse("## foo ##")).toEqual([heading(2, [str("foo")])]);
		expect(parse("### foo ### b")).toEqual([
			heading(3, [str("foo"), space, str("###"), space, str("b")]),
		]);
		expect(parse("# foo#")).toEqual([heading(1, [str("foo#")])]);
	});

	it("requires a space after the opening sequence", () => {
		expect(parse("#5 bolt")).toEqual([
			{ type: "paragraph", children: [str("#5"), space, str("bolt")] },
		]);
	});

	it("allows empty headings", () => {
		expect(parse("#")).toEqual([heading(1, [])]);
		expect(parse("### ###")).toEqual([heading(3, [])]);
	});

	it("interrupts a paragraph", () => {
		expect(parse("foo\n# bar")).toEqual([
			{ type: "paragraph", children: [str("foo")] },
			heading(1, [str("bar")]),
		]);
	});
});

describe("setext headings", () => {
	it("turns a paragraph underlined with = into a level 1 heading", () => {
		expect(parse("Foo\n====")).toEqual([heading(1, [str("Foo")])]);
	});

	it("turns a paragraph underlined with - into a level 2 heading", () => {
		expect(parse("Foo\n----")).toEqual([heading(2, [str("Foo")])]);
	});

	it("keeps an underline with interior gaps as paragraph text", () => {
		expect(parse("Foo\n= =")).toEqual([
			{
				type: "paragraph",
				children: [str("Foo"), softBreak, str("="), space, str("=")],
			},
		]);
	});

	it("spans every line of the paragraph", () => {
		expect(parse("Foo\nbar\n---")).toEqual([
			heading(2, [str("Foo"), softBreak, str("bar")]),
		]);
	});
});

describe("paragraphs", () => {
	it("joins lines with soft breaks and drops leading whitespace", () => {
		expect(parse("aaa\n   bbb")).toEqual([
			{ type: "paragraph", children: [str("aaa"), softBreak, str("bbb")] },
		]);
	});

	it("cannot be interrupted by indented code", () => {
		expect(parse("foo\n    bar")).toEqual([
			{ type: "paragraph", children: [str("foo"), softBreak, str("bar")] },
		]);
	});

	it("ends at a blank line", () => {
		expect(parse("foo\n\nbar")).toEqual([
			{ type: "paragraph", children: [str("foo")] },
			{ type: "paragraph", children: [str("bar")] },
		]);
	});

	it("accepts CRLF and CR line endings", () => {
		expect(parse("# a\r\nb\rc")).toEqual([
			heading(1, [str("a")]),
			{ type: "paragraph", children: [str("b"), softBreak, str("c")] },
		]);
	});
});

describe("indented code", () => {
	it("removes four columns of indentation", () => {
		expect(parse("      indented")).toEqual([code("  indented")]);
	});

	it("keeps interior blank lines and drops trailing ones", () => {
		expect(parse("    a\n\n    b\n\n")).toEqual([code("a\n\nb")]);
	});

	it("ends at a less indented line", () => {
		expect(parse("    foo\nbar")).toEqual([
			code("foo"),
			{ type: "paragraph", children: [str("bar")] },
		]);
	});
});

describe("fenced code", () => {
	it("keeps the first word of the info string as a class", () => {
		expect(parse("```ruby startline=3\ndef foo\n```")).toEqual([
			code("def foo", ["ruby"]),
		]);
	});

	it("keeps blank lines and indentation", () => {
		expect(parse("~~~\n\n  x\n~~~")).toEqual([code("\n  x")]);
	});

	it("removes the indentation of the opening fence from content lines", () => {
		expect(parse(" ```\n  aaa\naaa\n```")).toEqual([code(" aaa\naaa")]);
	});

	it("closes only with a fence at least as long, of the same character", () => {
		expect(parse("````\naaa\n```\n``````")).toEqual([code("aaa\n```")]);
		expect(parse("~~~\naaa\n```\n~~~")).toEqual([code("aaa\n```")]);
	});

	it("runs to the end of the input when unclosed", () => {
		expect(parse("```\nabc")).toEqual([code("abc")]);
	});

	it("rejects a backtick fence whose info string contains a backtick", () => {
		expect(parse("``` a`b")).toEqual([
			{ type: "paragraph", children: [str("```"), space, str("a`b")] },
		]);
	});

	it("interrupts a paragraph", () => {
		expect(parse("foo\n```\nbar\n```")).toEqual([
			{ type: "paragraph", children: [str("foo")] },
			code("bar"),
		]);
	});

	it("decodes escapes in the info string", () => {
		expect(parse("~~~ c\\+\\+\nx\n~~~")).toEqual([code("x", ["c++"])]);
	});
});
