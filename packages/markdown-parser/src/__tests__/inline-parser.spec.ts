import { describe, expect, it } from "vitest";
import { type Inline, emptyAttr } from "../ast";
import { parseInline, unescapeString } from "../inline-parser";
import { LinkReferenceTable } from "../link-references";

function parse(input: string, references = new LinkReferenceTable()): Array<Inline> {
	return parseInline(input, { references });
}

const str = (text: string): Inline => ({ type: "str", text });
const space: Inline = { type: "space" };

function link(children: Array<Inline>, url: string, title = ""): Inline {
	return { type: "link", attr: emptyAttr(), children, target: { url, title } };
}

describe("text", () => {
	it("splits words and collapses runs of spaces", () => {
		expect(parse("foo   bar")).toEqual([str("foo"), space, str("bar")]);
	});

	it("keeps angle brackets that do not form an autolink", () => {
		expect(parse("<b>")).toEqual([str("<b>")]);
	});
});

describe("breaks", () => {
	it("turns a newline into a soft break", () => {
		expect(parse("foo\nbar")).toEqual([
			str("foo"),
			{ type: "soft-break" },
			str("bar"),
		]);
	});

	it("turns two trailing spaces into a hard break", () => {
		expect(parse("foo  \nbar")).toEqual([
			str("foo"),
			{ type: "line-break" },
			str("bar"),
		]);
	});

	it("drops trailing tabs before a soft break", () => {
		expect(parse("a\t\nb")).toEqual([str("a"), { type: "soft-break" }, str("b")]);
	});

	it("counts only spaces toward a hard break", () => {
		expect(parse("a \t\nb")).toEqual([str("a"), { type: "soft-break" }, str("b")]);
	});

	it("turns a backslash at the end of a line into a hard break", () => {
		expect(parse("foo\\\nbar")).toEqual([
			str("foo"),
			{ type: "line-break" },
			str("bar"),
		]);
	});
});

describe("code spans", () => {
	it("matches only a closing run of the same length", () => {
		expect(parse("`` foo ` bar ``")).toEqual([
			{ type: "code", attr: emptyAttr(), text: "foo ` bar" },
		]);
	});

	it("turns newlines into spaces", () => {
		expect(parse("`a\nb`")).toEqual([
			{ type: "code", attr: emptyAttr(), text: "a b" },
		]);
	});

	it("does not strip the spaces of a span made only of spaces", () => {
		expect(parse("`  `")).toEqual([
			{ type: "code", attr: emptyAttr(), text: "  " },
		]);
	});

	it("leaves an unmatched run as text", () => {
		expect(parse("```foo``")).toEqual([str("```foo``")]);
	});

	it("takes precedence over emphasis", () => {
		expect(parse("*a `*`*")).toEqual([
			{
				type: "emphasis",
				children: [str("a"), space, { type: "code", attr: emptyAttr(), text: "*" }],
			},
		]);
	});
});

describe("escapes and entities", () => {
	it("turns escaped punctuation into text", () => {
		expect(parse("\\*not emphasized*")).toEqual([
			str("*not"),
			space,
			str("emphasized*"),
		]);
	});

	it("keeps a backslash before other characters", () => {
		expect(parse("\\a")).toEqual([str("\\a")]);
	});

	it("decodes named and numeric entities", () => {
		expect(parse("&amp; &copy; &#35; &#x22;")).toEqual([
			str("&"),
			space,
			str("©"),
			space,
			str("#"),
			space,
			str('"'),
		]);
	});

	it("replaces an invalid code point with U+FFFD", () => {
		expect(parse("&#0;")).toEqual([str("�")]);
	});

	it("leaves unknown and overlong entities as text", () => {
		expect(parse("&nosuch; &#12345678;")).toEqual([
			str("&nosuch;"),
			space,
			str("&#12345678;"),
		]);
	});

	it("unescapes destinations and titles", () => {
		expect(unescapeString("a\\*b&amp;c")).toBe("a*b&c");
		expect(unescapeString("\\q")).toBe("\\q");
	});
});

describe("emphasis", () => {
	it("parses emphasis and strong emphasis", () => {
		expect(parse("foo *bar* __baz__")).toEqual([
			str("foo"),
			space,
			{ type: "emphasis", children: [str("bar")] },
			space,
			{ type: "strong", children: [str("baz")] },
		]);
	});

	it("applies the rule of three to **foo*bar**", () => {
		expect(parse("**foo*bar**")).toEqual([
			{ type: "strong", children: [str("foo*bar")] },
		]);
	});

	it("nests strong inside emphasis", () => {
		expect(parse("*foo**bar**baz*")).toEqual([
			{
				type: "emphasis",
				children: [
					str("foo"),
					{ type: "strong", children: [str("bar")] },
					str("baz"),
				],
			},
		]);
	});

	it("parses a run of three as strong inside emphasis", () => {
		expect(parse("***foo***")).toEqual([
			{
				type: "emphasis",
				children: [{ type: "strong", children: [str("foo")] }],
			},
		]);
	});

	it("leaves intraword underscores alone", () => {
		expect(parse("snake_case_word")).toEqual([str("snake_case_word")]);
	});

	it("needs a closing run that is right-flanking", () => {
		expect(parse("*foo bar *")).toEqual([
			str("*foo"),
			space,
			str("bar"),
			space,
			str("*"),
		]);
	});

	it("keeps the unmatched part of a longer run as text", () => {
		expect(parse("**foo*")).toEqual([
			str("*"),
			{ type: "emphasis", children: [str("foo")] },
		]);
	});
});

describe("strikethrough", () => {
	it("pairs runs of one or two tildes", () => {
		expect(parse("~~a~~ ~b~")).toEqual([
			{ type: "strikeout", children: [str("a")] },
			space,
			{ type: "strikeout", children: [str("b")] },
		]);
	});

	it("closes runs in the middle of text", () => {
		expect(parse("foo ~~bar~~ baz")).toEqual([
			str("foo"),
			space,
			{ type: "strikeout", children: [str("bar")] },
			space,
			str("baz"),
		]);
	});

	it("needs runs of the same length", () => {
		expect(parse("~~a~")).toEqual([str("~~a~")]);
	});

	it("leaves longer runs as text", () => {
		expect(parse("~~~a~~~")).toEqual([str("~~~a~~~")]);
	});

	it("nests with emphasis", () => {
		expect(parse("*~~a~~*")).toEqual([
			{ type: "emphasis", children: [{ type: "strikeout", children: [str("a")] }] },
		]);
	});
});

describe("links and images", () => {
	it("parses inline links with a title", () => {
		expect(parse('[link](/uri "title")')).toEqual([
			link([str("link")], "/uri", "title"),
		]);
	});

	it("accepts an empty destination and an angle-bracketed one", () => {
		expect(parse("[link]()")).toEqual([link([str("link")], "")]);
		expect(parse("[link](<foo bar>)")).toEqual([link([str("link")], "foo bar")]);
	});

	it("does not percent-encode destinations", () => {
		expect(parse("[a](/ä b)")).toEqual([str("[a](/ä"), space, str("b)")]);
		expect(parse("[a](/ä)")).toEqual([link([str("a")], "/ä")]);
	});

	it("parses images with inline content as the description", () => {
		expect(parse("![alt *x*](/a.png)")).toEqual([
			{
				type: "image",
				attr: emptyAttr(),
				children: [str("alt"), space, { type: "emphasis", children: [str("x")] }],
				target: { url: "/a.png", title: "" },
			},
		]);
	});

	it("resolves full, collapsed and shortcut references", () => {
		const references = new LinkReferenceTable([
			["Foo", { destination: "/url", title: "t" }],
		]);
		expect(parse("[text][FOO]", references)).toEqual([
			link([str("text")], "/url", "t"),
		]);
		expect(parse("[Foo][]", references)).toEqual([link([str("Foo")], "/url", "t")]);
		expect(parse("[foo]", references)).toEqual([link([str("foo")], "/url", "t")]);
	});

	it("leaves unknown references as text", () => {
		expect(parse("[nope]")).toEqual([str("[nope]")]);
	});

	it("does not nest links", () => {
		expect(parse("[a [b](c) d](e)")).toEqual([
			str("[a"),
			space,
			link([str("b")], "c"),
			space,
			str("d](e)"),
		]);
	});

	it("parses URI and email autolinks", () => {
		expect(parse("<https://example.com/a>")).toEqual([
			{
				type: "link",
				attr: { id: "", classes: ["uri"], attributes: [] },
				children: [str("https://example.com/a")],
				target: { url: "https://example.com/a", title: "" },
			},
		]);
		expect(parse("<someone@example.com>")).toEqual([
			{
				type: "link",
				attr: { id: "", classes: ["email"], attributes: [] },
				children: [str("someone@example.com")],
				target: { url: "mailto:someone@example.com", title: "" },
			},
		]);
	});
});
