// @vitest-environment jsdom
import { type Document, UnsupportedConstructError, emptyAttr } from "@doctree/markdown-parser";
import type { ReactNode } from "react";
import { flushSync } from "react-dom";
import { createRoot } from "react-dom/client";
import { renderToStaticMarkup } from "react-dom/server";
import { afterEach, describe, expect, it } from "vitest";
import { Markdown, isValidUrl, renderInlineAsPlainText } from "../markdown";

const roots: Array<() => void> = [];

function render(node: ReactNode): HTMLElement {
	const container = document.createElement("div");
	const root = createRoot(container);
	flushSync(() => root.render(node));
	roots.push(() => root.unmount());
	return container;
}

afterEach(() => {
	for (const unmount of roots.splice(0)) unmount();
});

describe("Markdown", () => {
	it("renders headings and paragraphs", () => {
		const container = render(<Markdown content={"# Title\n\nSome *text* and **more**"} />);
		expect(container.innerHTML).toBe(
			"<h1>Title</h1><p>Some <em>text</em> and <strong>more</strong></p>",
		);
	});

	it("renders tight lists without paragraphs", () => {
		const container = render(<Markdown content={"3. a\n4. b"} />);
		expect(container.innerHTML).toBe('<ol start="3"><li>a</li><li>b</li></ol>');
	});

	it("renders loose lists with paragraphs", () => {
		const container = render(<Markdown content={"- a\n\n- b"} />);
		expect(container.innerHTML).toBe("<ul><li><p>a</p></li><li><p>b</p></li></ul>");
	});

	it("renders code blocks with their language", () => {
		const container = render(<Markdown content={"```ts\nlet a = 1;\n```"} />);
		expect(container.innerHTML).toBe(
			'<pre><code class="language-ts">let a = 1;</code></pre>',
		);
	});

	it("renders tables with column alignment", () => {
		const container = render(<Markdown content={"| a | b |\n|:-:|---|\n| 1 | ~~2~~ |"} />);
		expect(container.querySelector("th")?.getAttribute("align")).toBe("center");
		expect(container.querySelectorAll("td")[1]?.innerHTML).toBe("<del>2</del>");
		expect(container.querySelectorAll("td")[1]?.hasAttribute("align")).toBe(false);
	});

	it("drops links with a script protocol", () => {
		const container = render(<Markdown content={"[x](javascript:alert(1)) [y](/ok 'T')"} />);
		const [unsafe, safe] = container.querySelectorAll("a");
		expect(unsafe?.hasAttribute("href")).toBe(false);
		expect(safe?.getAttribute("href")).toBe("/ok");
		expect(safe?.getAttribute("title")).toBe("T");
	});

	it("describes images by their text", () => {
		const container = render(<Markdown content={"![a *b* `c`](/i.png)"} />);
		expect(container.querySelector("img")?.getAttribute("alt")).toBe("a b c");
	});

	it("lets callers replace components", () => {
		const container = render(
			<Markdown
				components={{
					Heading: ({ level, children }) => (
						<div data-level={level}>{children}</div>
					),
					Text: ({ text }) => text.toUpperCase(),
				}}
				content="## hi"
			/>,
		);
		expect(container.innerHTML).toBe('<div data-level="2">HI</div>');
	});

	it("passes parse options through", () => {
		const container = render(<Markdown content={"a|b\n-|-"} options={{ tables: false }} />);
		expect(container.querySelector("table")).toBeNull();
	});

	it("renders documents built elsewhere", () => {
		const document: Document = {
			meta: {},
			blocks: [{ type: "thematic-break" }],
		};
		expect(render(<Markdown document={document} />).innerHTML).toBe("<hr>");
	});

	it("throws on constructs it cannot render", () => {
		const document: Document = {
			meta: {},
			blocks: [{ type: "div", attr: emptyAttr(), children: [] }],
		};
		expect(() => renderToStaticMarkup(<Markdown document={document} />)).toThrow(
			UnsupportedConstructError,
		);
	});
});

describe("isValidUrl", () => {
	it("accepts safe image data URLs only", () => {
		expect(isValidUrl("data:image/png;base64,AAAA")).toBe(true);
		expect(isValidUrl("data:text/html;base64,AAAA")).toBe(false);
		expect(isValidUrl(" JavaScript:void(0)")).toBe(false);
		expect(isValidUrl("https://example.com")).toBe(true);
	});
});

describe("renderInlineAsPlainText", () => {
	it("joins text and breaks", () => {
		expect(
			renderInlineAsPlainText([
				{ type: "str", text: "a" },
				{ type: "line-break" },
				{ type: "code", attr: emptyAttr(), text: "b" },
			]),
		).toBe("a\nb");
	});
});
