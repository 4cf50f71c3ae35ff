import {
	type Alignment,
	type Block,
	type Document,
	type Inline,
	type TableBlock,
	UnsupportedConstructError,
} from "@doctree/markdown-parser";
import type { DocumentWriter } from "./formats";
import { writerLogger } from "./logger";

const TYPST_ALIGNMENTS: Record<Alignment, string> = {
	left: "left",
	right: "right",
	center: "center",
	default: "auto",
};

/**
 * Writes a document as Typst markup.
 *
 * Nested containers are written by indenting every new line by the width of the list markers around them:
 * ```
 * - first
 *   - nested
 * ```
 */
export class TypstWriter implements DocumentWriter {
	readonly format = "typst";
	#result = "";
	#indent = "";
	#inEmphasis = false;
	#inStrong = false;

	write(document: Document): string {
		this.#result = "";
		this.#indent = "";
		this.#inEmphasis = false;
		this.#inStrong = false;
		this.#writeBlocks(document.blocks);
		writerLogger("typst: wrote %d characters", this.#result.length);
		return this.#result;
	}

	#newLine(): void {
		this.#result += `\n${this.#indent}`;
	}

	#writeBlocks(blocks: Array<Block>): void {
		for (const block of blocks) this.#writeBlock(block);
	}

	#writeBlock(block: Block): void {
		switch (block.type) {
			case "plain":
				this.#writeInlines(block.children);
				break;
			case "paragraph":
				this.#newLine();
				this.#writeInlines(block.children);
				this.#newLine();
				break;
			case "heading":
				this.#newLine();
				this.#result += `${"=".repeat(block.level)} `;
				this.#writeInlines(block.children);
				this.#newLine();
				break;
			case "code-block":
				this.#writeCodeBlock(block.attr.classes[0] ?? "", block.text);
				break;
			case "block-quote":
				this.#newLine();
				this.#result += "#quote(block: true)[";
				this.#writeBlocks(block.children);
				this.#result += "]";
				this.#newLine();
				break;
			case "ordered-list":
				this.#writeItems(block.items, (index) => `${block.attributes.start + index}. `);
				break;
			case "bullet-list":
				this.#writeItems(block.items, () => "- ");
				break;
			case "thematic-break":
				this.#newLine();
				this.#result += "#line(length: 100%)";
				this.#newLine();
				break;
			case "table":
				this.#writeTable(block);
				break;
			case "line-block":
			case "raw-block":
			case "definition-list":
			case "figure":
			case "div":
				throw new UnsupportedConstructError(block.type, this.format);
		}
	}

	#writeCodeBlock(language: string, text: string): void {
		const fence = "`".repeat(Math.max(3, longestBacktickRun(text) + 1));
		this.#newLine();
		this.#result += fence + language;
		for (const line of text === "" ? [] : text.split("\n")) {
			this.#newLine();
			this.#result += line;
		}
		this.#newLine();
		this.#result += fence;
		this.#newLine();
	}

	#writeItems(items: Array<Array<Block>>, marker: (index: number) => string): void {
		this.#newLine();
		items.forEach((item, index) => {
			const text = marker(index);
			const outer = this.#indent;
			this.#result += text;
			this.#indent += " ".repeat(text.length);
			this.#writeBlocks(item);
			this.#indent = outer;
			this.#newLine();
		});
		this.#newLine();
	}

	/**
	 * ```
	 * #table(
	 *   columns: 2,
	 *   align: (col, row) => (left, auto,).at(col),
	 *   [a], [b],
	 *   [1], [2],
	 * )
	 * ```
	 */
	#writeTable(table: TableBlock): void {
		const width = table.colSpecs.length;
		const alignments = table.colSpecs
			.map(({ align }) => `${TYPST_ALIGNMENTS[align]},`)
			.join(" ");

		this.#newLine();
		this.#result += `#table(\n  columns: ${width},\n  align: (col, row) => (${alignments}).at(col),\n`;
		const rows = [...table.head.rows, ...(table.bodies[0]?.rows ?? [])];
		for (const row of rows) {
			const cells: Array<string> = [];
			for (const cell of row.cells.slice(0, width)) {
				cells.push(`[${this.#captureCell(cell.children)}]`);
			}
			while (cells.length < width) cells.push("[]");
			this.#result += `  ${cells.join(", ")},\n`;
		}
		this.#result += ")";
		this.#newLine();
	}

	#captureCell(children: Array<Block>): string {
		const [first, ...rest] = children;
		if (first === undefined) return "";
		if (first.type !== "plain" || rest.length > 0) {
			throw new UnsupportedConstructError(
				"table-cell",
				this.format,
				"cells must contain a single plain block",
			);
		}

		const before = this.#result;
		this.#result = "";
		this.#writeInlines(first.children);
		const text = this.#result;
		this.#result = before;
		return text;
	}

	#writeInlines(inlines: Array<Inline>): void {
		for (const inline of inlines) this.#writeInline(inline);
	}

	#writeInline(inline: Inline): void {
		switch (inline.type) {
			case "str":
				this.#result += escapeTypst(inline.text);
				break;
			case "emphasis":
				if (this.#inEmphasis) {
					this.#writeInlines(inline.children);
					break;
				}
				this.#inEmphasis = true;
				this.#result += "_";
				this.#writeInlines(inline.children);
				this.#result += "_";
				this.#inEmphasis = false;
				break;
			case "strong":
				if (this.#inStrong) {
					this.#writeInlines(inline.children);
					break;
				}
				this.#inStrong = true;
				this.#result += "*";
				this.#writeInlines(inline.children);
				this.#result += "*";
				this.#inStrong = false;
				break;
			case "strikeout":
				this.#result += "#strike[";
				this.#writeInlines(inline.children);
				this.#result += "]";
				break;
			case "code":
				this.#result += inline.text.includes("`")
					? `#raw(${typstString(inline.text)})`
					: `\`${inline.text}\``;
				break;
			case "space":
			case "soft-break":
				this.#result += " ";
				break;
			case "line-break":
				this.#result += "\\";
				this.#newLine();
				break;
			case "link":
				this.#result += `#link(${typstString(inline.target.url)})[`;
				this.#writeInlines(inline.children);
				this.#result += "]";
				break;
			case "image":
				this.#result += `#figure(image(${typstString(inline.target.url)}, width: 100%))`;
				break;
			case "underline":
			case "superscript":
			case "subscript":
			case "small-caps":
			case "quoted":
			case "cite":
			case "math":
			case "raw-inline":
			case "note":
			case "span":
				throw new UnsupportedConstructError(inline.type, this.format);
		}
	}
}

function longestBacktickRun(text: string): number {
	let longest = 0;
	for (const match of text.matchAll(/`+/g)) {
		longest = Math.max(longest, match[0].length);
	}
	return longest;
}

const TYPST_SPECIAL = /[\\{}[\]()#$%^*_&~`0-9]/g;

/**
 * Escapes markup characters and digits, so that a number at the start of a line never reads as a list marker.
 *
 * escapeTypst("1. *a*")  // "\\1. \\*a\\*"
 */
export function escapeTypst(text: string): string {
	return text.replace(TYPST_SPECIAL, (character) => `\\${character}`);
}

function typstString(text: string): string {
	return `"${text.replace(/["\\]/g, (character) => `\\${character}`)}"`;
}
