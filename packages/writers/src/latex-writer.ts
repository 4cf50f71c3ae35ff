import {
	type Block,
	type Document,
	type Inline,
	type Row,
	type TableBlock,
	UnsupportedConstructError,
} from "@doctree/markdown-parser";
import type { DocumentWriter } from "./formats";
import { writerLogger } from "./logger";

const PREAMBLE = [
	"\\documentclass[]{article}",
	"\\usepackage[utf8]{inputenc}",
	"\\usepackage[normalem]{ulem}",
	"\\usepackage{graphicx}",
	"\\usepackage{listings}",
	"\\providecommand{\\tightlist}{\\setlength{\\itemsep}{0pt}\\setlength{\\parskip}{0pt}}",
	"\\begin{document}",
	"",
].join("\n");

const SECTIONS = [
	"section",
	"subsection",
	"subsubsection",
	"paragraph",
	"subparagraph",
] as const;

/**
 * Writes a document as a standalone LaTeX article.
 *
 * A writer keeps state while writing (the output and the depth of nested `enumerate` environments), so each call to
 * `write` starts over.
 *
 * @example
 * ```ts
 * new LatexWriter().write(new MarkdownParser().parse("# Intro"));
 * // "\\documentclass[]{article}\n…\\begin{document}\n\n\\section{Intro}\n\n\\end{document}"
 * ```
 */
export class LatexWriter implements DocumentWriter {
	readonly format = "latex";
	#result = "";
	#enumDepth = 0;

	write(document: Document): string {
		this.#result = PREAMBLE;
		this.#enumDepth = 0;
		this.#writeBlocks(document.blocks);
		this.#result += "\n\\end{document}";
		writerLogger("latex: wrote %d characters", this.#result.length);
		return this.#result;
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
				this.#result += "\n";
				this.#writeInlines(block.children);
				this.#result += "\n";
				break;
			case "code-block": {
				const language = block.attr.classes[0];
				this.#result += "\n\\begin{lstlisting}";
				if (language !== undefined && language.length > 0) {
					this.#result += `[language=${language}]`;
				}
				this.#result += `\n${block.text}\n\\end{lstlisting}\n`;
				break;
			}
			case "block-quote":
				this.#result += "\n\\begin{quote}\n";
				this.#writeBlocks(block.children);
				this.#result += "\n\\end{quote}\n";
				break;
			case "ordered-list": {
				this.#enumDepth++;
				this.#result += "\n\\begin{enumerate}";
				const start = block.attributes.start;
				// enumi, enumii, enumiii, enumiv
				if (start !== 1) {
					this.#result += `\n\\setcounter{enum${"i".repeat(this.#enumDepth)}}{${start - 1}}`;
				}
				this.#writeItems(block.items);
				this.#result += "\n\\end{enumerate}\n";
				this.#enumDepth--;
				break;
			}
			case "bullet-list":
				this.#result += "\n\\begin{itemize}";
				this.#writeItems(block.items);
				this.#result += "\n\\end{itemize}\n";
				break;
			case "heading": {
				const section = SECTIONS[block.level - 1];
				if (section === undefined) {
					this.#result += "\n";
					this.#writeInlines(block.children);
					this.#result += "\n";
					break;
				}
				this.#result += `\n\\${section}{`;
				this.#writeInlines(block.children);
				this.#result += "}\n";
				break;
			}
			case "thematic-break":
				this.#result +=
					"\n\\begin{center}\\rule{0.5\\linewidth}{0.5pt}\\end{center}\n";
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

	#writeItems(items: Array<Array<Block>>): void {
		if (isTight(items)) this.#result += "\n\\tightlist";
		for (const item of items) {
			this.#result += "\n\\item\n";
			this.#writeBlocks(item);
		}
	}

	/**
	 * ```
	 *  \begin{tabular}{|c|r|} \hline
	 *  a&b\\\hline
	 *  1&2\\\hline
	 *  \end{tabular}
	 * ```
	 * Only the head and the first body are written.
	 */
	#writeTable(table: TableBlock): void {
		const width = table.colSpecs.length;
		const columns = table.colSpecs
			.map(({ align }) => (align === "left" ? "l|" : align === "right" ? "r|" : "c|"))
			.join("");
		this.#result += `\n\\begin{tabular}{|${columns}} \\hline \n`;

		const rows: Array<Row> = [...table.head.rows, ...(table.bodies[0]?.rows ?? [])];
		for (const row of rows) {
			const cells: Array<string> = [];
			for (const cell of row.cells.slice(0, width)) {
				cells.push(this.#captureCell(cell.children));
			}
			while (cells.length < width) cells.push("");
			this.#result += `${cells.join("&")}\\\\\\hline\n`;
		}
		this.#result += "\\end{tabular}\n";
	}

	// A cell is written inline, so it may hold at most one plain block.
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
				this.#result += escapeLatex(inline.text);
				break;
			case "emphasis":
				this.#wrap("\\emph{", inline.children, "}");
				break;
			case "strong":
				this.#wrap("\\textbf{", inline.children, "}");
				break;
			case "strikeout":
				this.#wrap("\\sout{", inline.children, "}");
				break;
			case "code":
				this.#result += `\\texttt{${escapeLatex(inline.text)}}`;
				break;
			case "space":
			case "soft-break":
				this.#result += " ";
				break;
			case "line-break":
				this.#result += "\\\\\n";
				break;
			case "link":
				this.#wrap(`\\href{${escapeUrl(inline.target.url)}}{`, inline.children, "}");
				break;
			case "image":
				this.#result += `\n\\includegraphics[width=\\linewidth]{${inline.target.url}}\n`;
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

	#wrap(open: string, children: Array<Inline>, close: string): void {
		this.#result += open;
		this.#writeInlines(children);
		this.#result += close;
	}
}

/**
 * A list is tight when its first paragraph-like block is `plain`.
 */
function isTight(items: Array<Array<Block>>): boolean {
	for (const item of items) {
		for (const block of item) {
			if (block.type === "plain") return true;
			if (block.type === "paragraph") return false;
		}
	}
	return false;
}

/**
 * escapeLatex("50% of $x_1$")  // "50\\% of \\$x\\_1\\$"
 */
export function escapeLatex(text: string): string {
	let result = "";
	for (const character of text) {
		switch (character) {
			case "&":
			case "%":
			case "$":
			case "#":
			case "_":
			case "{":
			case "}":
				result += `\\${character}`;
				break;
			case "~":
				result += "\\textasciitilde{}";
				break;
			case "^":
				result += "\\^{}";
				break;
			case "\\":
				result += "\\textbackslash{}";
				break;
			case "`":
				result += "\\textasciigrave{}";
				break;
			default:
				result += character;
		}
	}
	return result;
}

// \href reads its first argument verbatim except for these.
function escapeUrl(url: string): string {
	return url.replace(/[%#]/g, (character) => `\\${character}`);
}
