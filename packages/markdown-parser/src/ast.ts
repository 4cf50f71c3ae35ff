/**
 * Attributes attached to a node: an identifier, a list of classes and key/value pairs.
 *
 * Fenced code blocks keep their info string as the first class:
 *   "```ts"  →  { id: "", classes: ["ts"], attributes: [] }
 */
export interface Attr {
	id: string;
	classes: Array<string>;
	attributes: Array<[string, string]>;
}

export function emptyAttr(): Attr {
	return { id: "", classes: [], attributes: [] };
}

export interface Document {
	meta: Meta;
	blocks: Array<Block>;
}

export type Meta = Record<string, MetaValue>;

export type MetaValue =
	| { type: "map"; entries: Meta }
	| { type: "list"; items: Array<MetaValue> }
	| { type: "bool"; value: boolean }
	| { type: "string"; value: string }
	| { type: "inlines"; children: Array<Inline> }
	| { type: "blocks"; children: Array<Block> };

export type Alignment = "left" | "right" | "center" | "default";

/**
 * Column width as a fraction of the text width, or `undefined` when the width is left to the renderer.
 */
export interface ColSpec {
	align: Alignment;
	width?: number;
}

export type ListNumberStyle =
	| "default"
	| "example"
	| "decimal"
	| "lower-roman"
	| "upper-roman"
	| "lower-alpha"
	| "upper-alpha";

export type ListNumberDelim = "default" | "period" | "one-paren" | "two-parens";

export interface ListAttributes {
	start: number;
	style: ListNumberStyle;
	delimiter: ListNumberDelim;
}

export interface Caption {
	short?: Array<Inline>;
	children: Array<Block>;
}

export interface Cell {
	attr: Attr;
	align: Alignment;
	rowSpan: number;
	colSpan: number;
	children: Array<Block>;
}

export interface Row {
	attr: Attr;
	cells: Array<Cell>;
}

export interface TableHead {
	attr: Attr;
	rows: Array<Row>;
}

export interface TableBody {
	attr: Attr;
	rowHeadColumns: number;
	head: Array<Row>;
	rows: Array<Row>;
}

export interface TableFoot {
	attr: Attr;
	rows: Array<Row>;
}

export interface PlainBlock {
	type: "plain";
	children: Array<Inline>;
}

export interface ParagraphBlock {
	type: "paragraph";
	children: Array<Inline>;
}

export interface LineBlock {
	type: "line-block";
	lines: Array<Array<Inline>>;
}

export interface CodeBlock {
	type: "code-block";
	attr: Attr;
	text: string;
}

export interface RawBlock {
	type: "raw-block";
	format: string;
	text: string;
}

export interface BlockQuote {
	type: "block-quote";
	children: Array<Block>;
}

export interface OrderedList {
	type: "ordered-list";
	attributes: ListAttributes;
	items: Array<Array<Block>>;
}

export interface BulletList {
	type: "bullet-list";
	items: Array<Array<Block>>;
}

export interface DefinitionList {
	type: "definition-list";
	items: Array<{ term: Array<Inline>; definitions: Array<Array<Block>> }>;
}

export interface HeadingBlock {
	type: "heading";
	level: number;
	attr: Attr;
	children: Array<Inline>;
}

export interface ThematicBreak {
	type: "thematic-break";
}

export interface TableBlock {
	type: "table";
	attr: Attr;
	caption: Caption;
	colSpecs: Array<ColSpec>;
	head: TableHead;
	bodies: Array<TableBody>;
	foot: TableFoot;
}

export interface FigureBlock {
	type: "figure";
	attr: Attr;
	caption: Caption;
	children: Array<Block>;
}

export interface DivBlock {
	type: "div";
	attr: Attr;
	children: Array<Block>;
}

export type Block =
	| PlainBlock
	| ParagraphBlock
	| LineBlock
	| CodeBlock
	| RawBlock
	| BlockQuote
	| OrderedList
	| BulletList
	| DefinitionList
	| HeadingBlock
	| ThematicBreak
	| TableBlock
	| FigureBlock
	| DivBlock;

export interface Target {
	url: string;
	title: string;
}

export type QuoteType = "single" | "double";

export type MathType = "display" | "inline";

export type CitationMode = "author-in-text" | "suppress-author" | "normal-citation";

export interface Citation {
	id: string;
	prefix: Array<Inline>;
	suffix: Array<Inline>;
	mode: CitationMode;
	noteNum: number;
	hash: number;
}

export type Inline =
	| { type: "str"; text: string }
	| { type: "emphasis"; children: Array<Inline> }
	| { type: "underline"; children: Array<Inline> }
	| { type: "strong"; children: Array<Inline> }
	| { type: "strikeout"; children: Array<Inline> }
	| { type: "superscript"; children: Array<Inline> }
	| { type: "subscript"; children: Array<Inline> }
	| { type: "small-caps"; children: Array<Inline> }
	| { type: "quoted"; quoteType: QuoteType; children: Array<Inline> }
	| { type: "cite"; citations: Array<Citation>; children: Array<Inline> }
	| { type: "code"; attr: Attr; text: string }
	| { type: "space" }
	| { type: "soft-break" }
	| { type: "line-break" }
	| { type: "math"; mathType: MathType; text: string }
	| { type: "raw-inline"; format: string; text: string }
	| { type: "link"; attr: Attr; children: Array<Inline>; target: Target }
	| { type: "image"; attr: Attr; children: Array<Inline>; target: Target }
	| { type: "note"; children: Array<Block> }
	| { type: "span"; attr: Attr; children: Array<Inline> };

/**
 * Builds a table from its already parsed cells. Rows shorter than the column count are padded with empty cells
 * and longer rows are cut to it.
 *
 *   | a | b |      colSpecs = [default, center]
 *   | - | :-: |    head     = [[a], [b]]
 *   | 1 |          body     = [[1], []]
 */
export function createTable(
	alignments: Array<Alignment>,
	header: Array<Array<Inline>>,
	rows: Array<Array<Array<Inline>>>,
): TableBlock {
	const size = alignments.length;
	const toRow = (cells: Array<Array<Inline>>): Row => {
		const result: Array<Cell> = [];
		for (let i = 0; i < size; i++) {
			const children = cells[i] ?? [];
			result.push({
				attr: emptyAttr(),
				align: "default",
				rowSpan: 1,
				colSpan: 1,
				children: children.length > 0 ? [{ type: "plain", children }] : [],
			});
		}
		return { attr: emptyAttr(), cells: result };
	};

	return {
		type: "table",
		attr: emptyAttr(),
		caption: { children: [] },
		colSpecs: alignments.map((align) => ({ align })),
		head: { attr: emptyAttr(), rows: [toRow(header)] },
		bodies: [
			{
				attr: emptyAttr(),
				rowHeadColumns: 0,
				head: [],
				rows: rows.map(toRow),
			},
		],
		foot: { attr: emptyAttr(), rows: [] },
	};
}
