import type {
	Alignment,
	Attr,
	Block,
	Caption,
	Citation,
	CitationMode,
	Document,
	Inline,
	ListNumberDelim,
	ListNumberStyle,
	Meta,
	MetaValue,
	Row,
} from "@doctree/markdown-parser";
import type { DocumentWriter } from "./formats";
import { writerLogger } from "./logger";
import {
	NATIVE_API_VERSION,
	type NativeAlignment,
	type NativeAttr,
	type NativeBlock,
	type NativeCaption,
	type NativeCell,
	type NativeCitation,
	type NativeCitationMode,
	type NativeColSpec,
	type NativeDefinition,
	type NativeDocument,
	type NativeInline,
	type NativeListNumberDelim,
	type NativeListNumberStyle,
	type NativeMetaValue,
	type NativeRow,
	type NativeTableBody,
} from "./native-format";

export const NATIVE_ALIGNMENTS = {
	left: "AlignLeft",
	right: "AlignRight",
	center: "AlignCenter",
	default: "AlignDefault",
} as const satisfies Record<Alignment, NativeAlignment["t"]>;

export const NATIVE_LIST_STYLES = {
	default: "DefaultStyle",
	example: "Example",
	decimal: "Decimal",
	"lower-roman": "LowerRoman",
	"upper-roman": "UpperRoman",
	"lower-alpha": "LowerAlpha",
	"upper-alpha": "UpperAlpha",
} as const satisfies Record<ListNumberStyle, NativeListNumberStyle>;

export const NATIVE_LIST_DELIMITERS = {
	default: "DefaultDelim",
	period: "Period",
	"one-paren": "OneParen",
	"two-parens": "TwoParens",
} as const satisfies Record<ListNumberDelim, NativeListNumberDelim>;

export const NATIVE_CITATION_MODES = {
	"author-in-text": "AuthorInText",
	"suppress-author": "SuppressAuthor",
	"normal-citation": "NormalCitation",
} as const satisfies Record<CitationMode, NativeCitationMode>;

/**
 * Writes a document as native JSON. Every construct of the tree has a native counterpart, so this writer never
 * throws.
 */
export class NativeWriter implements DocumentWriter {
	readonly format = "native";

	write(document: Document): string {
		const result = JSON.stringify(toNative(document));
		writerLogger("native: wrote %d characters", result.length);
		return result;
	}
}

export function writeNative(document: Document): string {
	return new NativeWriter().write(document);
}

export function toNative(document: Document): NativeDocument {
	return {
		"pandoc-api-version": [...NATIVE_API_VERSION],
		meta: toNativeMeta(document.meta),
		blocks: document.blocks.map(toNativeBlock),
	};
}

function toNativeMeta(meta: Meta): Record<string, NativeMetaValue> {
	const result: Record<string, NativeMetaValue> = {};
	for (const [key, value] of Object.entries(meta)) {
		result[key] = toNativeMetaValue(value);
	}
	return result;
}

function toNativeMetaValue(value: MetaValue): NativeMetaValue {
	switch (value.type) {
		case "map":
			return { t: "MetaMap", c: toNativeMeta(value.entries) };
		case "list":
			return { t: "MetaList", c: value.items.map(toNativeMetaValue) };
		case "bool":
			return { t: "MetaBool", c: value.value };
		case "string":
			return { t: "MetaString", c: value.value };
		case "inlines":
			return { t: "MetaInlines", c: value.children.map(toNativeInline) };
		case "blocks":
			return { t: "MetaBlocks", c: value.children.map(toNativeBlock) };
	}
}

function toNativeAttr(attr: Attr): NativeAttr {
	return [
		attr.id,
		[...attr.classes],
		attr.attributes.map(([key, value]): [string, string] => [key, value]),
	];
}

function toNativeCaption(caption: Caption): NativeCaption {
	return [
		caption.short === undefined ? null : caption.short.map(toNativeInline),
		caption.children.map(toNativeBlock),
	];
}

function toNativeRow(row: Row): NativeRow {
	return [
		toNativeAttr(row.attr),
		row.cells.map((cell): NativeCell => [
			toNativeAttr(cell.attr),
			{ t: NATIVE_ALIGNMENTS[cell.align] },
			cell.rowSpan,
			cell.colSpan,
			cell.children.map(toNativeBlock),
		]),
	];
}

const toNativeBlocks = (blocks: Array<Block>): Array<NativeBlock> => blocks.map(toNativeBlock);

function toNativeBlock(block: Block): NativeBlock {
	switch (block.type) {
		case "plain":
			return { t: "Plain", c: block.children.map(toNativeInline) };
		case "paragraph":
			return { t: "Para", c: block.children.map(toNativeInline) };
		case "line-block":
			return { t: "LineBlock", c: block.lines.map((line) => line.map(toNativeInline)) };
		case "code-block":
			return { t: "CodeBlock", c: [toNativeAttr(block.attr), block.text] };
		case "raw-block":
			return { t: "RawBlock", c: [block.format, block.text] };
		case "block-quote":
			return { t: "BlockQuote", c: toNativeBlocks(block.children) };
		case "ordered-list": {
			const { start, style, delimiter } = block.attributes;
			return {
				t: "OrderedList",
				c: [
					[start, { t: NATIVE_LIST_STYLES[style] }, { t: NATIVE_LIST_DELIMITERS[delimiter] }],
					block.items.map(toNativeBlocks),
				],
			};
		}
		case "bullet-list":
			return { t: "BulletList", c: block.items.map(toNativeBlocks) };
		case "definition-list":
			return {
				t: "DefinitionList",
				c: block.items.map(({ term, definitions }): NativeDefinition => [
					term.map(toNativeInline),
					definitions.map(toNativeBlocks),
				]),
			};
		case "heading":
			return {
				t: "Header",
				c: [block.level, toNativeAttr(block.attr), block.children.map(toNativeInline)],
			};
		case "thematic-break":
			return { t: "HorizontalRule" };
		case "table":
			return {
				t: "Table",
				c: [
					toNativeAttr(block.attr),
					toNativeCaption(block.caption),
					block.colSpecs.map(({ align, width }): NativeColSpec => [
						{ t: NATIVE_ALIGNMENTS[align] },
						width === undefined ? { t: "ColWidthDefault" } : { t: "ColWidth", c: width },
					]),
					[toNativeAttr(block.head.attr), block.head.rows.map(toNativeRow)],
					block.bodies.map((body): NativeTableBody => [
						toNativeAttr(body.attr),
						body.rowHeadColumns,
						body.head.map(toNativeRow),
						body.rows.map(toNativeRow),
					]),
					[toNativeAttr(block.foot.attr), block.foot.rows.map(toNativeRow)],
				],
			};
		case "figure":
			return {
				t: "Figure",
				c: [
					toNativeAttr(block.attr),
					toNativeCaption(block.caption),
					toNativeBlocks(block.children),
				],
			};
		case "div":
			return { t: "Div", c: [toNativeAttr(block.attr), toNativeBlocks(block.children)] };
	}
}

function toNativeCitation(citation: Citation): NativeCitation {
	return {
		citationId: citation.id,
		citationPrefix: citation.prefix.map(toNativeInline),
		citationSuffix: citation.suffix.map(toNativeInline),
		citationMode: { t: NATIVE_CITATION_MODES[citation.mode] },
		citationNoteNum: citation.noteNum,
		citationHash: citation.hash,
	};
}

function toNativeInline(inline: Inline): NativeInline {
	switch (inline.type) {
		case "str":
			return { t: "Str", c: inline.text };
		case "emphasis":
			return { t: "Emph", c: inline.children.map(toNativeInline) };
		case "underline":
			return { t: "Underline", c: inline.children.map(toNativeInline) };
		case "strong":
			return { t: "Strong", c: inline.children.map(toNativeInline) };
		case "strikeout":
			return { t: "Strikeout", c: inline.children.map(toNativeInline) };
		case "superscript":
			return { t: "Superscript", c: inline.children.map(toNativeInline) };
		case "subscript":
			return { t: "Subscript", c: inline.children.map(toNativeInline) };
		case "small-caps":
			return { t: "SmallCaps", c: inline.children.map(toNativeInline) };
		case "quoted":
			return {
				t: "Quoted",
				c: [
					{ t: inline.quoteType === "single" ? "SingleQuote" : "DoubleQuote" },
					inline.children.map(toNativeInline),
				],
			};
		case "cite":
			return {
				t: "Cite",
				c: [inline.citations.map(toNativeCitation), inline.children.map(toNativeInline)],
			};
		case "code":
			return { t: "Code", c: [toNativeAttr(inline.attr), inline.text] };
		case "space":
			return { t: "Space" };
		case "soft-break":
			return { t: "SoftBreak" };
		case "line-break":
			return { t: "LineBreak" };
		case "math":
			return {
				t: "Math",
				c: [{ t: inline.mathType === "display" ? "DisplayMath" : "InlineMath" }, inline.text],
			};
		case "raw-inline":
			return { t: "RawInline", c: [inline.format, inline.text] };
		case "link":
			return {
				t: "Link",
				c: [
					toNativeAttr(inline.attr),
					inline.children.map(toNativeInline),
					[inline.target.url, inline.target.title],
				],
			};
		case "image":
			return {
				t: "Image",
				c: [
					toNativeAttr(inline.attr),
					inline.children.map(toNativeInline),
					[inline.target.url, inline.target.title],
				],
			};
		case "note":
			return { t: "Note", c: toNativeBlocks(inline.children) };
		case "span":
			return {
				t: "Span",
				c: [toNativeAttr(inline.attr), inline.children.map(toNativeInline)],
			};
	}
}
