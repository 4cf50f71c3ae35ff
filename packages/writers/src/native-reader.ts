import type {
	Alignment,
	Attr,
	Block,
	Caption,
	CitationMode,
	Document,
	Inline,
	ListNumberDelim,
	ListNumberStyle,
	Meta,
	MetaValue,
	Row,
} from "@doctree/markdown-parser";
import type { ZodIssue } from "zod";
import type { DocumentReader } from "./formats";
import { writerLogger } from "./logger";
import {
	NATIVE_API_VERSION,
	type NativeAlignment,
	type NativeAttr,
	type NativeBlock,
	type NativeCaption,
	type NativeCitationMode,
	type NativeDocument,
	type NativeInline,
	type NativeListNumberDelim,
	type NativeListNumberStyle,
	type NativeMetaValue,
	type NativeRow,
	nativeDocumentSchema,
} from "./native-format";

const ALIGNMENTS: Record<NativeAlignment["t"], Alignment> = {
	AlignLeft: "left",
	AlignRight: "right",
	AlignCenter: "center",
	AlignDefault: "default",
};

const LIST_STYLES: Record<NativeListNumberStyle, ListNumberStyle> = {
	DefaultStyle: "default",
	Example: "example",
	Decimal: "decimal",
	LowerRoman: "lower-roman",
	UpperRoman: "upper-roman",
	LowerAlpha: "lower-alpha",
	UpperAlpha: "upper-alpha",
};

const LIST_DELIMITERS: Record<NativeListNumberDelim, ListNumberDelim> = {
	DefaultDelim: "default",
	Period: "period",
	OneParen: "one-paren",
	TwoParens: "two-parens",
};

const CITATION_MODES: Record<NativeCitationMode, CitationMode> = {
	AuthorInText: "author-in-text",
	SuppressAuthor: "suppress-author",
	NormalCitation: "normal-citation",
};

/**
 * Thrown when native JSON cannot be read: it is not JSON, it does not have the shape of a document, or it was written
 * for another major version of the format. `issues` holds the schema violations, if any.
 */
export class NativeReadError extends Error {
	readonly issues: Array<ZodIssue>;

	constructor(message: string, options: { issues?: Array<ZodIssue>; cause?: unknown } = {}) {
		super(message, { cause: options.cause });
		this.name = "NativeReadError";
		this.issues = options.issues ?? [];
	}
}

export class NativeReader implements DocumentReader {
	readonly format = "native";

	read(input: string): Document {
		let json: unknown;
		try {
			json = JSON.parse(input);
		} catch (error) {
			throw new NativeReadError("input is not valid JSON", { cause: error });
		}

		const parsed = nativeDocumentSchema.safeParse(json);
		if (!parsed.success) {
			const [issue] = parsed.error.issues;
			const where = issue === undefined ? "" : ` at ${issue.path.join(".") || "<root>"}`;
			throw new NativeReadError(`input is not a native document${where}`, {
				issues: parsed.error.issues,
				cause: parsed.error,
			});
		}

		const [major, minor] = parsed.data["pandoc-api-version"];
		if (major !== NATIVE_API_VERSION[0] || minor !== NATIVE_API_VERSION[1]) {
			throw new NativeReadError(
				`unsupported api version ${parsed.data["pandoc-api-version"].join(".")}, expected ${NATIVE_API_VERSION[0]}.${NATIVE_API_VERSION[1]}`,
			);
		}

		writerLogger("native: read %d blocks", parsed.data.blocks.length);
		return fromNative(parsed.data);
	}
}

export function readNative(input: string): Document {
	return new NativeReader().read(input);
}

export function fromNative(document: NativeDocument): Document {
	return {
		meta: fromNativeMeta(document.meta),
		blocks: document.blocks.map(fromNativeBlock),
	};
}

function fromNativeMeta(meta: Record<string, NativeMetaValue>): Meta {
	const result: Meta = {};
	for (const [key, value] of Object.entries(meta)) {
		result[key] = fromNativeMetaValue(value);
	}
	return result;
}

function fromNativeMetaValue(value: NativeMetaValue): MetaValue {
	switch (value.t) {
		case "MetaMap":
			return { type: "map", entries: fromNativeMeta(value.c) };
		case "MetaList":
			return { type: "list", items: value.c.map(fromNativeMetaValue) };
		case "MetaBool":
			return { type: "bool", value: value.c };
		case "MetaString":
			return { type: "string", value: value.c };
		case "MetaInlines":
			return { type: "inlines", children: value.c.map(fromNativeInline) };
		case "MetaBlocks":
			return { type: "blocks", children: value.c.map(fromNativeBlock) };
	}
}

function fromNativeAttr([id, classes, attributes]: NativeAttr): Attr {
	return {
		id,
		classes: [...classes],
		attributes: attributes.map(([key, value]): [string, string] => [key, value]),
	};
}

function fromNativeCaption([short, children]: NativeCaption): Caption {
	const caption: Caption = { children: children.map(fromNativeBlock) };
	if (short !== null) caption.short = short.map(fromNativeInline);
	return caption;
}

function fromNativeRow([attr, cells]: NativeRow): Row {
	return {
		attr: fromNativeAttr(attr),
		cells: cells.map(([cellAttr, align, rowSpan, colSpan, children]) => ({
			attr: fromNativeAttr(cellAttr),
			align: ALIGNMENTS[align.t],
			rowSpan,
			colSpan,
			children: children.map(fromNativeBlock),
		})),
	};
}

function fromNativeBlocks(blocks: Array<NativeBlock>): Array<Block> {
	return blocks.map(fromNativeBlock);
}

function fromNativeBlock(block: NativeBlock): Block {
	switch (block.t) {
		case "Plain":
			return { type: "plain", children: block.c.map(fromNativeInline) };
		case "Para":
			return { type: "paragraph", children: block.c.map(fromNativeInline) };
		case "LineBlock":
			return { type: "line-block", lines: block.c.map((line) => line.map(fromNativeInline)) };
		case "CodeBlock":
			return { type: "code-block", attr: fromNativeAttr(block.c[0]), text: block.c[1] };
		case "RawBlock":
			return { type: "raw-block", format: block.c[0], text: block.c[1] };
		case "BlockQuote":
			return { type: "block-quote", children: fromNativeBlocks(block.c) };
		case "OrderedList": {
			const [[start, style, delimiter], items] = block.c;
			return {
				type: "ordered-list",
				attributes: {
					start,
					style: LIST_STYLES[style.t],
					delimiter: LIST_DELIMITERS[delimiter.t],
				},
				items: items.map(fromNativeBlocks),
			};
		}
		case "BulletList":
			return { type: "bullet-list", items: block.c.map(fromNativeBlocks) };
		case "DefinitionList":
			return {
				type: "definition-list",
				items: block.c.map(([term, definitions]) => ({
					term: term.map(fromNativeInline),
					definitions: definitions.map(fromNativeBlocks),
				})),
			};
		case "Header": {
			const [level, attr, children] = block.c;
			return {
				type: "heading",
				level,
				attr: fromNativeAttr(attr),
				children: children.map(fromNativeInline),
			};
		}
		case "HorizontalRule":
			return { type: "thematic-break" };
		case "Table": {
			const [attr, caption, colSpecs, [headAttr, headRows], bodies, [footAttr, footRows]] =
				block.c;
			return {
				type: "table",
				attr: fromNativeAttr(attr),
				caption: fromNativeCaption(caption),
				colSpecs: colSpecs.map(([align, width]) =>
					width.t === "ColWidth"
						? { align: ALIGNMENTS[align.t], width: width.c }
						: { align: ALIGNMENTS[align.t] },
				),
				head: { attr: fromNativeAttr(headAttr), rows: headRows.map(fromNativeRow) },
				bodies: bodies.map(([bodyAttr, rowHeadColumns, head, rows]) => ({
					attr: fromNativeAttr(bodyAttr),
					rowHeadColumns,
					head: head.map(fromNativeRow),
					rows: rows.map(fromNativeRow),
				})),
				foot: { attr: fromNativeAttr(footAttr), rows: footRows.map(fromNativeRow) },
			};
		}
		case "Figure": {
			const [attr, caption, children] = block.c;
			return {
				type: "figure",
				attr: fromNativeAttr(attr),
				caption: fromNativeCaption(caption),
				children: fromNativeBlocks(children),
			};
		}
		case "Div":
			return {
				type: "div",
				attr: fromNativeAttr(block.c[0]),
				children: fromNativeBlocks(block.c[1]),
			};
	}
}

function fromNativeInline(inline: NativeInline): Inline {
	switch (inline.t) {
		case "Str":
			return { type: "str", text: inline.c };
		case "Emph":
			return { type: "emphasis", children: inline.c.map(fromNativeInline) };
		case "Underline":
			return { type: "underline", children: inline.c.map(fromNativeInline) };
		case "Strong":
			return { type: "strong", children: inline.c.map(fromNativeInline) };
		case "Strikeout":
			return { type: "strikeout", children: inline.c.map(fromNativeInline) };
		case "Superscript":
			return { type: "superscript", children: inline.c.map(fromNativeInline) };
		case "Subscript":
			return { type: "subscript", children: inline.c.map(fromNativeInline) };
		case "SmallCaps":
			return { type: "small-caps", children: inline.c.map(fromNativeInline) };
		case "Quoted":
			return {
				type: "quoted",
				quoteType: inline.c[0].t === "SingleQuote" ? "single" : "double",
				children: inline.c[1].map(fromNativeInline),
			};
		case "Cite":
			return {
				type: "cite",
				citations: inline.c[0].map((citation) => ({
					id: citation.citationId,
					prefix: citation.citationPrefix.map(fromNativeInline),
					suffix: citation.citationSuffix.map(fromNativeInline),
					mode: CITATION_MODES[citation.citationMode.t],
					noteNum: citation.citationNoteNum,
					hash: citation.citationHash,
				})),
				children: inline.c[1].map(fromNativeInline),
			};
		case "Code":
			return { type: "code", attr: fromNativeAttr(inline.c[0]), text: inline.c[1] };
		case "Space":
			return { type: "space" };
		case "SoftBreak":
			return { type: "soft-break" };
		case "LineBreak":
			return { type: "line-break" };
		case "Math":
			return {
				type: "math",
				mathType: inline.c[0].t === "DisplayMath" ? "display" : "inline",
				text: inline.c[1],
			};
		case "RawInline":
			return { type: "raw-inline", format: inline.c[0], text: inline.c[1] };
		case "Link": {
			const [attr, children, [url, title]] = inline.c;
			return {
				type: "link",
				attr: fromNativeAttr(attr),
				children: children.map(fromNativeInline),
				target: { url, title },
			};
		}
		case "Image": {
			const [attr, children, [url, title]] = inline.c;
			return {
				type: "image",
				attr: fromNativeAttr(attr),
				children: children.map(fromNativeInline),
				target: { url, title },
			};
		}
		case "Note":
			return { type: "note", children: fromNativeBlocks(inline.c) };
		case "Span":
			return {
				type: "span",
				attr: fromNativeAttr(inline.c[0]),
				children: inline.c[1].map(fromNativeInline),
			};
	}
}
