import {
	type Block,
	type Document,
	type Meta,
	createTable,
	emptyAttr,
} from "./ast";
import type { PendingBlock } from "./block-context";
import { BlockDriver, createBlockContext } from "./block-driver";
import { parseInline } from "./inline-parser";
import { LineSplitter } from "./line-splitter";
import { type LinkReference, LinkReferenceTable } from "./link-references";
import { blockLogger } from "./logger";

export interface ParseOptions {
	/** Recognize GFM pipe tables. Defaults to `true`. */
	tables?: boolean;
	/** Recognize `[label]: destination` definitions. Defaults to `true`. */
	linkReferenceDefinitions?: boolean;
	/**
	 * Definitions known before parsing. They take precedence over definitions of the same label in the text.
	 */
	references?: Iterable<[string, LinkReference]>;
	meta?: Meta;
}

/**
 * Parses Markdown into a document tree. Parsing never fails: text that matches no construct becomes paragraph text.
 *
 * Block structure is read first, line by line, for the whole input. Inline content is resolved afterwards, once every
 * link reference definition is known:
 *
 * ```
 *  [foo]         ← resolves against the definition below
 *
 *  [foo]: /url
 * ```
 *
 * @example
 * ```ts
 * const parser = new MarkdownParser();
 * parser.parse("# Hello").blocks;
 * // [{ type: "heading", level: 1, attr: …, children: [{ type: "str", text: "Hello" }] }]
 * ```
 */
export class MarkdownParser {
	readonly #options: ParseOptions;

	constructor(options?: ParseOptions) {
		this.#options = options ?? {};
	}

	parse(input: string, options?: ParseOptions): Document {
		const tables = options?.tables ?? this.#options.tables ?? true;
		const linkReferenceDefinitions =
			options?.linkReferenceDefinitions ??
			this.#options.linkReferenceDefinitions ??
			true;
		const references = new LinkReferenceTable(
			options?.references ?? this.#options.references,
		);
		const meta = options?.meta ?? this.#options.meta ?? {};

		const driver = new BlockDriver(
			createBlockContext({ references, tables, linkReferenceDefinitions }),
		);
		const lines = LineSplitter.split(input);
		for (const text of lines) {
			driver.feed({ text, column: 0 });
		}
		const pending = driver.finish();
		blockLogger(
			"read %d lines into %d blocks, %d link references",
			lines.length,
			pending.length,
			references.size,
		);

		return {
			meta: { ...meta },
			blocks: pending.map((block) => resolveBlock(block, references)),
		};
	}
}

function resolveBlock(
	block: PendingBlock,
	references: LinkReferenceTable,
): Block {
	const inline = (text: string) => parseInline(text, { references });
	const blocks = (children: Array<PendingBlock>) =>
		children.map((child) => resolveBlock(child, references));

	switch (block.type) {
		case "paragraph":
		case "plain":
			return {
				type: block.type,
				children: inline(block.lines.join("\n").trimEnd()),
			};
		case "heading":
			return {
				type: "heading",
				level: block.level,
				attr: emptyAttr(),
				children: inline(block.text),
			};
		case "thematic-break":
			return { type: "thematic-break" };
		case "code": {
			const attr = emptyAttr();
			if (block.info !== undefined) attr.classes.push(block.info);
			return { type: "code-block", attr, text: block.text };
		}
		case "quote":
			return { type: "block-quote", children: blocks(block.children) };
		case "bullet-list":
			return { type: "bullet-list", items: block.items.map(blocks) };
		case "ordered-list":
			return {
				type: "ordered-list",
				attributes: {
					start: block.start,
					style: "decimal",
					delimiter: block.delimiter === "." ? "period" : "one-paren",
				},
				items: block.items.map(blocks),
			};
		case "table":
			return createTable(
				block.alignments,
				block.header.map(inline),
				block.rows.map((row) => row.map(inline)),
			);
	}
}
