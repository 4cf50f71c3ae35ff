import type {
	BlockContext,
	OpenBlock,
	PendingBlock,
	Started,
	Transition,
} from "./block-context";
import { parseAtxHeading } from "./blocks/atx-heading";
import {
	finishBlockQuote,
	nextBlockQuote,
	startBlockQuote,
} from "./blocks/block-quote";
import {
	blankFencedCode,
	blankIndentedCode,
	finishFencedCode,
	finishIndentedCode,
	nextFencedCode,
	nextIndentedCode,
	startFencedCode,
	startIndentedCode,
} from "./blocks/code-block";
import { blankList, finishList, nextList, startList } from "./blocks/list";
import {
	continueParagraph,
	finishParagraph,
	nextParagraph,
	startParagraph,
} from "./blocks/paragraph";
import { finishTable, nextTable } from "./blocks/table";
import { parseThematicBreak } from "./blocks/thematic-break";
import {
	type BlankLine,
	type SourceLine,
	type TextLine,
	scanIndent,
} from "./indent-scanner";
import type { LinkReferenceTable } from "./link-references";
import { blockLogger } from "./logger";

/**
 * Reads lines into blocks. A driver holds at most one open block; every finished block is kept in order. Block quotes
 * and list items own a nested driver for their content.
 *
 * ```
 *  > - a        document driver: block-quote (open)
 *  >   b          quote driver: list (open)
 *                   item driver: paragraph "a\nb" (open)
 * ```
 */
export class BlockDriver {
	#current: OpenBlock = { type: "empty" };
	#finished: Array<PendingBlock> = [];
	readonly #context: BlockContext;

	constructor(context: BlockContext) {
		this.#context = context;
	}

	feed(source: SourceLine): void {
		const line = scanIndent(source);
		const transition =
			line.kind === "blank" ? this.#blank(line) : this.#next(line);
		this.#apply(transition);
	}

	/**
	 * Offers a line that lacks the markers of its enclosing containers. It is accepted only as the continuation of an
	 * open paragraph, however deeply nested.
	 */
	continueLazily(line: TextLine): boolean {
		const current = this.#current;
		switch (current.type) {
			case "paragraph":
				return continueParagraph(current, line, this.#context);
			case "block-quote":
				return current.driver.continueLazily(line);
			case "list":
				return (
					!current.current.closed &&
					current.current.driver.continueLazily(line)
				);
			default:
				return false;
		}
	}

	inFencedCode(): boolean {
		const current = this.#current;
		switch (current.type) {
			case "fenced-code":
				return true;
			case "block-quote":
				return current.driver.inFencedCode();
			case "list":
				return current.current.driver.inFencedCode();
			default:
				return false;
		}
	}

	/**
	 * Finished blocks plus the open one, if any.
	 */
	get blockCount(): number {
		return this.#finished.length + (this.#current.type === "empty" ? 0 : 1);
	}

	finish(): Array<PendingBlock> {
		const block = finishOpenBlock(this.#current, this.#context);
		if (block !== null) this.#finished.push(block);
		this.#current = { type: "empty" };
		return this.#finished;
	}

	#next(line: TextLine): Transition {
		const current = this.#current;
		const context = this.#context;
		switch (current.type) {
			case "empty":
				return context.start(line);
			case "paragraph":
				return nextParagraph(current, line, context);
			case "indented-code":
				return nextIndentedCode(current, line, context);
			case "fenced-code":
				return nextFencedCode(current, line);
			case "block-quote":
				return nextBlockQuote(current, line, context);
			case "list":
				return nextList(current, line, context);
			case "table":
				return nextTable(current, line, context);
		}
	}

	#blank(line: BlankLine): Transition {
		const current = this.#current;
		switch (current.type) {
			case "empty":
				return { type: "unchanged" };
			case "indented-code":
				return blankIndentedCode(current, line);
			case "fenced-code":
				return blankFencedCode(current, line);
			case "list":
				return blankList(current, line);
			case "paragraph":
			case "block-quote":
			case "table":
				return {
					type: "finished",
					block: finishOpenBlock(current, this.#context),
				};
		}
	}

	#apply(transition: Transition): void {
		if (transition.type !== "unchanged") {
			blockLogger("%s: %s", this.#current.type, transition.type);
		}

		switch (transition.type) {
			case "unchanged":
				break;
			case "replaced":
				this.#current = transition.next;
				break;
			case "finished":
				if (transition.block !== null) this.#finished.push(transition.block);
				this.#current = { type: "empty" };
				break;
			case "finished-and-replaced":
				if (transition.block !== null) this.#finished.push(transition.block);
				this.#current = transition.next;
				break;
			case "finished-and-also-finished":
				if (transition.block !== null) this.#finished.push(transition.block);
				this.#finished.push(transition.other);
				this.#current = { type: "empty" };
				break;
		}
	}
}

/**
 * Decides what a line starts when no block is open.
 *
 * ```
 *  indent ≥ 4     indented code
 *  #              ATX heading
 *  - _ *          thematic break, then (- *) list item
 *  + 0-9          list item
 *  ` ~            fenced code
 *  >              block quote
 *  anything else  paragraph
 * ```
 *
 * A candidate that does not parse falls through to a paragraph.
 */
export function startBlock(line: TextLine, context: BlockContext): Started {
	if (line.indent >= 4) {
		return { type: "replaced", next: startIndentedCode(line) };
	}

	const first = line.first;
	switch (first) {
		case "#": {
			const heading = parseAtxHeading(line);
			if (heading !== null) return { type: "finished", block: heading };
			break;
		}
		case "-":
		case "_":
		case "*":
		case "+": {
			const thematicBreak = parseThematicBreak(line);
			if (thematicBreak !== null) {
				return { type: "finished", block: thematicBreak };
			}
			const list = startList(line, context);
			if (list !== null) return { type: "replaced", next: list };
			break;
		}
		case "`":
		case "~": {
			const fence = startFencedCode(line);
			if (fence !== null) return { type: "replaced", next: fence };
			break;
		}
		case ">": {
			const quote = startBlockQuote(line, context);
			if (quote !== null) return { type: "replaced", next: quote };
			break;
		}
		default: {
			if (first >= "0" && first <= "9") {
				const list = startList(line, context);
				if (list !== null) return { type: "replaced", next: list };
			}
		}
	}

	return { type: "replaced", next: startParagraph(line) };
}

/**
 * The context shared by all drivers of one document.
 */
export function createBlockContext(options: {
	references: LinkReferenceTable;
	tables: boolean;
	linkReferenceDefinitions: boolean;
}): BlockContext {
	const context: BlockContext = {
		...options,
		start: (line) => startBlock(line, context),
		nest: () => new BlockDriver(context),
	};
	return context;
}

function finishOpenBlock(
	block: OpenBlock,
	context: BlockContext,
): PendingBlock | null {
	switch (block.type) {
		case "empty":
			return null;
		case "paragraph":
			return finishParagraph(block, context);
		case "indented-code":
			return finishIndentedCode(block);
		case "fenced-code":
			return finishFencedCode(block);
		case "block-quote":
			return finishBlockQuote(block);
		case "list":
			return finishList(block);
		case "table":
			return finishTable(block);
	}
}
