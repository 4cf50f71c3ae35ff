import type { Alignment } from "./ast";
import type { BlockDriver } from "./block-driver";
import type { BlockQuoteState } from "./blocks/block-quote";
import type { FencedCodeState, IndentedCodeState } from "./blocks/code-block";
import type { ListState } from "./blocks/list";
import type { ParagraphState } from "./blocks/paragraph";
import type { TableState } from "./blocks/table";
import type { TextLine } from "./indent-scanner";
import type { LinkReferenceTable } from "./link-references";

/**
 * A finished block whose inline content has not been resolved yet. Inlines are resolved once the whole document has
 * been read, because a link may refer to a definition that comes after it.
 */
export type PendingBlock =
	| { type: "paragraph"; lines: Array<string> }
	| { type: "plain"; lines: Array<string> }
	| { type: "heading"; level: number; text: string }
	| { type: "thematic-break" }
	| { type: "code"; info: string | undefined; text: string }
	| { type: "quote"; children: Array<PendingBlock> }
	| { type: "bullet-list"; items: Array<Array<PendingBlock>> }
	| {
			type: "ordered-list";
			start: number;
			delimiter: "." | ")";
			items: Array<Array<PendingBlock>>;
	  }
	| {
			type: "table";
			alignments: Array<Alignment>;
			header: Array<string>;
			rows: Array<Array<string>>;
	  };

/**
 * The block a driver is currently adding lines to. `empty` means no block is open.
 */
export type OpenBlock =
	| { type: "empty" }
	| ParagraphState
	| IndentedCodeState
	| FencedCodeState
	| BlockQuoteState
	| ListState
	| TableState;

/**
 * What happens to the open block when a line arrives.
 *
 * ```
 *  unchanged                    the line was added to the open block
 *  replaced                     the open block turned into `next` (a paragraph became a table)
 *  finished                     the open block is done; nothing is open
 *  finished-and-replaced        the open block is done and the line opened `next`
 *  finished-and-also-finished   the open block is done and the line was a whole block by itself (a heading)
 * ```
 *
 * `block` is `null` when finishing produced nothing, e.g. a paragraph made only of link reference definitions.
 */
export type Transition =
	| { type: "unchanged" }
	| { type: "replaced"; next: OpenBlock }
	| { type: "finished"; block: PendingBlock | null }
	| {
			type: "finished-and-replaced";
			block: PendingBlock | null;
			next: OpenBlock;
	  }
	| {
			type: "finished-and-also-finished";
			block: PendingBlock | null;
			other: PendingBlock;
	  };

/**
 * What a line starts when no block is open: either a block that stays open, or a single-line block.
 */
export type Started =
	| { type: "replaced"; next: OpenBlock }
	| { type: "finished"; block: PendingBlock };

/**
 * Shared by every driver of one document. Blocks reach the dispatcher and create nested drivers through it.
 */
export interface BlockContext {
	references: LinkReferenceTable;
	tables: boolean;
	linkReferenceDefinitions: boolean;
	start(line: TextLine): Started;
	nest(): BlockDriver;
}

export const unchanged: Transition = { type: "unchanged" };

/**
 * Finishes `block` and lets the line that ended it take over.
 */
export function finishAndStart(
	block: PendingBlock | null,
	started: Started,
): Transition {
	if (started.type === "finished") {
		return { type: "finished-and-also-finished", block, other: started.block };
	}
	return { type: "finished-and-replaced", block, next: started.next };
}
