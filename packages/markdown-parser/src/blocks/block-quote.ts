import {
	type BlockContext,
	type PendingBlock,
	type Transition,
	finishAndStart,
	unchanged,
} from "../block-context";
import type { BlockDriver } from "../block-driver";
import {
	type SourceLine,
	type TextLine,
	columnOf,
	stripColumns,
} from "../indent-scanner";

export interface BlockQuoteState {
	type: "block-quote";
	driver: BlockDriver;
}

/**
 * The rest of a line after its ">" marker and one optional space, or `null` when the line has no marker.
 *
 * ```
 *  ">  foo"  →  " foo"
 *  ">\tfoo"  →  "  foo"   (the tab spans 3 columns; one of them is the optional space)
 * ```
 */
function parseQuoteMarker(line: TextLine): SourceLine | null {
	if (line.indent >= 4 || line.first !== ">") return null;
	const rest: SourceLine = {
		text: line.source.text.slice(line.index + 1),
		column: columnOf(line) + 1,
	};
	return stripColumns(rest, 1);
}

export function startBlockQuote(
	line: TextLine,
	context: BlockContext,
): BlockQuoteState | null {
	const content = parseQuoteMarker(line);
	if (content === null) return null;

	const driver = context.nest();
	driver.feed(content);
	return { type: "block-quote", driver };
}

/**
 * A line without a marker can still continue a paragraph inside the quote:
 *
 * ```
 *  > foo
 *  bar      ← lazy continuation of "foo"
 * ```
 */
export function nextBlockQuote(
	state: BlockQuoteState,
	line: TextLine,
	context: BlockContext,
): Transition {
	const content = parseQuoteMarker(line);
	if (content !== null) {
		state.driver.feed(content);
		return unchanged;
	}
	if (state.driver.continueLazily(line)) return unchanged;
	return finishAndStart(finishBlockQuote(state), context.start(line));
}

export function finishBlockQuote(state: BlockQuoteState): PendingBlock {
	return { type: "quote", children: state.driver.finish() };
}
