import {
	type BlockContext,
	type PendingBlock,
	type Transition,
	finishAndStart,
	unchanged,
} from "../block-context";
import type { BlockDriver } from "../block-driver";
import {
	type BlankLine,
	type SourceLine,
	type TextLine,
	contentOf,
	scanAfter,
	stripColumns,
} from "../indent-scanner";
import { parseThematicBreak } from "./thematic-break";

export type ListMarker =
	| { kind: "bullet"; character: "-" | "*" | "+" }
	| { kind: "ordered"; start: number; delimiter: "." | ")" };

interface ListItemState {
	driver: BlockDriver;
	// Lines indented at least this much, relative to the list's own lines, belong to the item.
	width: number;
	// Nothing has been fed to the item yet.
	empty: boolean;
	// An item that started empty and was followed by a blank line takes no more content.
	closed: boolean;
	// A blank line was seen since the item's last content line.
	gap: boolean;
}

export interface ListState {
	type: "list";
	marker: ListMarker;
	items: Array<Array<PendingBlock>>;
	current: ListItemState;
	loose: boolean;
}

interface ListItemStart {
	marker: ListMarker;
	width: number;
	content: SourceLine | null;
}

/**
 * Parses a list marker and measures the width of the item it opens.
 *
 * ```
 *  ┌───┬───┬───┬───┬───┬───┐
 *  │ ␣ | 1 | . | ␣ | ␣ | a |      width 5: content starts after the spaces
 *  └───┴───┴───┴───┴───┴───┘
 *  ┌───┬───┬───┬───┬───┬───┬───┬───┬───┐
 *  │ - | ␣ | ␣ | ␣ | ␣ | ␣ | c | o | d |   width 2: 5 or more spaces mean one space, then indented code
 *  └───┴───┴───┴───┴───┴───┴───┴───┴───┘
 * ```
 *
 * A marker must be followed by a space, a tab or the end of the line. Ordered markers have 1 to 9 digits.
 */
export function parseListMarker(line: TextLine): ListItemStart | null {
	if (line.indent >= 4) return null;

	const text = contentOf(line).text;
	let marker: ListMarker;
	let markerLength: number;

	const first = line.first;
	if (first === "-" || first === "*" || first === "+") {
		marker = { kind: "bullet", character: first };
		markerLength = 1;
	} else {
		const match = text.match(/^([0-9]{1,9})([.)])/);
		const digits = match?.[1];
		const delimiter = match?.[2];
		if (digits === undefined || (delimiter !== "." && delimiter !== ")")) {
			return null;
		}
		marker = { kind: "ordered", start: Number.parseInt(digits, 10), delimiter };
		markerLength = digits.length + 1;
	}

	const after = scanAfter(line, markerLength);
	if (after.kind === "blank") {
		return { marker, width: line.indent + markerLength + 1, content: null };
	}
	if (after.indent === 0) return null;

	if (after.indent >= 5) {
		return {
			marker,
			width: line.indent + markerLength + 1,
			content: stripColumns(after.source, 1),
		};
	}
	return {
		marker,
		width: line.indent + markerLength + after.indent,
		content: contentOf(after),
	};
}

export function startList(
	line: TextLine,
	context: BlockContext,
): ListState | null {
	const start = parseListMarker(line);
	if (start === null) return null;

	return {
		type: "list",
		marker: start.marker,
		items: [],
		current: startItem(start, context),
		loose: false,
	};
}

/**
 * An empty item cannot interrupt a paragraph, and neither can an ordered list that does not start at 1.
 */
export function canInterruptParagraph(state: ListState): boolean {
	if (state.current.empty) return false;
	return state.marker.kind === "bullet" || state.marker.start === 1;
}

/**
 * ```
 *  - a          item 1
 *    b          continuation (indented to the item's width)
 *  c            lazy continuation of "b"
 *  - d          item 2
 *  * e          a different marker ends the list and starts a new one
 * ```
 */
export function nextList(
	state: ListState,
	line: TextLine,
	context: BlockContext,
): Transition {
	const item = state.current;
	if (!item.closed && line.indent >= item.width) {
		feedItem(item, stripColumns(line.source, item.width), state);
		return unchanged;
	}

	const thematicBreak = parseThematicBreak(line);
	if (thematicBreak !== null) {
		return {
			type: "finished-and-also-finished",
			block: finishList(state),
			other: thematicBreak,
		};
	}

	const start = parseListMarker(line);
	if (start !== null) {
		if (isSameKind(state.marker, start.marker)) {
			if (item.gap) state.loose = true;
			state.items.push(item.driver.finish());
			state.current = startItem(start, context);
			return unchanged;
		}
		return finishAndStart(finishList(state), context.start(line));
	}

	if (!item.closed && item.driver.continueLazily(line)) return unchanged;

	return finishAndStart(finishList(state), context.start(line));
}

export function blankList(state: ListState, line: BlankLine): Transition {
	const item = state.current;
	if (item.empty) {
		item.closed = true;
		item.gap = true;
		return unchanged;
	}

	item.driver.feed(stripColumns(line.source, item.width));
	// Blank lines inside fenced code are content, not a gap between blocks.
	if (!item.driver.inFencedCode()) item.gap = true;
	return unchanged;
}

/**
 * In a tight list, paragraphs are rendered without paragraph spacing. A list is loose when a blank line separates two
 * of its items, or two blocks inside one item.
 */
export function finishList(state: ListState): PendingBlock {
	const items = [...state.items, state.current.driver.finish()];
	const children = state.loose
		? items
		: items.map((blocks) =>
				blocks.map(
					(block): PendingBlock =>
						block.type === "paragraph"
							? { type: "plain", lines: block.lines }
							: block,
				),
			);

	if (state.marker.kind === "bullet") {
		return { type: "bullet-list", items: children };
	}
	return {
		type: "ordered-list",
		start: state.marker.start,
		delimiter: state.marker.delimiter,
		items: children,
	};
}

function startItem(start: ListItemStart, context: BlockContext): ListItemState {
	const item: ListItemState = {
		driver: context.nest(),
		width: start.width,
		empty: true,
		closed: false,
		gap: false,
	};
	if (start.content !== null) {
		item.driver.feed(start.content);
		item.empty = false;
	}
	return item;
}

function feedItem(item: ListItemState, source: SourceLine, state: ListState): void {
	const blockCount = item.driver.blockCount;
	item.driver.feed(source);
	// After a blank line, content that opens a new block in the item makes the list loose.
	if (item.gap && item.driver.blockCount > blockCount) state.loose = true;
	item.gap = false;
	item.empty = false;
}

function isSameKind(a: ListMarker, b: ListMarker): boolean {
	if (a.kind === "bullet") return b.kind === "bullet" && a.character === b.character;
	return b.kind === "ordered" && a.delimiter === b.delimiter;
}
