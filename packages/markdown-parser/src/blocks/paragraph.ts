import {
	type BlockContext,
	type PendingBlock,
	type Started,
	type Transition,
	finishAndStart,
	unchanged,
} from "../block-context";
import { type TextLine, contentOf } from "../indent-scanner";
import { extractLinkReferenceDefinitions } from "../link-references";
import { canInterruptParagraph } from "./list";
import { startTable } from "./table";

export interface ParagraphState {
	type: "paragraph";
	lines: Array<string>;
}

export function startParagraph(line: TextLine): ParagraphState {
	return { type: "paragraph", lines: [contentOf(line).text] };
}

/**
 * A paragraph continues until a blank line or a line that interrupts it. On the way, an underline may turn it into a
 * setext heading, and a delimiter row may turn its last line into a table header.
 *
 * ```
 *  Foo          Foo          a | b        Foo
 *  ===          ---          --|--        # Bar
 *  heading 1    heading 2    table        paragraph, then heading
 * ```
 */
export function nextParagraph(
	state: ParagraphState,
	line: TextLine,
	context: BlockContext,
): Transition {
	if (line.indent < 4) {
		const level = parseSetextUnderline(line);
		if (level !== null) {
			const lines = takeDefinitions(state, context);
			// Only definitions came before the underline; it is read as a line of its own.
			if (lines.length === 0) return finishAndStart(null, context.start(line));
			return {
				type: "finished",
				block: { type: "heading", level, text: lines.join("\n").trim() },
			};
		}

		const table = matchTable(state, line, context);
		if (table !== null) return table;

		const interruption = interruptParagraph(line, context);
		if (interruption !== null) {
			return finishAndStart(finishParagraph(state, context), interruption);
		}
	}

	state.lines.push(contentOf(line).text);
	return unchanged;
}

/**
 * Appends a lazy continuation line, i.e. a line that lacks the container markers of the paragraph's ancestors. Returns
 * `false` if the line would have started something else.
 */
export function continueParagraph(
	state: ParagraphState,
	line: TextLine,
	context: BlockContext,
): boolean {
	if (line.indent < 4) {
		if (parseSetextUnderline(line) !== null) return false;
		if (interruptParagraph(line, context) !== null) return false;
	}
	state.lines.push(contentOf(line).text);
	return true;
}

export function finishParagraph(
	state: ParagraphState,
	context: BlockContext,
): PendingBlock | null {
	const lines = takeDefinitions(state, context);
	if (lines.length === 0) return null;
	return { type: "paragraph", lines };
}

function takeDefinitions(
	state: ParagraphState,
	context: BlockContext,
): Array<string> {
	if (!context.linkReferenceDefinitions) return state.lines;
	return extractLinkReferenceDefinitions(state.lines, context.references);
}

/**
 * The last line of the paragraph becomes the header row. Lines before it stay a paragraph of their own.
 */
function matchTable(
	state: ParagraphState,
	line: TextLine,
	context: BlockContext,
): Transition | null {
	const headerLine = state.lines[state.lines.length - 1];
	if (!context.tables || headerLine === undefined) return null;

	const table = startTable(headerLine, line);
	if (table === null) return null;
	if (state.lines.length === 1) return { type: "replaced", next: table };

	const before: ParagraphState = { type: "paragraph", lines: state.lines.slice(0, -1) };
	return {
		type: "finished-and-replaced",
		block: finishParagraph(before, context),
		next: table,
	};
}

/**
 * Headings, thematic breaks, fences, block quotes and list items interrupt a paragraph. A list item only does so when
 * it has content and, if ordered, starts at 1.
 */
function interruptParagraph(
	line: TextLine,
	context: BlockContext,
): Started | null {
	const started = context.start(line);
	if (started.type === "finished") return started;

	switch (started.next.type) {
		case "paragraph":
		case "indented-code":
			return null;
		case "list":
			return canInterruptParagraph(started.next) ? started : null;
		default:
			return started;
	}
}

/**
 * "=" underlines make a level 1 heading and "-" underlines a level 2 heading. The underline is one run of the same
 * character; "- -" is not an underline.
 */
function parseSetextUnderline(line: TextLine): number | null {
	const text = contentOf(line).text.trimEnd();
	const marker = text.charAt(0);
	if (marker !== "=" && marker !== "-") return null;

	for (const character of text) {
		if (character !== marker) return null;
	}
	return marker === "=" ? 1 : 2;
}
