import {
	type BlockContext,
	type PendingBlock,
	type Transition,
	finishAndStart,
	unchanged,
} from "../block-context";
import {
	type BlankLine,
	type TextLine,
	contentOf,
	stripColumns,
} from "../indent-scanner";
import { unescapeString } from "../inline-parser";

export interface IndentedCodeState {
	type: "indented-code";
	lines: Array<string>;
}

/**
 * A line indented by 4 or more columns. The first 4 columns are removed from every line of the block.
 */
export function startIndentedCode(line: TextLine): IndentedCodeState {
	return {
		type: "indented-code",
		lines: [stripColumns(line.source, 4).text],
	};
}

export function nextIndentedCode(
	state: IndentedCodeState,
	line: TextLine,
	context: BlockContext,
): Transition {
	if (line.indent < 4) {
		return finishAndStart(finishIndentedCode(state), context.start(line));
	}
	state.lines.push(stripColumns(line.source, 4).text);
	return unchanged;
}

export function blankIndentedCode(
	state: IndentedCodeState,
	line: BlankLine,
): Transition {
	// Whitespace beyond the first 4 columns is part of the code.
	state.lines.push(stripColumns(line.source, 4).text);
	return unchanged;
}

/**
 * Blank lines at the end belong to whatever follows, not to the code.
 */
export function finishIndentedCode(state: IndentedCodeState): PendingBlock {
	const lines = [...state.lines];
	while (lines.length > 0 && (lines[lines.length - 1] ?? "").trim() === "") {
		lines.pop();
	}
	return { type: "code", info: undefined, text: lines.join("\n") };
}

export interface FencedCodeState {
	type: "fenced-code";
	marker: "`" | "~";
	numOfMarkers: number;
	// Content lines lose up to this many columns of indentation.
	indent: number;
	info: string | undefined;
	lines: Array<string>;
}

/**
 * Opens a fenced code block: at least 3 backticks or tildes, then an optional info string. Only the first word of the
 * info string is kept.
 *
 * ```
 *  ┌───┬───┬───┬───┬───┬───┬───┬───┐
 *  │ ~ | ~ | ~ | ␣ | t | s | ␣ | x |
 *  └───┴───┴───┴───┴───┴───┴───┴───┘
 *    ▲       ▲       ▲   ▲
 *    └───────┘       └───┘
 *    fence           info "ts"
 * ```
 *
 * A backtick fence whose info string contains a backtick is not a fence (it reads as an inline code span).
 */
export function startFencedCode(line: TextLine): FencedCodeState | null {
	if (line.indent >= 4) return null;

	const marker = line.first;
	if (marker !== "`" && marker !== "~") return null;

	const text = contentOf(line).text;
	let numOfMarkers = 1;
	while (numOfMarkers < text.length && text.charAt(numOfMarkers) === marker) {
		numOfMarkers++;
	}
	if (numOfMarkers < 3) return null;

	const info = text.slice(numOfMarkers).trim();
	if (marker === "`" && info.indexOf("`") >= 0) return null;

	const firstWord = info.split(/[ \t]/)[0] ?? "";
	return {
		type: "fenced-code",
		marker,
		numOfMarkers,
		indent: line.indent,
		info: firstWord === "" ? undefined : unescapeString(firstWord),
		lines: [],
	};
}

export function nextFencedCode(
	state: FencedCodeState,
	line: TextLine,
): Transition {
	if (isCodeFenceEnd(state, line)) {
		return { type: "finished", block: finishFencedCode(state) };
	}
	state.lines.push(stripColumns(line.source, state.indent).text);
	return unchanged;
}

export function blankFencedCode(
	state: FencedCodeState,
	line: BlankLine,
): Transition {
	state.lines.push(stripColumns(line.source, state.indent).text);
	return unchanged;
}

export function finishFencedCode(state: FencedCodeState): PendingBlock {
	return { type: "code", info: state.info, text: state.lines.join("\n") };
}

/**
 * A closing fence uses the opening character, at least as many times, with nothing but whitespace after it.
 *
 * ```
 *  opened with ```:   ```  ✓   ````  ✓   ``  ✗   ~~~  ✗   ```js  ✗
 * ```
 */
function isCodeFenceEnd(state: FencedCodeState, line: TextLine): boolean {
	if (line.indent >= 4 || line.first !== state.marker) return false;

	const text = contentOf(line).text.trimEnd();
	let numOfMarkers = 1;
	while (numOfMarkers < text.length && text.charAt(numOfMarkers) === state.marker) {
		numOfMarkers++;
	}
	return numOfMarkers >= state.numOfMarkers && numOfMarkers === text.length;
}
