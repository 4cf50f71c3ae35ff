import { decodeHTMLStrict } from "entities";
import { type Inline, emptyAttr } from "./ast";
import type { LinkReferenceTable } from "./link-references";
import { inlineLogger } from "./logger";

/**
 * Resolves the inline content of one leaf block. Lines of a paragraph are joined with "\n" before they get here; each
 * "\n" becomes a soft or hard break.
 *
 * Words come out as `str` nodes and runs of spaces as single `space` nodes:
 *   "foo *bar*"  →  [str "foo", space, emphasis [str "bar"]]
 */
export function parseInline(
	input: string,
	options: { references: LinkReferenceTable },
): Array<Inline> {
	const nodes: Array<ParsedNode> = [];
	const brackets: Array<Bracket> = [];

	let characterCursor = 0;
	while (characterCursor < input.length) {
		const marker = input.charAt(characterCursor);
		if (marker === "\n") {
			const startIndex = characterCursor;

			let numOfPrecedingSpaces = 0;
			while (input.charAt(startIndex - numOfPrecedingSpaces - 1) === " ") {
				numOfPrecedingSpaces++;
			}
			let numOfPrecedingWhitespace = 0;
			while (true) {
				const previous = input.charAt(startIndex - numOfPrecedingWhitespace - 1);
				if (previous !== " " && previous !== "\t") break;
				numOfPrecedingWhitespace++;
			}

			// Trailing spaces and tabs of a line never reach the output; two or more spaces make the break a hard one.
			const lastNode = nodes[nodes.length - 1];
			if (lastNode?.type === "text") {
				lastNode.text = lastNode.text.slice(
					0,
					Math.max(0, lastNode.text.length - numOfPrecedingWhitespace),
				);
			}

			nodes.push({
				type: numOfPrecedingSpaces >= 2 ? "line-break" : "soft-break",
			});

			const numOfSpaces = getNumOfConsecutiveCharacters(input, {
				characters: [" ", "\t"],
				startIndex: startIndex + 1,
			});
			characterCursor += 1 + numOfSpaces;
		} else if (marker === "\\") {
			const nextCharacter = input.charAt(characterCursor + 1);
			// A backslash at the end of a line is a hard break.
			if (nextCharacter === "\n") {
				nodes.push({ type: "line-break" });
				characterCursor += 2;
				characterCursor += getNumOfConsecutiveCharacters(input, {
					characters: [" ", "\t"],
					startIndex: characterCursor,
				});
				continue;
			}

			if (isAsciiPunctuationCharacter(nextCharacter)) {
				nodes.push({ type: "text", text: nextCharacter });
				characterCursor += 2;
				continue;
			}

			nodes.push({ type: "text", text: marker });
			characterCursor += 1;
		} else if (marker === "`") {
			const numOfOpeningBackticks = getNumOfConsecutiveCharacters(input, {
				characters: ["`"],
				startIndex: characterCursor,
			});

			/**
			 * A code span closes at the next run of exactly as many backticks. Shorter or longer runs inside are literal.
			 *
			 * `` foo ` bar ``
			 * ▲▲     ▲     ▲▲
			 * │      │     └── closes (2 backticks)
			 * │      └──────── literal (1 backtick)
			 * └─────────────── opens (2 backticks)
			 */
			const openerIndex = characterCursor + numOfOpeningBackticks;
			let closerIndex = input.indexOf("`", openerIndex);
			while (closerIndex !== -1) {
				const numOfClosingBackticks = getNumOfConsecutiveCharacters(input, {
					characters: ["`"],
					startIndex: closerIndex,
				});
				if (numOfClosingBackticks === numOfOpeningBackticks) break;
				closerIndex = input.indexOf("`", closerIndex + numOfClosingBackticks);
			}

			if (closerIndex !== -1) {
				let content = input.slice(openerIndex, closerIndex).replace(/\n/g, " ");
				if (
					content.charAt(0) === " " &&
					content.charAt(content.length - 1) === " " &&
					content.trim().length > 0
				) {
					content = content.slice(1, content.length - 1);
				}
				nodes.push({ type: "code", text: content });
				characterCursor = closerIndex + numOfOpeningBackticks;
			} else {
				nodes.push({
					type: "text",
					text: marker.repeat(numOfOpeningBackticks),
				});
				characterCursor += numOfOpeningBackticks;
			}
		} else if (marker === "*" || marker === "_" || marker === "~") {
			const numOfMarkers = getNumOfConsecutiveCharacters(input, {
				characters: [marker],
				startIndex: characterCursor,
			});

			// Strikethrough takes runs of one or two tildes only.
			if (marker === "~" && numOfMarkers > 2) {
				nodes.push({ type: "text", text: marker.repeat(numOfMarkers) });
				characterCursor += numOfMarkers;
				continue;
			}

			// The start and the end of the text count as whitespace.
			const previousCharacter = input.charAt(characterCursor - 1) || " ";
			const nextCharacter = input.charAt(characterCursor + numOfMarkers) || " ";

			const isPreviousCharacterPunctuation =
				isAsciiPunctuationCharacter(previousCharacter) ||
				isUnicodePunctuationCharacter(previousCharacter);
			const isNextCharacterPunctuation =
				isAsciiPunctuationCharacter(nextCharacter) ||
				isUnicodePunctuationCharacter(nextCharacter);

			const isPreviousCharacterWhitespace =
				isWhiteSpaceCharacter(previousCharacter);
			const isNextCharacterWhitespace = isWhiteSpaceCharacter(nextCharacter);

			/**
			 * Left-flanking: not followed by whitespace, and either not followed by punctuation or preceded by whitespace or
			 * punctuation.
			 * @see https://spec.commonmark.org/0.31.2/#left-flanking-delimiter-run
			 */
			const isLeftFlanking =
				!isNextCharacterWhitespace &&
				(!isNextCharacterPunctuation ||
					isPreviousCharacterWhitespace ||
					isPreviousCharacterPunctuation);

			/**
			 * Right-flanking: not preceded by whitespace, and either not preceded by punctuation or followed by whitespace or
			 * punctuation.
			 * @see https://spec.commonmark.org/0.31.2/#right-flanking-delimiter-run
			 */
			const isRightFlanking =
				!isPreviousCharacterWhitespace &&
				(!isPreviousCharacterPunctuation ||
					isNextCharacterWhitespace ||
					isNextCharacterPunctuation);

			// An underscore run between two alphanumerics (snake_case_word) neither opens nor closes.
			nodes.push({
				type: "emphasis-delimiter",
				marker,
				canOpen:
					marker === "_"
						? isLeftFlanking &&
							(!isRightFlanking || isPreviousCharacterPunctuation)
						: isLeftFlanking,
				canClose:
					marker === "_"
						? isRightFlanking &&
							(!isLeftFlanking || isNextCharacterPunctuation)
						: isRightFlanking,
				count: numOfMarkers,
				content: marker.repeat(numOfMarkers),
			});

			characterCursor += numOfMarkers;
		} else if (marker === "[") {
			const node: TextNode = { type: "text", text: marker };
			nodes.push(node);
			brackets.push({
				marker: "[",
				node,
				startIndex: characterCursor,
				isActive: true,
			});
			characterCursor += 1;
		} else if (marker === "!" && input.charAt(characterCursor + 1) === "[") {
			const node: TextNode = { type: "text", text: "![" };
			nodes.push(node);
			brackets.push({
				marker: "![",
				node,
				startIndex: characterCursor,
				isActive: true,
			});
			characterCursor += 2;
		} else if (marker === "]") {
			const startIndex = characterCursor;
			const openerBracket = brackets.pop();
			if (openerBracket === undefined || !openerBracket.isActive) {
				nodes.push({ type: "text", text: marker });
				characterCursor += 1;
				continue;
			}

			const target = resolveLinkTarget(input, {
				opener: openerBracket,
				closerIndex: startIndex,
				references: options.references,
			});
			if (target === null) {
				nodes.push({ type: "text", text: marker });
				characterCursor = startIndex + 1;
				continue;
			}
			characterCursor = target.endIndex + 1;

			const openerNodeIndex = nodes.indexOf(openerBracket.node);
			const children = parseEmphasisDelimiterNodes(
				nodes.splice(openerNodeIndex + 1),
			);

			nodes[openerNodeIndex] = {
				type: openerBracket.marker === "[" ? "link" : "image",
				url: target.url,
				title: target.title,
				children,
			};

			// Links cannot contain other links, so every "[" still open around this one can no longer form a link.
			if (openerBracket.marker === "[") {
				for (const bracket of brackets) {
					if (bracket.marker === "[") bracket.isActive = false;
				}
			}
		} else if (marker === "<") {
			const rest = input.slice(characterCursor);

			const emailMatch = rest.match(EMAIL_REGEX);
			if (emailMatch !== null) {
				const email = emailMatch[0].slice(1, emailMatch[0].length - 1);
				nodes.push({
					type: "link",
					url: `mailto:${email}`,
					title: "",
					autolink: "email",
					children: [{ type: "text", text: email }],
				});
				characterCursor += emailMatch[0].length;
				continue;
			}

			const uriMatch = rest.match(AUTOLINK_REGEX);
			if (uriMatch !== null) {
				const uri = uriMatch[0].slice(1, uriMatch[0].length - 1);
				nodes.push({
					type: "link",
					url: uri,
					title: "",
					autolink: "uri",
					children: [{ type: "text", text: uri }],
				});
				characterCursor += uriMatch[0].length;
				continue;
			}

			nodes.push({ type: "text", text: marker });
			characterCursor += 1;
		} else if (marker === "&") {
			const match = input.slice(characterCursor).match(ENTITY_REGEX);
			if (match !== null) {
				const entity = match[0];
				nodes.push({ type: "text", text: decodeHTMLStrict(entity) });
				characterCursor += entity.length;
				continue;
			}

			nodes.push({ type: "text", text: marker });
			characterCursor += 1;
		} else {
			let endIndex = characterCursor;
			while (endIndex < input.length) {
				if (SPECIAL_CHARACTERS.has(input.charAt(endIndex))) break;
				endIndex++;
			}

			// A "!" that does not open an image is plain text; consume it so the loop advances.
			if (endIndex === characterCursor) endIndex++;

			nodes.push({
				type: "text",
				text: input.slice(characterCursor, endIndex),
			});
			characterCursor = endIndex;
		}
	}

	const inlines = toInlines(parseEmphasisDelimiterNodes(nodes));
	inlineLogger("resolved %d inline nodes from %d characters", inlines.length, input.length);
	return inlines;
}

const SPECIAL_CHARACTERS = new Set([
	"\n",
	"\\",
	"`",
	"*",
	"_",
	"~",
	"[",
	"]",
	"!",
	"<",
	"&",
]);

/**
 * Parses what follows the "]" of a link or image: an inline target "(url "title")", a full reference "[label]", a
 * collapsed reference "[]", or nothing (a shortcut reference, where the link text is the label).
 */
function resolveLinkTarget(
	input: string,
	{
		opener,
		closerIndex,
		references,
	}: { opener: Bracket; closerIndex: number; references: LinkReferenceTable },
): { url: string; title: string; endIndex: number } | null {
	const inline = parseLinkTarget(input, { startIndex: closerIndex + 1 });
	if (inline !== null) {
		return {
			url: inline.href,
			title: inline.title ?? "",
			endIndex: inline.endIndex,
		};
	}

	const textLabel = () =>
		extractLinkLabel(input, {
			startIndex: opener.startIndex + opener.marker.length,
			endIndex: closerIndex,
		});

	let label: string | null;
	let endIndex: number;
	const referenceLabel = parseReferenceLinkLabel(input, {
		startIndex: closerIndex + 1,
	});
	if (referenceLabel !== null) {
		label = referenceLabel.label.length > 0 ? referenceLabel.label : textLabel();
		endIndex = referenceLabel.endIndex;
	} else {
		label = textLabel();
		endIndex = closerIndex;
	}

	if (label === null) return null;
	const reference = references.lookup(label);
	if (reference === undefined) return null;

	return {
		url: reference.destination,
		title: reference.title ?? "",
		endIndex,
	};
}

/**
 * Matches emphasis delimiters. Each closer, left to right, takes the nearest opener of the same character below it;
 * two characters are consumed from both when both runs have at least two left (strong), otherwise one (emphasis).
 * Tilde runs are consumed whole and become strikeout.
 */
function parseEmphasisDelimiterNodes(
	nodes: Array<ParsedNode>,
): Array<InlineNode_internal> {
	const result = nodes;
	let closerIndex = 0;
	while (closerIndex < result.length) {
		const node = result[closerIndex];
		if (node === undefined) break;

		if (node.type !== "emphasis-delimiter" || !node.canClose) {
			closerIndex++;
			continue;
		}

		const closer = node;
		const openerInfo = findMatchingOpenerForCloser(result, {
			node: closer,
			index: closerIndex,
		});
		if (openerInfo === null) {
			// A closer without an opener that cannot open either will never match; it is literal text from here on.
			if (!closer.canOpen) {
				result[closerIndex] = { type: "text", text: closer.content };
			}
			closerIndex++;
			continue;
		}

		const opener = openerInfo.node;
		const openerIndex = openerInfo.index;

		const isStrikeout = closer.marker === "~";
		const isStrong =
			!isStrikeout && opener.content.length >= 2 && closer.content.length >= 2;
		const consumed = isStrikeout ? closer.content.length : isStrong ? 2 : 1;
		opener.content = opener.content.slice(0, -consumed);
		closer.content = closer.content.slice(consumed);

		// Delimiters between the pair can no longer match anything.
		const children = result
			.slice(openerIndex + 1, closerIndex)
			.map(toLiteralDelimiter);

		result.splice(openerIndex + 1, closerIndex - openerIndex - 1, {
			type: isStrikeout ? "strikeout" : isStrong ? "strong" : "emphasis",
			children,
		});
		if (opener.content.length === 0) {
			result.splice(openerIndex, 1);
		}
		if (closer.content.length === 0) {
			result.splice(result.indexOf(closer), 1);
		}
		closerIndex = openerIndex + 1;
	}

	return result.map(toLiteralDelimiter);
}

function toLiteralDelimiter(node: ParsedNode): InlineNode_internal {
	if (node.type === "emphasis-delimiter") {
		return { type: "text", text: node.content };
	}
	return node;
}

function findMatchingOpenerForCloser(
	nodes: Array<ParsedNode>,
	closer: {
		node: EmphasisDelimiterNode;
		index: number;
	},
): { node: EmphasisDelimiterNode; index: number } | null {
	for (let i = closer.index - 1; i >= 0; i--) {
		const node = nodes[i];
		if (node?.type !== "emphasis-delimiter") continue;

		if (!node.canOpen) continue;
		if (node.marker !== closer.node.marker) continue;

		// Tilde runs pair only with a run of the same length: "~~a~" stays text.
		if (closer.node.marker === "~") {
			if (node.content.length !== closer.node.content.length) continue;
			return { node, index: i };
		}

		/**
		 * Rule of three: when either run can both open and close, the pair does not match if the sum of the original run
		 * lengths is a multiple of 3, unless both lengths are multiples of 3.
		 *
		 * "**foo*bar**": the "*" after "foo" cannot pair with the leading "**" (1 + 2 = 3), so the outer pair wins and
		 * the result is strong ["foo*bar"].
		 */
		if (
			(node.canClose || closer.node.canOpen) &&
			(node.count + closer.node.count) % 3 === 0 &&
			(node.count % 3 !== 0 || closer.node.count % 3 !== 0)
		) {
			continue;
		}

		return { node, index: i };
	}
	return null;
}

/**
 * Converts the parsed nodes into document inlines. Adjacent text is merged, then split into words and spaces.
 */
function toInlines(nodes: Array<InlineNode_internal>): Array<Inline> {
	const result: Array<Inline> = [];
	let text = "";

	const flushText = () => {
		for (const part of text.split(/([ \t]+)/)) {
			if (part.length === 0) continue;
			if (part.charAt(0) === " " || part.charAt(0) === "\t") {
				result.push({ type: "space" });
			} else {
				result.push({ type: "str", text: part });
			}
		}
		text = "";
	};

	for (const node of nodes) {
		if (node.type === "text") {
			text += node.text;
			continue;
		}
		flushText();

		switch (node.type) {
			case "code":
				result.push({ type: "code", attr: emptyAttr(), text: node.text });
				break;
			case "soft-break":
			case "line-break":
				result.push({ type: node.type });
				break;
			case "emphasis":
			case "strong":
			case "strikeout":
				result.push({ type: node.type, children: toInlines(node.children) });
				break;
			case "link":
			case "image": {
				const attr = emptyAttr();
				if (node.type === "link" && node.autolink !== undefined) {
					attr.classes.push(node.autolink);
				}
				result.push({
					type: node.type,
					attr,
					children: toInlines(node.children),
					target: { url: node.url, title: node.title },
				});
				break;
			}
		}
	}
	flushText();

	return result;
}

interface Bracket {
	marker: "[" | "![";
	// Replaced by the link or image once the matching "]" forms one.
	node: TextNode;
	startIndex: number;
	// Inactive brackets have their "]" rendered as text.
	isActive: boolean;
}

interface TextNode {
	type: "text";
	text: string;
}

interface CodeNode {
	type: "code";
	text: string;
}

interface BreakNode {
	type: "soft-break" | "line-break";
}

interface EmphasisNode {
	type: "emphasis" | "strong" | "strikeout";
	children: Array<InlineNode_internal>;
}

interface LinkNode {
	type: "link";
	url: string;
	title: string;
	autolink?: "uri" | "email";
	children: Array<InlineNode_internal>;
}

interface ImageNode {
	type: "image";
	url: string;
	title: string;
	children: Array<InlineNode_internal>;
}

interface EmphasisDelimiterNode {
	type: "emphasis-delimiter";
	marker: "*" | "_" | "~";
	// What is left of the run after matching.
	content: string;
	canOpen: boolean;
	canClose: boolean;
	// Original length of the run, used by the rule of three.
	count: number;
}

type InlineNode_internal =
	| TextNode
	| CodeNode
	| BreakNode
	| EmphasisNode
	| LinkNode
	| ImageNode;

type ParsedNode = InlineNode_internal | EmphasisDelimiterNode;

/**
 * Counts the consecutive characters from a set starting at a given position.
 *
 * @example
 * getNumOfConsecutiveCharacters("```ts", { characters: ["`"], startIndex: 0 })  // 3
 */
function getNumOfConsecutiveCharacters(
	input: string,
	{ characters, startIndex }: { characters: string[]; startIndex: number },
): number {
	let count = 0;
	while (startIndex + count < input.length) {
		if (!characters.includes(input.charAt(startIndex + count))) break;
		count++;
	}
	return count;
}

/**
 * ASCII punctuation: U+0021–2F, U+003A–40, U+005B–60 and U+007B–7E.
 * @see https://spec.commonmark.org/0.31.2/#ascii-punctuation-character
 */
function isAsciiPunctuationCharacter(character: string): boolean {
	return /^[!-/:-@[-`{-~]$/.test(character);
}

/**
 * A character in the Unicode P (punctuation) or S (symbol) general categories.
 * @see https://spec.commonmark.org/0.31.2/#unicode-punctuation-character
 */
function isUnicodePunctuationCharacter(character: string): boolean {
	return /^[\p{P}\p{S}]$/u.test(character);
}

function isWhiteSpaceCharacter(character: string): boolean {
	return /^[\t\n\v\f\r \u00a0\u1680\u2000-\u200a\u202f\u205f\u3000]$/.test(
		character,
	);
}

function parseLinkTarget(
	input: string,
	options: { startIndex: number },
): { href: string; title?: string; endIndex: number } | null {
	const startIndex = options.startIndex;

	if (input.charAt(startIndex) !== "(") return null;

	const destinationStartIndex =
		startIndex +
		1 +
		getNumOfConsecutiveCharacters(input, {
			characters: [" ", "\t", "\n"],
			startIndex: startIndex + 1,
		});

	// "[link]()" has an empty destination.
	if (input.charAt(destinationStartIndex) === ")") {
		return { href: "", endIndex: destinationStartIndex };
	}

	const destination = parseLinkDestination(input, {
		startIndex: destinationStartIndex,
	});
	if (destination === null) return null;

	const numOfWhitespacesAfterHref = getNumOfConsecutiveCharacters(input, {
		characters: [" ", "\t", "\n"],
		startIndex: destination.endIndex + 1,
	});

	// A title must be separated from the destination by whitespace.
	const title =
		numOfWhitespacesAfterHref > 0
			? parseLinkTitle(input, {
					startIndex: destination.endIndex + numOfWhitespacesAfterHref + 1,
				})
			: null;

	let targetEndIndex = title !== null ? title.endIndex : destination.endIndex;
	targetEndIndex +=
		getNumOfConsecutiveCharacters(input, {
			characters: [" ", "\t", "\n"],
			startIndex: targetEndIndex + 1,
		}) + 1;

	if (input.charAt(targetEndIndex) !== ")") return null;

	return {
		href: destination.href,
		title: title?.title,
		endIndex: targetEndIndex,
	};
}

/**
 * Parses a link destination, either "<...>" or a run of non-space characters with balanced parentheses.
 * `endIndex` is the index of the last character of the destination.
 */
export function parseLinkDestination(
	input: string,
	options: { startIndex: number },
): { href: string; endIndex: number } | null {
	const startIndex = options.startIndex;
	if (startIndex >= input.length) return null;

	if (input.charAt(startIndex) === "<") {
		let index = startIndex + 1;
		while (index < input.length) {
			const character = input.charAt(index);
			if (character === "\n" || character === "<") return null;
			if (character === ">") {
				return {
					href: unescapeString(input.slice(startIndex + 1, index)),
					endIndex: index,
				};
			}
			if (character === "\\" && index + 1 < input.length) {
				index += 2;
				continue;
			}
			index++;
		}
		return null;
	}

	let index = startIndex;
	let numOfOpenParentheses = 0;
	while (index < input.length) {
		const characterCode = input.charCodeAt(index);

		// Spaces and ASCII control characters end the destination.
		if (characterCode <= 0x20 || characterCode === 0x7f) break;

		if (characterCode === 0x5c /* \ */ && index + 1 < input.length) {
			if (input.charCodeAt(index + 1) === 0x20) break;
			index += 2;
			continue;
		}

		if (characterCode === 0x28 /* ( */) {
			numOfOpenParentheses++;
			if (numOfOpenParentheses > 32) return null;
		}

		if (characterCode === 0x29 /* ) */) {
			if (numOfOpenParentheses === 0) break;
			numOfOpenParentheses--;
		}

		index++;
	}

	if (numOfOpenParentheses !== 0 || index === startIndex) return null;

	return {
		href: unescapeString(input.slice(startIndex, index)),
		endIndex: index - 1,
	};
}

function parseLinkTitle(
	input: string,
	options: { startIndex: number },
): { title: string; endIndex: number } | null {
	const startIndex = options.startIndex;
	if (startIndex >= input.length) return null;

	const openingQuoteCharacter = input.charAt(startIndex);
	if (!['"', "'", "("].includes(openingQuoteCharacter)) return null;

	const closingQuoteCharacter =
		openingQuoteCharacter === "(" ? ")" : openingQuoteCharacter;
	let endIndex = startIndex + 1;
	while (endIndex < input.length) {
		const character = input.charAt(endIndex);
		if (character === closingQuoteCharacter) {
			return {
				title: unescapeString(input.slice(startIndex + 1, endIndex)),
				endIndex,
			};
		}

		// "(" cannot appear unescaped inside a title delimited by parentheses.
		if (character === "(" && openingQuoteCharacter === "(") return null;

		if (character === "\\" && endIndex + 1 < input.length) {
			endIndex += 2;
			continue;
		}

		endIndex++;
	}

	return null;
}

function parseReferenceLinkLabel(
	input: string,
	options: { startIndex: number },
): { label: string; endIndex: number } | null {
	const startIndex = options.startIndex;
	if (input.charAt(startIndex) !== "[") return null;

	// "[]" is a collapsed reference; the caller falls back to the link text.
	if (input.charAt(startIndex + 1) === "]") {
		return { label: "", endIndex: startIndex + 1 };
	}

	let label = "";
	let endIndex = startIndex + 1;
	while (endIndex < input.length) {
		if (label.length > 999) return null;

		const character = input.charAt(endIndex);
		if (character === "\\") {
			const nextCharacter = input.charAt(endIndex + 1);
			if (nextCharacter === "]" || nextCharacter === "[" || nextCharacter === "\\") {
				label += nextCharacter;
				endIndex += 2;
			} else {
				label += character;
				endIndex++;
			}
			continue;
		}

		if (character === "[") return null;

		if (character === "]") {
			if (label.trim().length === 0) return null;
			return { label, endIndex };
		}

		label += character;
		endIndex++;
	}

	return null;
}

function extractLinkLabel(
	input: string,
	options: { startIndex: number; endIndex: number },
): string | null {
	const label = input
		.slice(options.startIndex, options.endIndex)
		.replace(/\\([[\]\\])/g, "$1");
	if (label.length > 999 || label.trim().length === 0) return null;
	return label;
}

const UNESCAPE_MD_RE = /\\([!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~])/g;
const ENTITY_RE = /&([a-z#][a-z0-9]{1,31});/gi;
const UNESCAPE_ALL_RE = new RegExp(
	`${UNESCAPE_MD_RE.source}|${ENTITY_RE.source}`,
	"gi",
);

/**
 * Resolves backslash escapes and entity references in text that is not inline-parsed: link destinations, titles and
 * code fence info strings.
 *
 * unescapeString("a\\*b&amp;c")  // "a*b&c"
 */
export function unescapeString(text: string): string {
	if (text.indexOf("\\") < 0 && text.indexOf("&") < 0) return text;
	return text.replace(UNESCAPE_ALL_RE, (match, escaped: string | undefined) => {
		if (escaped !== undefined) return escaped;
		return decodeHTMLStrict(match);
	});
}

const ENTITY_REGEX = /^&(?:#x[a-f0-9]{1,6}|#[0-9]{1,7}|[a-z][a-z0-9]{1,31});/i;

const EMAIL_REGEX =
	/^<([a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*)>/;

const AUTOLINK_REGEX = /^<[A-Za-z][A-Za-z0-9.+-]{1,31}:[^<>\x00-\x20]*>/i;
