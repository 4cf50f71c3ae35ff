export * from "./ast";
export { UnsupportedConstructError } from "./errors";
export { createLogger } from "./logger";
export { LineSplitter } from "./line-splitter";
export {
	type BlankLine,
	type ScannedLine,
	type SourceLine,
	type TextLine,
	TAB_STOP,
	scanIndent,
	stripColumns,
} from "./indent-scanner";
export {
	type LinkReference,
	LinkReferenceTable,
	normalizeReference,
} from "./link-references";
export { parseInline } from "./inline-parser";
export { MarkdownParser, type ParseOptions } from "./markdown-parser";
