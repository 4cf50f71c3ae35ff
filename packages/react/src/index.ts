export {
	BlockNodeComponent,
	type HeadingLevel,
	InlineNodeComponent,
	Markdown,
	type MarkdownComponents,
	type TableCellProps,
	isValidUrl,
	renderInlineAsPlainText,
} from "./markdown";
