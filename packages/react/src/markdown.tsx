import {
	type Alignment,
	type Block,
	type Document,
	type Inline,
	MarkdownParser,
	type ParseOptions,
	UnsupportedConstructError,
} from "@doctree/markdown-parser";
import type { ComponentType, ReactNode } from "react";

type CellAlign = "left" | "right" | "center" | undefined;

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface TableCellProps {
	children: ReactNode;
	align: CellAlign;
}

export type MarkdownComponents = BlockComponents & InlineComponents;

interface BlockComponents {
	Table: ComponentType<{
		head: { cells: TableCellProps[] };
		body: { rows: { cells: TableCellProps[] }[] };
	}>;
	CodeBlock: ComponentType<{ content: string; language?: string }>;
	Blockquote: ComponentType<{ children: ReactNode }>;
	List: ComponentType<
		| { type: "ordered"; items: { children: ReactNode }[]; start: number }
		| { type: "unordered"; items: { children: ReactNode }[] }
	>;
	Heading: ComponentType<{ level: HeadingLevel; children: ReactNode }>;
	Paragraph: ComponentType<{ children: ReactNode }>;
	ThematicBreak: ComponentType;
}

interface InlineComponents {
	Text: ComponentType<{ text: string }>;
	CodeSpan: ComponentType<{ text: string }>;
	Emphasis: ComponentType<{ children: ReactNode }>;
	Strong: ComponentType<{ children: ReactNode }>;
	Strikethrough: ComponentType<{ children: ReactNode }>;
	Link: ComponentType<{ href: string; title?: string; children: ReactNode }>;
	Image: ComponentType<{ href: string; title?: string; alt: string }>;
	HardBreak: ComponentType;
	SoftBreak: ComponentType;
}

/**
 * Renders markdown, or an already parsed document, with overridable components.
 *
 * @example
 * ```tsx
 * <Markdown
 *   content={"# Hello\n\nWorld"}
 *   components={{ Heading: ({ children }) => <h2 className="title">{children}</h2> }}
 * />
 * ```
 *
 * Nodes that markdown never produces (divs, notes, math and the like) can still appear in a document that was built
 * by hand or read from another format. Rendering one throws an `UnsupportedConstructError`.
 */
export function Markdown({
	content,
	document,
	options,
	components,
}: {
	content?: string;
	document?: Document;
	options?: ParseOptions;
	components?: Partial<MarkdownComponents>;
}) {
	const { blocks } = document ?? new MarkdownParser(options).parse(content ?? "");

	const resolved: MarkdownComponents = {
		Table: DefaultTable,
		CodeBlock: DefaultCodeBlock,
		Blockquote: DefaultBlockquote,
		List: DefaultList,
		Heading: DefaultHeading,
		Paragraph: DefaultParagraph,
		ThematicBreak: DefaultThematicBreak,
		Text: DefaultText,
		CodeSpan: DefaultCodeSpan,
		Emphasis: DefaultEmphasis,
		Strong: DefaultStrong,
		Strikethrough: DefaultStrikethrough,
		Link: DefaultLink,
		Image: DefaultImage,
		HardBreak: DefaultHardBreak,
		SoftBreak: DefaultSoftBreak,
		...components,
	};

	return <BlockNodes components={resolved} nodes={blocks} />;
}

function BlockNodes({ nodes, components }: { nodes: Block[]; components: MarkdownComponents }) {
	return nodes.map((node, index) => (
		<BlockNodeComponent components={components} key={index} node={node} />
	));
}

function InlineNodes({
	nodes,
	components,
}: {
	nodes: Inline[];
	components: InlineComponents;
}) {
	return nodes.map((node, index) => (
		<InlineNodeComponent components={components} key={index} node={node} />
	));
}

export function BlockNodeComponent({
	node,
	components,
}: {
	node: Block;
	components: MarkdownComponents;
}) {
	const { Table, CodeBlock, Paragraph, Heading, Blockquote, List, ThematicBreak } =
		components;

	switch (node.type) {
		case "table": {
			const aligns = node.colSpecs.map(({ align }) => toCellAlign(align));
			const toCells = (cells: { children: Block[] }[]): TableCellProps[] =>
				cells.map((cell, index) => ({
					children: <BlockNodes components={components} nodes={cell.children} />,
					align: aligns[index],
				}));
			const [headRow] = node.head.rows;
			return (
				<Table
					body={{
						rows: node.bodies.flatMap((body) =>
							body.rows.map((row) => ({ cells: toCells(row.cells) })),
						),
					}}
					head={{ cells: toCells(headRow?.cells ?? []) }}
				/>
			);
		}
		case "block-quote":
			return (
				<Blockquote>
					<BlockNodes components={components} nodes={node.children} />
				</Blockquote>
			);
		case "ordered-list":
			return (
				<List
					items={node.items.map((item) => ({
						children: <BlockNodes components={components} nodes={item} />,
					}))}
					start={node.attributes.start}
					type="ordered"
				/>
			);
		case "bullet-list":
			return (
				<List
					items={node.items.map((item) => ({
						children: <BlockNodes components={components} nodes={item} />,
					}))}
					type="unordered"
				/>
			);
		case "code-block":
			return <CodeBlock content={node.text} language={node.attr.classes[0]} />;
		case "paragraph":
			return (
				<Paragraph>
					<InlineNodes components={components} nodes={node.children} />
				</Paragraph>
			);
		// Tight list items and table cells hold their text without a paragraph around it.
		case "plain":
			return <InlineNodes components={components} nodes={node.children} />;
		case "heading":
			return (
				<Heading level={toHeadingLevel(node.level)}>
					<InlineNodes components={components} nodes={node.children} />
				</Heading>
			);
		case "thematic-break":
			return <ThematicBreak />;
		case "line-block":
		case "raw-block":
		case "definition-list":
		case "figure":
		case "div":
			throw new UnsupportedConstructError(node.type, "react");
	}
}

export function InlineNodeComponent({
	node,
	components,
}: {
	node: Inline;
	components: InlineComponents;
}) {
	const { Text, CodeSpan, HardBreak, SoftBreak, Emphasis, Strong, Strikethrough, Link, Image } =
		components;

	switch (node.type) {
		case "str":
			return <Text text={node.text} />;
		case "space":
			return <Text text=" " />;
		case "code":
			return <CodeSpan text={node.text} />;
		case "line-break":
			return <HardBreak />;
		case "soft-break":
			return <SoftBreak />;
		case "emphasis":
			return (
				<Emphasis>
					<InlineNodes components={components} nodes={node.children} />
				</Emphasis>
			);
		case "strong":
			return (
				<Strong>
					<InlineNodes components={components} nodes={node.children} />
				</Strong>
			);
		case "strikeout":
			return (
				<Strikethrough>
					<InlineNodes components={components} nodes={node.children} />
				</Strikethrough>
			);
		case "link":
			return (
				<Link href={node.target.url} title={node.target.title || undefined}>
					<InlineNodes components={components} nodes={node.children} />
				</Link>
			);
		case "image":
			return (
				<Image
					alt={renderInlineAsPlainText(node.children)}
					href={node.target.url}
					title={node.target.title || undefined}
				/>
			);
		case "underline":
		case "superscript":
		case "subscript":
		case "small-caps":
		case "quoted":
		case "cite":
		case "math":
		case "raw-inline":
		case "note":
		case "span":
			throw new UnsupportedConstructError(node.type, "react");
	}
}

function toCellAlign(align: Alignment): CellAlign {
	return align === "default" ? undefined : align;
}

function toHeadingLevel(level: number): HeadingLevel {
	if (level <= 1) return 1;
	if (level === 2) return 2;
	if (level === 3) return 3;
	if (level === 4) return 4;
	if (level === 5) return 5;
	return 6;
}

function DefaultTable({
	head,
	body,
}: {
	head: { cells: TableCellProps[] };
	body: { rows: { cells: TableCellProps[] }[] };
}) {
	return (
		<table>
			<thead>
				<tr>
					{head.cells.map((cell, index) => (
						<th align={cell.align} key={index}>
							{cell.children}
						</th>
					))}
				</tr>
			</thead>
			<tbody>
				{body.rows.map((row, index) => (
					<tr key={index}>
						{row.cells.map((cell, index) => (
							<td align={cell.align} key={index}>
								{cell.children}
							</td>
						))}
					</tr>
				))}
			</tbody>
		</table>
	);
}

function DefaultCodeBlock({ content, language }: { content: string; language?: string }) {
	return (
		<pre>
			<code className={language === undefined ? undefined : `language-${language}`}>
				{content}
			</code>
		</pre>
	);
}

function DefaultBlockquote({ children }: { children: ReactNode }) {
	return <blockquote>{children}</blockquote>;
}

function DefaultList(
	props:
		| { type: "ordered"; items: { children: ReactNode }[]; start: number }
		| { type: "unordered"; items: { children: ReactNode }[] },
) {
	if (props.type === "ordered") {
		return (
			<ol start={props.start === 1 ? undefined : props.start}>
				{props.items.map((item, index) => (
					<li key={index}>{item.children}</li>
				))}
			</ol>
		);
	}

	return (
		<ul>
			{props.items.map((item, index) => (
				<li key={index}>{item.children}</li>
			))}
		</ul>
	);
}

function DefaultHeading({ level, children }: { level: HeadingLevel; children: ReactNode }) {
	const Heading = `h${level}` as const;
	return <Heading>{children}</Heading>;
}

function DefaultParagraph({ children }: { children: ReactNode }) {
	return <p>{children}</p>;
}

function DefaultThematicBreak() {
	return <hr />;
}

function DefaultText({ text }: { text: string }) {
	return text;
}

function DefaultCodeSpan({ text }: { text: string }) {
	return <code>{text}</code>;
}

function DefaultHardBreak() {
	return <br />;
}

function DefaultSoftBreak() {
	return "\n";
}

function DefaultEmphasis({ children }: { children: ReactNode }) {
	return <em>{children}</em>;
}

function DefaultStrong({ children }: { children: ReactNode }) {
	return <strong>{children}</strong>;
}

function DefaultStrikethrough({ children }: { children: ReactNode }) {
	return <del>{children}</del>;
}

function DefaultLink({
	href,
	title,
	children,
}: {
	href: string;
	title?: string;
	children: ReactNode;
}) {
	return (
		<a href={isValidUrl(href) ? href : undefined} title={title}>
			{children}
		</a>
	);
}

function DefaultImage({ href, title, alt }: { href: string; title?: string; alt: string }) {
	return <img alt={alt} src={isValidUrl(href) ? href : undefined} title={title} />;
}

/**
 * Rejects URLs with a script-capable protocol (vbscript:, javascript:, file:, data:), except data: URLs of the image
 * types browsers render safely (gif, png, jpeg, webp).
 */
export function isValidUrl(url: string): boolean {
	const normalized = url.trim().toLowerCase();
	return /^(vbscript|javascript|file|data):/.test(normalized)
		? /^data:image\/(gif|png|jpeg|webp);/.test(normalized)
		: true;
}

/**
 * Flattens inline content to the text a screen reader would announce, for image descriptions.
 */
export function renderInlineAsPlainText(nodes: Inline[]): string {
	let result = "";
	for (const node of nodes) {
		switch (node.type) {
			case "str":
			case "code":
				result += node.text;
				break;
			case "space":
				result += " ";
				break;
			case "soft-break":
			case "line-break":
				result += "\n";
				break;
			case "emphasis":
			case "strong":
			case "strikeout":
			case "link":
			case "image":
				result += renderInlineAsPlainText(node.children);
				break;
			default:
				break;
		}
	}
	return result;
}
