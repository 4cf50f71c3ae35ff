export {
	type DocumentReader,
	type DocumentWriter,
	ReaderMap,
	UnknownFormatError,
	WriterMap,
	convert,
	createReaderMap,
	createWriterMap,
	readers,
	writers,
} from "./formats";
export { LatexWriter, escapeLatex } from "./latex-writer";
export { TypstWriter, escapeTypst } from "./typst-writer";
export * from "./native-format";
export { NativeWriter, toNative, writeNative } from "./native-writer";
export { NativeReadError, NativeReader, fromNative, readNative } from "./native-reader";
