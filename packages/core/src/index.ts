export * from "./types/document";
export * from "./metadata/MetadataExtractor";
export * from "./assets/AssetDeduplicator";
export * from "./rewriter/ReferenceRewriter";
export * from "./renderer/markdown";
export * from "./renderer/template";
export * from "./renderer/DocumentRenderer";
export * from "./composer/IndexComposer";
export * from "./assembler/corpus";
export * from "./assembler/CorpusAssembler";
export * from "./config/SiteConfig";
export * from "./converter/convertFile";
export * from "./converter/HtmlImporter";
export * from "./utils/err";
export * from "./utils/logger";
export { escapeHtml, fillTemplate, formatLongDate, NO_DATE } from "./utils/html";
