/**
 * @deadwood/syntax
 * Parsing and source discovery for the analysis engine.
 */

export {
  type SyntaxNode,
  type SyntaxTree,
  type Location,
  type Span,
  type LanguageId,
  type Language,
  type ParseError,
  SOURCE_EXTENSIONS,
  detectLanguage,
} from "./core/model.js";

export type { Parser, ParsedSource } from "./core/ports/Parser.js";
export type { ProjectScanner, ScanOptions } from "./core/ports/ProjectScanner.js";
export type { FileSystem } from "./core/ports/FileSystem.js";
export type { FileWatcher, FileWatchCallback, FileWatchEvent } from "./core/ports/FileWatcher.js";

export { TreeSitterParser } from "./infrastructure/parsers/TreeSitterParser.js";
export { extractErrors } from "./infrastructure/parsers/diagnostics.js";
export { nodeToSpan, staticStringValue, fieldText, walk } from "./infrastructure/parsers/nodes.js";
export { NodeProjectScanner } from "./infrastructure/scanner/NodeProjectScanner.js";
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { NodeFileWatcher } from "./infrastructure/watcher/NodeFileWatcher.js";
