/**
 * Core domain types for the syntax package.
 */

import type TreeSitter from "tree-sitter";

export type SyntaxNode = TreeSitter.SyntaxNode;
export type SyntaxTree = TreeSitter.Tree;

export interface Location {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
  /** 0-indexed byte offset from start of file */
  offset: number;
}

export interface Span {
  start: Location;
  end: Location;
}

export type LanguageId = "typescript" | "tsx" | "javascript";

export interface Language {
  id: LanguageId;
  name: string;
  extensions: string[];
}

export const LANGUAGES: Record<LanguageId, Language> = {
  typescript: {
    id: "typescript",
    name: "TypeScript",
    extensions: [".ts", ".mts", ".cts"],
  },
  tsx: {
    id: "tsx",
    name: "TypeScript JSX",
    extensions: [".tsx"],
  },
  javascript: {
    id: "javascript",
    name: "JavaScript",
    extensions: [".js", ".jsx", ".mjs", ".cjs"],
  },
};

/** Every extension some grammar can parse, in resolution preference order. */
export const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];

/**
 * Detect language from file path extension. Declaration files are not source.
 */
export function detectLanguage(filePath: string): Language | undefined {
  const lower = filePath.toLowerCase();
  if (/\.d\.[mc]?ts$/.test(lower)) {
    return undefined;
  }
  const ext = lower.slice(lower.lastIndexOf("."));
  return Object.values(LANGUAGES).find((lang) => lang.extensions.includes(ext));
}

/**
 * A syntax fault inside an otherwise usable tree.
 */
export interface ParseError {
  message: string;
  span: Span;
}
