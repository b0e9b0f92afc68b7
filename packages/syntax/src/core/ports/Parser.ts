import type { Result } from "@deadwood/core";

import type { Language, ParseError, SyntaxTree } from "../model.js";

export interface ParsedSource {
  filePath: string;
  language: Language;
  tree: SyntaxTree;
  /** Faults the grammar recovered from; the tree is still usable around them */
  errors: ParseError[];
}

/**
 * Port for turning source text into a syntax tree.
 */
export interface Parser {
  /**
   * Parse source code. Fails only when the file cannot be parsed at all
   * (unsupported extension, grammar failure); syntax faults are reported
   * in `errors` alongside a best-effort tree.
   */
  parse(source: string, filePath: string): Promise<Result<ParsedSource, Error>>;

  detectLanguage(filePath: string): Language | undefined;
}
