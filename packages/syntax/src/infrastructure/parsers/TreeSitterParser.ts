import { Err, Ok, type Result, toError } from "@deadwood/core";
import Parser from "tree-sitter";

import { type Language, type LanguageId, detectLanguage } from "../../core/model.js";
import type { ParsedSource, Parser as ParserPort } from "../../core/ports/Parser.js";
import { extractErrors } from "./diagnostics.js";

// Tree-sitter language objects are opaque to us
type TreeSitterLanguage = unknown;

type GrammarLoader = () => Promise<TreeSitterLanguage>;

const GRAMMAR_LOADERS: Record<LanguageId, GrammarLoader> = {
  typescript: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.typescript;
  },
  tsx: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.tsx;
  },
  javascript: async () => {
    const mod = await import("tree-sitter-javascript");
    return mod.default;
  },
};

/**
 * Tree-sitter based parser implementation.
 * One native parser per instance; parsing is synchronous, so concurrent
 * callers never observe a half-switched language.
 */
export class TreeSitterParser implements ParserPort {
  private readonly parser: Parser;
  private readonly loadedGrammars = new Map<LanguageId, TreeSitterLanguage>();

  constructor() {
    this.parser = new Parser();
  }

  async parse(source: string, filePath: string): Promise<Result<ParsedSource, Error>> {
    const language = this.detectLanguage(filePath);
    if (!language) {
      return Err(new Error(`Unsupported file type: ${filePath}`));
    }

    try {
      const grammar = await this.getGrammar(language.id);
      this.parser.setLanguage(grammar);
      // the default 32 KiB input buffer rejects larger files
      const tree = this.parser.parse(source, undefined, {
        bufferSize: Math.max(32 * 1024, source.length * 2),
      });

      return Ok({
        filePath,
        language,
        tree,
        errors: extractErrors(tree.rootNode),
      });
    } catch (error) {
      return Err(toError(error));
    }
  }

  detectLanguage(filePath: string): Language | undefined {
    return detectLanguage(filePath);
  }

  private async getGrammar(languageId: LanguageId): Promise<TreeSitterLanguage> {
    const cached = this.loadedGrammars.get(languageId);
    if (cached) return cached;

    const grammar = await GRAMMAR_LOADERS[languageId]();
    this.loadedGrammars.set(languageId, grammar);
    return grammar;
  }
}
