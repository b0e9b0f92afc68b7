/**
 * Small helpers over tree-sitter nodes shared by every extractor.
 */
import type { Span, SyntaxNode } from "../../core/model.js";

export function nodeToSpan(node: SyntaxNode): Span {
  return {
    start: {
      line: node.startPosition.row + 1,
      column: node.startPosition.column + 1,
      offset: node.startIndex,
    },
    end: {
      line: node.endPosition.row + 1,
      column: node.endPosition.column + 1,
      offset: node.endIndex,
    },
  };
}

/**
 * Value of a string literal, or of a template literal without substitutions.
 * Anything computed returns undefined.
 */
export function staticStringValue(node: SyntaxNode | null | undefined): string | undefined {
  if (!node) return undefined;

  if (node.type === "string") {
    // string_fragment and escape_sequence children; quotes are anonymous
    return node.namedChildren.map((part) => unescapePart(part)).join("");
  }
  if (node.type === "template_string") {
    if (node.namedChildren.some((part) => part.type === "template_substitution")) {
      return undefined;
    }
    return node.text.slice(1, -1);
  }
  return undefined;
}

function unescapePart(part: SyntaxNode): string {
  if (part.type !== "escape_sequence") {
    return part.text;
  }
  const escaped = part.text.slice(1);
  switch (escaped) {
    case "n":
      return "\n";
    case "t":
      return "\t";
    default:
      return escaped;
  }
}

/**
 * Text of a named field, if present.
 */
export function fieldText(node: SyntaxNode, field: string): string | undefined {
  return node.childForFieldName(field)?.text;
}

/**
 * Depth-first pre-order walk. Returning false from the visitor skips the
 * node's children.
 */
export function walk(root: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (visit(node) === false) continue;
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
  }
}
