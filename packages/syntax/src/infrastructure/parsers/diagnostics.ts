import type { ParseError, SyntaxNode } from "../../core/model.js";
import { nodeToSpan } from "./nodes.js";

/**
 * Collect ERROR and missing nodes. Subtrees of an ERROR node are not
 * searched again, so one fault produces one entry.
 */
export function extractErrors(root: SyntaxNode): ParseError[] {
  const errors: ParseError[] = [];
  const stack: SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.isMissing) {
      errors.push({ message: `Missing ${node.type}`, span: nodeToSpan(node) });
      continue;
    }
    if (node.type === "ERROR") {
      const snippet = node.text.split("\n")[0].slice(0, 40);
      errors.push({ message: `Unexpected syntax near "${snippet}"`, span: nodeToSpan(node) });
      continue;
    }
    stack.push(...node.children);
  }

  errors.sort((a, b) => a.span.start.offset - b.span.start.offset);
  return errors;
}
