/**
 * Flattened text view of a parsed subtree
 */

import type { AnyNode } from "domhandler";
import { hasChildren, isTag, isText } from "domhandler";

const NON_RENDERED_TAGS = new Set(["script", "style", "template"]);

/**
 * Trimmed, non-empty text lines under `node`, in document order
 *
 * A text node spanning several source lines yields one entry per line.
 * Comments (including conditional-comment markup) are not text and are
 * skipped; raw pattern search covers those.
 */
export function collectTextLines(node: AnyNode): string[] {
  const lines: string[] = [];
  appendTextLines(node, lines);
  return lines;
}

function appendTextLines(node: AnyNode, lines: string[]): void {
  if (isText(node)) {
    for (const rawLine of node.data.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line) {
        lines.push(line);
      }
    }
    return;
  }

  if (isTag(node) && NON_RENDERED_TAGS.has(node.name)) {
    return;
  }

  if (hasChildren(node)) {
    for (const child of node.children) {
      appendTextLines(child, lines);
    }
  }
}
