/**
 * Markdown task-list helpers for /checkbox and /checkbox-issue.
 */

const UNCHECKED = "[ ]";
const CHECKED = "[x]";

export function countUncheckedBoxes(text: string): number {
  return text.split(UNCHECKED).length - 1;
}

/**
 * Tick every unchecked box in `text`.
 */
export function tickAllCheckboxes(text: string): { text: string; count: number } {
  const count = countUncheckedBoxes(text);
  if (count === 0) {
    return { text, count };
  }
  return { text: text.split(UNCHECKED).join(CHECKED), count };
}
