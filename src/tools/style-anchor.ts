/**
 * Appends the house illustration style to an image prompt so every scene of a
 * video shares one look. The anchor is skipped when the prompt already contains
 * the anchor's first keyword.
 */
export function applyStyleAnchor(prompt: string, anchor: string): string {
  const trimmed = prompt.trim();
  const style = anchor.trim();

  if (!style) {
    return trimmed;
  }
  if (!trimmed) {
    console.warn("[style-anchor] Empty image prompt, using style anchor alone");
    return style;
  }

  const firstKeyword = style.split(",")[0].trim().toLowerCase();
  if (firstKeyword && trimmed.toLowerCase().includes(firstKeyword)) {
    return trimmed;
  }

  const separator = trimmed.endsWith(",") ? " " : ", ";
  return trimmed + separator + style;
}
