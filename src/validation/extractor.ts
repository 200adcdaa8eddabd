/**
 * Code extraction from free-form model output
 */

/**
 * First fenced block, optionally tagged `java`. Only the first fence counts.
 */
const FENCED_BLOCK_REGEX = /```(?:java)?\s*\n?([\s\S]*?)\n?```/i;

/**
 * Unfenced replies are accepted only when they open like a Java source file
 */
const BARE_CODE_START_REGEX = /^(?:public\s+class\b|import\s)/;

/**
 * Extract the most plausible code fragment from model output.
 *
 * Returns the trimmed interior of the first fenced block. Without a fence,
 * the whole trimmed text is returned when its first line starts with
 * `public class` or an import statement. Returns `""` when neither applies.
 */
export function extractCode(text: string): string {
  const fenced = FENCED_BLOCK_REGEX.exec(text);
  if (fenced) {
    return (fenced[1] ?? "").trim();
  }

  const trimmed = text.trim();
  const firstLine = trimmed.split("\n")[0] ?? "";
  if (BARE_CODE_START_REGEX.test(firstLine)) {
    return trimmed;
  }

  return "";
}
