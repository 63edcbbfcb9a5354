const FENCE = /```[^\n`]*\n([\s\S]*?)```/;
const INLINE_FENCE = /```([^`\n]+)```/;
const PROMPT_PREFIX = /^(?:\$|>|%)\s+/;

/**
 * Pulls a single command line out of free-text model output.
 *
 * The first fenced block wins (its first non-empty line); otherwise the first
 * non-empty line of the text. Shell prompt markers and wrapping backticks are
 * removed. Returns an empty string when nothing usable is left.
 */
export function extractCommand(text: string): string {
  const normalized = text.replace(/\r\n/g, '\n');
  const fenced = FENCE.exec(normalized) ?? INLINE_FENCE.exec(normalized);
  const source = fenced ? fenced[1] : normalized.replace(/```[^\n`]*/g, '');
  const line = source
    .split('\n')
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  if (!line) {
    return '';
  }
  return cleanLine(line);
}

function cleanLine(line: string): string {
  let result = line.replace(PROMPT_PREFIX, '');
  const inline = /^`([^`]+)`$/.exec(result);
  if (inline) {
    result = inline[1];
  }
  return result.trim();
}
