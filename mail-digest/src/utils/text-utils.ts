/**
 * Text Utils - helpers for preparing email text for the completion API
 */

export const TRUNCATION_MARKER = '[Email truncated...]';

/**
 * Cut text to a maximum length, appending a marker when something was dropped
 *
 * @example
 * truncateText('abcdef', 3) // "abc\n\n[Email truncated...]"
 */
export function truncateText(text: string, maxChars: number, marker: string = TRUNCATION_MARKER): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n\n${marker}`;
}

/**
 * Split long text into word chunks of at most `maxChunkChars`, each chunk
 * repeating the last `overlapWords` words of the previous one.
 * A single word longer than the limit becomes its own chunk.
 */
export function chunkText(text: string, maxChunkChars: number = 1500, overlapWords: number = 50): string[] {
  if (text.length <= maxChunkChars) return [text];

  const words = text.split(/\s+/).filter(w => w.length > 0);
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const word of words) {
    const nextLength = currentLength + word.length + 1;

    if (nextLength > maxChunkChars && current.length > 0) {
      chunks.push(current.join(' '));
      current = current.slice(Math.max(0, current.length - overlapWords));
      currentLength = current.reduce((sum, w) => sum + w.length + 1, 0);

      // Overlap alone must not push the next chunk over the limit
      while (current.length > 0 && currentLength + word.length + 1 > maxChunkChars) {
        const dropped = current.shift();
        currentLength -= (dropped?.length ?? 0) + 1;
      }
    }

    current.push(word);
    currentLength += word.length + 1;
  }

  if (current.length > 0) {
    chunks.push(current.join(' '));
  }

  return chunks;
}

/**
 * Remove markdown formatting from LLM response
 * Keeps plain text and bullet markers
 */
export function sanitizeMarkdown(text: string): string {
  return text
    // Remove bold **text** ([\s\S] matches newlines too)
    .replace(/\*\*([\s\S]*?)\*\*/g, '$1')
    // Remove italic *text* (but not ** and not "* " bullets)
    .replace(/(?<![*\w])\*([^*\s][^*\n]*?)\*(?!\*)/g, '$1')
    // Remove headers # ## ### at start of line
    .replace(/^#{1,6}\s+/gm, '');
}

/**
 * Replace `{{name}}` placeholders in a prompt template
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) => values[name] ?? placeholder);
}
