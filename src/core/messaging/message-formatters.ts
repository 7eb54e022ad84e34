/**
 * Converts markdown text to WhatsApp-friendly format
 * @param markdown The markdown text to convert
 * @returns WhatsApp-friendly formatted text
 */
export function markdownToWhatsApp(markdown: string): string {
  let text = markdown;

  // Convert strikethrough first
  text = text.replace(/~~([^~]+?)~~/g, '~$1~');

  // Bold (double markers and headers) goes through placeholders so the italic pass leaves it alone
  text = text.replace(/\*\*([^*]+?)\*\*/g, '§BOLD§$1§/BOLD§');
  text = text.replace(/__([^_]+?)__/g, '§BOLD§$1§/BOLD§');
  text = text.replace(/^#{1,6}\s+(.+)$/gm, '§BOLD§$1§/BOLD§');

  // Lists before italics, or a "* " bullet pairs with the next single marker
  text = text.replace(/^[ \t]*[-*+]\s+(.+)$/gm, '• $1');
  text = text.replace(/^[ \t]*(\d+)\.\s+(.+)$/gm, '$1. $2');

  // Convert italic (single markers)
  text = text.replace(/\*([^*\n]+?)\*/g, '_$1_');

  text = text.replace(/§BOLD§/g, '*');
  text = text.replace(/§\/BOLD§/g, '*');

  // Clean up markdown artifacts
  text = text.replace(/^\s*>\s+(.+)$/gm, '$1');
  text = text.replace(/\[([^\]]+)\]\(([^)]+)\)/g, '$1 ($2)');
  text = text.replace(/\n{3,}/g, '\n\n');

  return text.trim();
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Splits a message into chunks of at most `maxLength` characters.
 * A chunk ends at the last newline before the limit when there is one,
 * otherwise it is cut hard at the limit. Blank chunks are dropped.
 */
export function splitMessageByLength(message: string, maxLength: number = 1500): string[] {
  if (maxLength < 1) {
    throw new RangeError(`maxLength must be positive, got ${maxLength}`);
  }

  const parts: string[] = [];
  let rest = message;
  while (rest.length > maxLength) {
    const newline = rest.lastIndexOf('\n', maxLength);
    let cut = newline > 0 ? newline : maxLength;
    if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) {
      // Keep surrogate pairs (emoji) in one chunk
      cut -= 1;
    }
    parts.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  parts.push(rest);

  return parts
    .map(part => part.trim())
    .filter(part => part.length > 0);
}
