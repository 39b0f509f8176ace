import sanitizeHtml from "sanitize-html";

// No tags survive; script and style bodies are dropped with their tags.
const PLAIN_TEXT: sanitizeHtml.IOptions = { allowedTags: [], allowedAttributes: {} };

/** Reduces user input to escaped plain text. */
export function sanitizeText(text: string): string {
  return sanitizeHtml(text, PLAIN_TEXT).trim();
}

export function sanitizeList(items: string[]): string[] {
  return items.map(sanitizeText).filter((item) => item.length > 0);
}
