/**
 * OpenRouter returns message content as a string, a single part or a list of
 * parts depending on the upstream provider. Only text survives.
 */
type TextPart = { readonly text?: unknown };

function isTextPart(value: unknown): value is TextPart {
  return typeof value === "object" && value !== null && "text" in value;
}

function partText(part: unknown): string {
  if (typeof part === "string") return part;
  if (isTextPart(part) && part.text != null) return String(part.text);
  return "";
}

export function messageText(content: unknown): string {
  if (content == null) {
    return "";
  }
  if (Array.isArray(content)) {
    return content.map(partText).join("");
  }
  if (typeof content === "object") {
    return partText(content);
  }
  return String(content);
}
