import { decodeHTML } from "entities";

/**
 * Decodes character references in marker content: the full HTML named set
 * (`&nbsp;`, `&eacute;`, ...) plus decimal and hex references. Unknown names
 * are left as written.
 */
export function decodeEntities(text: string): string {
  if (!text.includes("&")) return text;
  return decodeHTML(text);
}

export function escapeEntities(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
