export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

// Keeps inlined CSS/JS from closing its own <style> or <script> element.
export function escapeInlineBlock(source: string): string {
  return source.replace(/<\/(script|style)/gi, "<\\/$1");
}
