export type { MarkdownRendererOptions, SanitizeUrlOptions, UnsafeUrlHandler } from "./types";
export { escapeHtml, unescapeHtml } from "./utils/escapeHtml";
export { createMarkdownRenderer, markdownToHtml, renderAnchor } from "./utils/markdownToHtml";
export {
  INNOCUOUS_SAFE_URL,
  INNOCUOUS_URL,
  SafeUrl,
  isSafeUrl,
  isSafeUrlValue,
  sanitizeUrl,
} from "./utils/safeUrl";
