/**
 * Markdown-to-HTML rendering with sanitized link targets.
 *
 * Uses `marked` for CommonMark + GFM. Every link `href` and image `src` goes
 * through `sanitizeUrl` and is then attribute-escaped, so markdown such as
 * `[x](javascript:...)` renders as a link to the innocuous placeholder. Raw
 * inline and block HTML is escaped and shows up as text.
 */

import { Marked } from "marked";
import type { MarkdownRendererOptions } from "@/types";
import { escapeHtml, unescapeHtml } from "./escapeHtml";
import { SafeUrl, sanitizeUrl } from "./safeUrl";

// ── Attribute helpers ────────────────────────────────────────────

// marked hands titles over already escaped
function titleAttr(title: string | null | undefined): string {
  return title ? ` title="${title}"` : "";
}

function hrefAttr(url: SafeUrl): string {
  return escapeHtml(url.toString());
}

/** `<a href="…">label</a>` from a URL that has already been sanitized. */
export function renderAnchor(href: SafeUrl, label: string): string {
  return `<a href="${hrefAttr(href)}">${escapeHtml(label)}</a>`;
}

// ── Renderer factory ─────────────────────────────────────────────

export function createMarkdownRenderer(
  options: MarkdownRendererOptions = {}
): (md: string) => string {
  const sanitizeOptions = { onUnsafeUrl: options.onUnsafeUrl };

  const marked = new Marked({
    gfm: true,
    breaks: options.breaks ?? false,
    renderer: {
      link(href: string, title: string | null | undefined, text: string) {
        // autolink hrefs arrive entity-escaped
        const url = sanitizeUrl(unescapeHtml(href), sanitizeOptions);
        return `<a href="${hrefAttr(url)}"${titleAttr(title)}>${text}</a>`;
      },
      image(href: string, title: string | null, text: string) {
        const url = sanitizeUrl(href, sanitizeOptions);
        return `<img src="${hrefAttr(url)}" alt="${text}"${titleAttr(title)}>`;
      },
      html(html: string) {
        return escapeHtml(html);
      },
    },
  });

  return (md: string) => {
    const result = marked.parse(md);
    // synchronous: no async extensions are registered
    return typeof result === "string" ? result : "";
  };
}

// ── Default instance ─────────────────────────────────────────────

export const markdownToHtml = createMarkdownRenderer({
  onUnsafeUrl: (rejected) => console.warn("Blocked unsafe URL:", rejected),
});
