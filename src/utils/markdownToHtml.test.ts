import { afterEach, describe, expect, it, vi } from "vitest";
import { createMarkdownRenderer, markdownToHtml, renderAnchor } from "./markdownToHtml";
import { sanitizeUrl } from "./safeUrl";

describe("createMarkdownRenderer", () => {
  const render = createMarkdownRenderer();

  it("escapes safe link targets for the attribute", () => {
    expect(render("[docs](https://example.com/a?b=1&c=2)")).toBe(
      '<p><a href="https://example.com/a?b=1&amp;c=2">docs</a></p>\n'
    );
  });

  it("keeps link titles", () => {
    expect(render('[home](/x "Home")')).toBe('<p><a href="/x" title="Home">home</a></p>\n');
  });

  it("replaces script links with the placeholder", () => {
    expect(render("[click](javascript:evil)")).toBe(
      '<p><a href="about:invalid#zSafeHrefz">click</a></p>\n'
    );
  });

  it("sanitizes image sources", () => {
    expect(render("![logo](data:image/png;base64,iVBORw0KGgo=)")).toBe(
      '<p><img src="data:image/png;base64,iVBORw0KGgo=" alt="logo"></p>\n'
    );
    expect(render("![x](data:text/html;base64,AAAA)")).toBe(
      '<p><img src="about:invalid#zSafeHrefz" alt="x"></p>\n'
    );
  });

  it("keeps query separators in autolinks escaped once", () => {
    expect(render("<https://a.com/?x=1&y=2>")).toBe(
      '<p><a href="https://a.com/?x=1&amp;y=2">https://a.com/?x=1&amp;y=2</a></p>\n'
    );
  });

  it("sanitizes reference-style links", () => {
    expect(render("[docs][ref]\n\n[ref]: javascript:evil")).toBe(
      '<p><a href="about:invalid#zSafeHrefz">docs</a></p>\n'
    );
    expect(render("[docs][ref]\n\n[ref]: /guide")).toBe('<p><a href="/guide">docs</a></p>\n');
  });

  it("escapes raw inline HTML", () => {
    expect(render('<a href="javascript:alert(1)">x</a>')).toBe(
      "<p>&lt;a href=&quot;javascript:alert(1)&quot;&gt;x&lt;/a&gt;</p>\n"
    );
    expect(render("hi <img src=x onerror=alert(1)>")).toBe(
      "<p>hi &lt;img src=x onerror=alert(1)&gt;</p>\n"
    );
  });

  it("escapes raw block HTML", () => {
    expect(render('<div onclick="run()">hi</div>').trim()).toBe(
      "&lt;div onclick=&quot;run()&quot;&gt;hi&lt;/div&gt;"
    );
  });

  it("reports rejected URLs", () => {
    const onUnsafeUrl = vi.fn();
    createMarkdownRenderer({ onUnsafeUrl })("[a](vbscript:run) and [b](/ok)");

    expect(onUnsafeUrl).toHaveBeenCalledTimes(1);
    expect(onUnsafeUrl).toHaveBeenCalledWith("vbscript:run");
  });
});

describe("markdownToHtml", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs blocked URLs", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(markdownToHtml("[x](javascript:evil)")).toBe(
      '<p><a href="about:invalid#zSafeHrefz">x</a></p>\n'
    );
    expect(warn).toHaveBeenCalledWith("Blocked unsafe URL:", "javascript:evil");
  });
});

describe("renderAnchor", () => {
  it("escapes both the URL and the label", () => {
    expect(renderAnchor(sanitizeUrl('/search?q="x"&y'), "<b>")).toBe(
      '<a href="/search?q=&quot;x&quot;&amp;y">&lt;b&gt;</a>'
    );
  });

  it("renders the placeholder for rejected input", () => {
    expect(renderAnchor(sanitizeUrl("javascript:alert(1)"), "run")).toBe(
      '<a href="about:invalid#zSafeHrefz">run</a>'
    );
  });
});
