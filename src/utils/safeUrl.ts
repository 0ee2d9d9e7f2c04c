/**
 * Sanitized URLs for hyperlink contexts (`href`, `src` of images and media).
 *
 * A `SafeUrl` will not cause script execution when evaluated as a hyperlink.
 * It says nothing about the resource it points to, so it is not fit for places
 * where that resource runs as code (a script `src`). Its value is not
 * HTML-escaped: callers still escape it for the attribute it lands in.
 */

import type { SanitizeUrlOptions } from "@/types";
import { DATA_URL_PATTERN, SAFE_MIME_TYPE_PATTERN, SAFE_URL_PATTERN } from "./urlPatterns";

/**
 * Substitute for rejected input. `about:invalid` references a non-existent
 * document; the fragment is ignored when resolving it.
 */
export const INNOCUOUS_URL = "about:invalid#zSafeHrefz";

// A-Z only; non-ASCII letters such as U+212A KELVIN SIGN stay as they are
function toAsciiLowerCase(str: string): string {
  return str.replace(/[A-Z]+/g, (run) => run.toLowerCase());
}

/** Matches `url` against the scheme allowlist and the data URL media types. */
export function isSafeUrl(url: string): boolean {
  const lower = toAsciiLowerCase(url);
  if (SAFE_URL_PATTERN.test(lower)) {
    return true;
  }
  const match = DATA_URL_PATTERN.exec(lower);
  return match !== null && SAFE_MIME_TYPE_PATTERN.test(match[1]);
}

export class SafeUrl {
  readonly #value: string;

  private constructor(value: string) {
    this.#value = value;
    Object.freeze(this);
  }

  static readonly #innocuous = new SafeUrl(INNOCUOUS_URL);

  static innocuous(): SafeUrl {
    return SafeUrl.#innocuous;
  }

  static sanitize(url: string, options: SanitizeUrlOptions = {}): SafeUrl {
    if (isSafeUrl(url)) {
      return new SafeUrl(url);
    }
    options.onUnsafeUrl?.(url);
    return SafeUrl.#innocuous;
  }

  toString(): string {
    return this.#value;
  }

  toJSON(): string {
    return this.#value;
  }
}

export const INNOCUOUS_SAFE_URL = SafeUrl.innocuous();

/**
 * Returns `url` wrapped as a `SafeUrl` when it is an http, https, mailto or ftp
 * URL, a relative URL, or a base64 data URL with an allowed audio, image or
 * video type. Anything else yields `INNOCUOUS_URL`.
 *
 * No percent-decoding or UTF-8 validation is done.
 */
export function sanitizeUrl(url: string, options?: SanitizeUrlOptions): SafeUrl {
  return SafeUrl.sanitize(url, options);
}

export function isSafeUrlValue(value: unknown): value is SafeUrl {
  return value instanceof SafeUrl;
}
