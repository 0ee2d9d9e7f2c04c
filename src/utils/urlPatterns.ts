/**
 * Matchers used by the URL sanitizer. All of them run against the lowercased
 * input and carry no `g`/`y` flag, so sharing them keeps no `lastIndex` state.
 */

/**
 * (a) An allowlisted scheme: http, https, mailto, ftp; or
 * (b) no scheme at all: the first `:` may only appear after one of `/ ? #`,
 *     which puts it in the authority, path, query or fragment.
 */
export const SAFE_URL_PATTERN = /^(?:(?:https?|mailto|ftp):|[^:/?#]*(?:[/?#]|$))/;

/**
 * Base64 data URL (RFC 2397). Group 1 is the media type. Media types with
 * parameters (`text/plain;charset=utf-8`) never match.
 */
export const DATA_URL_PATTERN = /^data:([^;,]*);base64,[a-z0-9+/]+=*$/;

const SAFE_AUDIO_TYPES = [
  "3gpp2",
  "3gpp",
  "aac",
  "midi",
  "mp3",
  "mp4",
  "mpeg",
  "oga",
  "ogg",
  "opus",
  "x-m4a",
  "x-matroska",
  "x-wav",
  "wav",
  "webm",
];
const SAFE_IMAGE_TYPES = ["bmp", "gif", "jpeg", "jpg", "png", "tiff", "webp", "x-icon"];
const SAFE_VIDEO_TYPES = ["mpeg", "mp4", "ogg", "webm", "x-matroska"];

/** MIME types allowed inside a data URL. */
export const SAFE_MIME_TYPE_PATTERN = new RegExp(
  `^(?:audio/(?:${SAFE_AUDIO_TYPES.join("|")})` +
    `|image/(?:${SAFE_IMAGE_TYPES.join("|")})` +
    `|video/(?:${SAFE_VIDEO_TYPES.join("|")}))$`
);
