import * as path from "node:path";

export const DEFAULT_MIME_TYPE = "application/octet-stream";
export const DEFAULT_JS_MIME_TYPE = "application/javascript";

const MIME_TYPES: Record<string, string> = {
  // Text
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".js": DEFAULT_JS_MIME_TYPE,
  ".txt": "text/plain",
  ".json": "application/json",
  ".xml": "application/xml",

  // Images
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".ico": "image/x-icon",
  ".webp": "image/webp",

  // Fonts
  ".woff": "font/woff",
  ".woff2": "font/woff2",

  // Media
  ".mp3": "audio/mpeg",
  ".mp4": "video/mp4",
  ".swf": "application/x-shockwave-flash",

  // Misc
  ".pdf": "application/pdf",
  ".wasm": "application/wasm",
};

export type MimeTypeLookup = (filePath: string) => string;

/**
 * Build the extension lookup used for `Content-Type`. `overrides` take
 * precedence over the built-in table, keyed by extension with its dot.
 */
export function createMimeTypeLookup(
  overrides: Record<string, string> = {},
): MimeTypeLookup {
  const table: Record<string, string> = { ...MIME_TYPES };
  for (const [ext, type] of Object.entries(overrides)) {
    table[ext.toLowerCase()] = type;
  }
  return (filePath) =>
    table[path.extname(filePath).toLowerCase()] ?? DEFAULT_MIME_TYPE;
}

export const getMimeType: MimeTypeLookup = createMimeTypeLookup();
