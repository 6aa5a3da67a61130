import { type MediaFormat, SNIFF_BYTES, UnsupportedFormatError } from "@mediasift/utils";

export type ClassificationSource = "signature" | "extension" | "none";

export interface Classification {
  format: MediaFormat;
  mime: string;
  source: ClassificationSource;
}

interface Signature {
  format: Exclude<MediaFormat, "unknown">;
  mime: string;
  match(bytes: Uint8Array): boolean;
}

const XML_EXTS = new Set(["xml", "xsl", "xslt", "svg", "rss", "atom", "xhtml", "kml", "gpx"]);
const AUDIO_CONTAINER_EXTS = new Set(["m4a", "m4b", "aac", "oga", "opus", "ogg", "weba"]);
const VIDEO_CONTAINER_EXTS = new Set(["mp4", "m4v", "mov", "ogv", "webm", "mkv", "3gp"]);

const MP4_AUDIO_BRANDS = new Set(["M4A ", "M4B ", "M4P ", "F4A "]);
const MP4_IMAGE_BRANDS = new Set(["heic", "heix", "mif1", "msf1", "avif", "avis"]);

function ascii(bytes: Uint8Array, start: number, length: number): string {
  if (bytes.length < start + length) return "";
  return String.fromCharCode(...bytes.subarray(start, start + length));
}

function startsWith(bytes: Uint8Array, prefix: readonly number[], offset = 0): boolean {
  if (bytes.length < offset + prefix.length) return false;
  return prefix.every((b, i) => bytes[offset + i] === b);
}

function riffType(bytes: Uint8Array): string | null {
  return ascii(bytes, 0, 4) === "RIFF" ? ascii(bytes, 8, 4) : null;
}

// Readers accept junk before the header as long as it sits within the first KiB.
function containsPdfHeader(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.subarray(0, 1024)).includes("%PDF-");
}

function isMpegFrameSync(bytes: Uint8Array): boolean {
  if (bytes.length < 2) return false;
  const first = bytes[0];
  const second = bytes[1];
  if (first === undefined || second === undefined) return false;
  // 11 sync bits, then a layer field that must not be the reserved 00.
  return first === 0xff && (second & 0xe0) === 0xe0 && (second & 0x06) !== 0;
}

/** Magic numbers at fixed offsets, checked in order; more specific signatures come first. */
const SIGNATURES: Signature[] = [
  { format: "pdf", mime: "application/pdf", match: (b) => ascii(b, 0, 5) === "%PDF-" },

  {
    format: "image",
    mime: "image/png",
    match: (b) => startsWith(b, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  },
  { format: "image", mime: "image/jpeg", match: (b) => startsWith(b, [0xff, 0xd8, 0xff]) },
  {
    format: "image",
    mime: "image/gif",
    match: (b) => ascii(b, 0, 6) === "GIF87a" || ascii(b, 0, 6) === "GIF89a",
  },
  { format: "image", mime: "image/webp", match: (b) => riffType(b) === "WEBP" },
  {
    format: "image",
    mime: "image/tiff",
    match: (b) =>
      startsWith(b, [0x49, 0x49, 0x2a, 0x00]) || startsWith(b, [0x4d, 0x4d, 0x00, 0x2a]),
  },
  {
    format: "image",
    mime: "image/bmp",
    // "BM" alone is too weak; the two reserved words after the size must be zero.
    match: (b) => ascii(b, 0, 2) === "BM" && b.length >= 26 && startsWith(b, [0, 0, 0, 0], 6),
  },

  { format: "audio", mime: "audio/wav", match: (b) => riffType(b) === "WAVE" },
  {
    format: "audio",
    mime: "audio/aiff",
    match: (b) => ascii(b, 0, 4) === "FORM" && ["AIFF", "AIFC"].includes(ascii(b, 8, 4)),
  },
  { format: "audio", mime: "audio/flac", match: (b) => ascii(b, 0, 4) === "fLaC" },
  { format: "audio", mime: "audio/mpeg", match: (b) => ascii(b, 0, 3) === "ID3" },
  { format: "audio", mime: "audio/mpeg", match: isMpegFrameSync },

  { format: "video", mime: "video/x-msvideo", match: (b) => riffType(b) === "AVI " },
  { format: "video", mime: "video/x-flv", match: (b) => ascii(b, 0, 3) === "FLV" },
  {
    format: "video",
    mime: "video/x-matroska",
    match: (b) => startsWith(b, [0x1a, 0x45, 0xdf, 0xa3]),
  },
];

function extensionOf(filename: string | null | undefined): string {
  if (!filename || !filename.includes(".")) return "";
  return (filename.split(".").pop() ?? "").toLowerCase();
}

function classifyIsoBmff(bytes: Uint8Array, ext: string): Classification | null {
  if (ascii(bytes, 4, 4) !== "ftyp") return null;
  const brand = ascii(bytes, 8, 4);
  if (MP4_AUDIO_BRANDS.has(brand)) return { format: "audio", mime: "audio/mp4", source: "signature" };
  if (MP4_IMAGE_BRANDS.has(brand)) {
    const mime = brand.startsWith("avi") ? "image/avif" : "image/heic";
    return { format: "image", mime, source: "signature" };
  }
  if (brand === "qt  ") return { format: "video", mime: "video/quicktime", source: "signature" };
  if (AUDIO_CONTAINER_EXTS.has(ext)) {
    return { format: "audio", mime: "audio/mp4", source: "extension" };
  }
  return { format: "video", mime: "video/mp4", source: "signature" };
}

function classifyOgg(bytes: Uint8Array, ext: string): Classification | null {
  if (ascii(bytes, 0, 4) !== "OggS") return null;
  // The first page carries the codec id of the first logical stream.
  const head = Buffer.from(bytes.subarray(0, 128));
  if (head.includes("theora")) return { format: "video", mime: "video/ogg", source: "signature" };
  if (VIDEO_CONTAINER_EXTS.has(ext)) return { format: "video", mime: "video/ogg", source: "extension" };
  return { format: "audio", mime: "audio/ogg", source: "signature" };
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

const CONTROL_CHARS = /[\u0000-\u0008\u000E-\u001F]/;

/**
 * Decodes the prefix as UTF-8, or returns null for binary data. Up to three
 * trailing bytes may belong to a character cut off at the sniff boundary.
 */
function decodeText(bytes: Uint8Array): string | null {
  if (bytes.length === 0) return null;
  const decoder = new TextDecoder("utf-8", { fatal: true });
  for (let cut = 0; cut <= Math.min(3, bytes.length - 1); cut++) {
    try {
      const text = decoder.decode(bytes.subarray(0, bytes.length - cut));
      return CONTROL_CHARS.test(text) ? null : text;
    } catch {
      // invalid at this length, retry without the last byte
    }
  }
  return null;
}

function leadingText(bytes: Uint8Array): string | null {
  const decoded = decodeText(bytes);
  return decoded === null ? null : stripBom(decoded).trimStart();
}

function classifyXmlDeclaration(text: string | null): Classification | null {
  if (text === null || !text.startsWith("<?xml")) return null;
  return { format: "xml", mime: "application/xml", source: "signature" };
}

function classifyMarkup(text: string | null, ext: string): Classification | null {
  if (text === null) return null;
  // Markup without a declaration is inconclusive; only the extension can tell XML from HTML.
  if (text.startsWith("<") && XML_EXTS.has(ext)) {
    const mime = ext === "svg" ? "image/svg+xml" : "application/xml";
    return { format: "xml", mime, source: "extension" };
  }
  return null;
}

/**
 * Tags a byte prefix with its media kind. Signatures win over the filename; the
 * extension is only consulted for inconclusive prefixes (undeclared XML) and to
 * split containers that hold either audio or video.
 */
export function classify(prefix: Uint8Array, filename?: string | null): Classification {
  const bytes = prefix.subarray(0, SNIFF_BYTES);
  const ext = extensionOf(filename);

  for (const signature of SIGNATURES) {
    if (signature.match(bytes)) {
      return { format: signature.format, mime: signature.mime, source: "signature" };
    }
  }

  const container = classifyIsoBmff(bytes, ext) ?? classifyOgg(bytes, ext);
  if (container) return container;

  const text = leadingText(bytes);
  const declared = classifyXmlDeclaration(text);
  if (declared) return declared;

  // Only once no fixed-offset signature matched, so text inside another format's metadata cannot win.
  if (containsPdfHeader(bytes)) return { format: "pdf", mime: "application/pdf", source: "signature" };

  const markup = classifyMarkup(text, ext);
  if (markup) return markup;

  return { format: "unknown", mime: "application/octet-stream", source: "none" };
}

export function assertSupported(
  classification: Classification,
  filename?: string | null,
): asserts classification is Classification & { format: Exclude<MediaFormat, "unknown"> } {
  if (classification.format === "unknown") {
    const name = filename ? ` "${filename}"` : "";
    throw new UnsupportedFormatError(`Could not recognise the format of${name || " the upload"}`);
  }
}
