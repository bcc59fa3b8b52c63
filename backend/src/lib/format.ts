import type { SourceFormat } from "../types";

const OGG_CAPTURE_PATTERN = Buffer.from("OggS", "latin1");
const OPUS_HEAD = Buffer.from("OpusHead", "latin1");

// The identification header sits inside the first Ogg page
const FIRST_PAGE_SCAN_BYTES = 64;

export const sniffFormat = (payload: Buffer): SourceFormat => {
  if (payload.length < OGG_CAPTURE_PATTERN.length) return "unknown";
  if (!payload.subarray(0, OGG_CAPTURE_PATTERN.length).equals(OGG_CAPTURE_PATTERN)) {
    return "unknown";
  }
  const head = payload.subarray(0, FIRST_PAGE_SCAN_BYTES);
  return head.includes(OPUS_HEAD) ? "opus" : "ogg";
};

/**
 * Resolves the source format from the declared content type, falling back to
 * the payload's magic bytes when the declaration is generic or missing.
 */
export const resolveSourceFormat = (
  contentType: string | undefined,
  payload: Buffer,
): SourceFormat => {
  const [mediaType = "", ...params] = (contentType ?? "")
    .toLowerCase()
    .split(";")
    .map((part) => part.trim());

  if (mediaType === "audio/opus") return "opus";
  if (mediaType === "audio/ogg") {
    return params.some((param) => param.replace(/"/g, "") === "codecs=opus")
      ? "opus"
      : "ogg";
  }
  return sniffFormat(payload);
};
