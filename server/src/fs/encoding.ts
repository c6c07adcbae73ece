const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64Strict(content: string): Buffer | null {
  const compact = content.replace(/\s+/g, "");
  if (compact.length % 4 !== 0 || !BASE64_RE.test(compact)) return null;
  return Buffer.from(compact, "base64");
}

function tryDecode(label: string, bytes: Uint8Array): string | null {
  try {
    return new TextDecoder(label, { fatal: true }).decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) return null;
    throw err;
  }
}

/** Decodes text with BOM awareness; null when the bytes are not clean text. */
export function decodeText(buf: Buffer): string | null {
  if (buf.length >= 3 && buf[0] === 0xef && buf[1] === 0xbb && buf[2] === 0xbf) return tryDecode("utf-8", buf.subarray(3));
  if (buf.length >= 2 && buf[0] === 0xff && buf[1] === 0xfe) return tryDecode("utf-16le", buf.subarray(2));
  if (buf.length >= 2 && buf[0] === 0xfe && buf[1] === 0xff) return tryDecode("utf-16be", buf.subarray(2));
  if (buf.includes(0)) return null;
  return tryDecode("utf-8", buf);
}
