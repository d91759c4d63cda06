/**
 * Strict standard-alphabet, padded decoding. Buffer.from(..., "base64")
 * silently skips invalid characters and accepts the URL-safe alphabet, so
 * the decoded bytes must encode back to the exact input.
 */
export function decodeBase64(text: string): Buffer | undefined {
  if (text.length % 4 !== 0) {
    return undefined;
  }
  const decoded = Buffer.from(text, "base64");
  if (decoded.toString("base64") !== text) {
    return undefined;
  }
  return decoded;
}
