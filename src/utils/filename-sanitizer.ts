/**
 * Utility to sanitize filename segments for cross-platform compatibility.
 *
 * Characters Windows rejects (< > : " / \ | ? *), control characters and
 * trailing dots or spaces are percent-encoded instead of replaced, and `%`
 * itself is encoded too, so two different inputs never produce the same output.
 */

// biome-ignore lint/suspicious/noControlCharactersInRegex: Needed to encode control characters
const UNSAFE_CHARACTERS = /[%<>:"/\\|?*\x00-\x1F\x7F]/g;

function percentEncode(ch: string): string {
  return `%${ch.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0')}`;
}

export function sanitizeFilename(name: string): string {
  const encoded = name.replace(UNSAFE_CHARACTERS, percentEncode);

  // Windows strips trailing spaces and dots
  const trailing = encoded.match(/[ .]+$/)?.[0] ?? '';
  if (!trailing) {
    return encoded;
  }
  return encoded.slice(0, encoded.length - trailing.length) + Array.from(trailing, percentEncode).join('');
}

/**
 * Inverse of {@link sanitizeFilename}
 */
export function unsanitizeFilename(name: string): string {
  return name.replace(/%([0-9A-F]{2})/g, (_, hex: string) => String.fromCharCode(Number.parseInt(hex, 16)));
}
