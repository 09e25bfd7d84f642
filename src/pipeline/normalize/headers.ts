import { isUtf8 } from 'node:buffer';
import iconv from 'iconv-lite';
import libmime from 'libmime';

/**
 * Decodes RFC 2047 encoded words into one string. Adjacent words in the
 * same charset are joined before decoding; unknown charsets fall back to
 * UTF-8 and invalid bytes become U+FFFD.
 */
export function decodeHeaderText(raw: string): string {
  return libmime.decodeWords(raw.replace(/\r?\n[ \t]+/g, ' ')).trim();
}

/**
 * Header values as mailparser keeps them in `headerLines`, one char per
 * wire byte. Undeclared 8-bit text is UTF-8 when it validates as such,
 * otherwise windows-1252.
 */
export function decodeRawHeaderValue(binary: string): string {
  const bytes = Buffer.from(binary, 'latin1');
  const text = isUtf8(bytes) ? bytes.toString('utf8') : iconv.decode(bytes, 'windows-1252');
  return decodeHeaderText(text);
}
