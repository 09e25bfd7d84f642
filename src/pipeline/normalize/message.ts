import { buffer } from 'node:stream/consumers';
import iconv from 'iconv-lite';
import libmime from 'libmime';
import { simpleParser, type ParsedMail } from 'mailparser';
import { Splitter, type MimeNode } from 'mailsplit';
import { describeError } from '../../errors.js';
import { logger } from '../../logger.js';
import type { NormalizedMessage } from '../../types.js';
import { decodeRawHeaderValue } from './headers.js';
import { stripHtml } from './html.js';

export interface MimePart {
  contentType: string;
  charset: string | null;
  /** Disposition `attachment`, or a filename on the part. */
  isAttachment: boolean;
  /** Transfer-decoded payload, `null` when the part could not be decoded. */
  content: Buffer | null;
}

function rawHeader(parsed: ParsedMail, key: string): string {
  const line = parsed.headerLines.find((entry) => entry.key === key)?.line ?? '';
  const colon = line.indexOf(':');
  return colon >= 0 ? line.slice(colon + 1) : line;
}

async function decodeTransfer(node: MimeNode, chunks: Buffer[]): Promise<Buffer> {
  const decoder = node.getDecoder();
  const decoded = buffer(decoder);
  for (const chunk of chunks) {
    decoder.write(chunk);
  }
  decoder.end();
  return decoded;
}

/** Leaf parts of a message in wire order; multipart containers are skipped. */
export async function splitParts(raw: Buffer | string): Promise<MimePart[]> {
  const splitter = new Splitter({ ignoreEmbedded: true });
  const nodes: Array<{ node: MimeNode; chunks: Buffer[] }> = [];

  splitter.end(raw);
  for await (const chunk of splitter) {
    if (chunk.type === 'node') {
      nodes.push({ node: chunk, chunks: [] });
    } else if (chunk.type === 'body') {
      nodes[nodes.length - 1]?.chunks.push(chunk.value);
    }
  }

  const parts: MimePart[] = [];
  for (const { node, chunks } of nodes) {
    const type = libmime.parseHeaderValue(node.headers.getFirst('content-type'));
    const contentType = type.value.trim().toLowerCase() || 'text/plain';
    if (contentType.startsWith('multipart/')) {
      continue;
    }

    const disposition = libmime.parseHeaderValue(node.headers.getFirst('content-disposition'));
    const filename = disposition.params.filename || type.params.name;

    let content: Buffer | null = null;
    try {
      content = await decodeTransfer(node, chunks);
    } catch (error) {
      logger.debug({ contentType, err: describeError(error) }, 'Skipping undecodable part');
    }

    parts.push({
      contentType,
      charset: type.params.charset || null,
      isAttachment: disposition.value.trim().toLowerCase() === 'attachment' || Boolean(filename),
      content,
    });
  }
  return parts;
}

function partText(part: MimePart): string {
  if (!part.content) {
    return '';
  }
  const charset = part.charset?.toLowerCase() ?? 'utf8';
  return iconv.decode(part.content, iconv.encodingExists(charset) ? charset : 'utf8').trim();
}

/**
 * All non-attachment `text/plain` parts joined by newlines; when they carry
 * no text, the `text/html` parts stripped to text.
 */
export function extractBody(parts: MimePart[]): string {
  const inline = parts.filter((part) => !part.isAttachment);
  const texts = (contentType: string): string[] =>
    inline.filter((part) => part.contentType === contentType).map(partText);

  const plain = texts('text/plain').filter(Boolean);
  if (plain.length) {
    return plain.join('\n');
  }
  return texts('text/html')
    .map(stripHtml)
    .filter(Boolean)
    .join('\n');
}

export async function parseMessage(raw: Buffer | string): Promise<NormalizedMessage> {
  const parsed = await simpleParser(raw, { skipHtmlToText: true });
  const parts = await splitParts(raw);
  const date = parsed.headers.has('date') && parsed.date && !Number.isNaN(parsed.date.getTime()) ? parsed.date : null;

  return {
    from: decodeRawHeaderValue(rawHeader(parsed, 'from')),
    subject: decodeRawHeaderValue(rawHeader(parsed, 'subject')),
    date,
    body: extractBody(parts),
    hasAttachment: parts.some((part) => part.isAttachment),
  };
}
