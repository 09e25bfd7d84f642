// libmime and mailsplit are mailparser's own building blocks and ship no types.

declare module 'libmime' {
  interface ParsedHeaderValue {
    value: string;
    params: Record<string, string>;
  }

  interface Libmime {
    decodeWords(str: string): string;
    parseHeaderValue(str: string): ParsedHeaderValue;
  }

  const libmime: Libmime;
  export default libmime;
}

declare module 'mailsplit' {
  import { Transform } from 'node:stream';

  export interface MimeHeaders {
    /** Value of the first header named `key`, unfolded; '' when missing. */
    getFirst(key: string): string;
  }

  export interface MimeNode {
    type: 'node';
    headers: MimeHeaders;
    /** Undoes the node's Content-Transfer-Encoding. */
    getDecoder(): Transform;
  }

  export interface BodyChunk {
    type: 'body';
    value: Buffer;
  }

  export interface DataChunk {
    type: 'data';
    value: Buffer;
  }

  export type SplitterChunk = MimeNode | BodyChunk | DataChunk;

  export class Splitter extends Transform {
    constructor(options?: { ignoreEmbedded?: boolean });
    [Symbol.asyncIterator](): AsyncIterableIterator<SplitterChunk>;
  }
}
