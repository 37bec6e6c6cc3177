// mailsplit ships no type declarations and has no @types package
declare module 'mailsplit' {
  import { Transform } from 'stream';

  export class Headers {
    /** Unfolded value of the first header with this key, empty when absent */
    getFirst(key: string): string;
    update(key: string, value: string): void;
    add(key: string, value: string): void;
  }

  export interface MimeNode {
    type: 'node';
    root: boolean;
    headers: Headers;
  }

  export interface MimeChunk {
    type: 'data' | 'body';
    value: Buffer;
  }

  export class Splitter extends Transform {
    constructor();
  }

  export class Joiner extends Transform {
    constructor();
  }
}
