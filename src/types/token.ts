import type { ByteSpan } from './document.js';

export type Region =
  | { kind: 'header'; header: string }
  | { kind: 'free-text' };

export interface AddressToken extends ByteSpan {
  /** The bare address as written in the document. */
  address: string;
  displayName?: string;
  region: Region;
}

/** An address-bearing part of a document, as byte offsets. */
export interface RegionSpan extends ByteSpan {
  region: Region;
}
