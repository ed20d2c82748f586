/**
 * Identity codec: content is the stored bytes
 */

import type { ContentCodec } from '../cache/types';

export const bufferCodec: ContentCodec<Buffer> = {
  decode: bytes => (bytes.byteLength === 0 ? null : Buffer.from(bytes)),
  encode: content => content
};
