import { describe, it, expect } from 'vitest';
import { bufferCodec } from '../../src/codecs/bufferCodec';

describe('bufferCodec', () => {
  it('treats empty bytes as undecodable', () => {
    expect(bufferCodec.decode(new Uint8Array(0))).toBeNull();
  });

  it('decodes bytes into a Buffer', () => {
    const decoded = bufferCodec.decode(new Uint8Array([1, 2, 3]));

    expect(Buffer.isBuffer(decoded)).toBe(true);
    expect(decoded?.equals(Buffer.from([1, 2, 3]))).toBe(true);
  });

  it('encodes content as-is', () => {
    const content = Buffer.from('abc');

    expect(bufferCodec.encode(content)).toBe(content);
  });
});
