/**
 * Cache key and transform descriptor tests
 */

import { describe, it, expect } from 'vitest';
import {
  cacheKeysEqual,
  createCacheKey,
  custom,
  diskSuffix,
  ORIGINAL,
  originalKeyFor,
  round,
  scaled,
  transformId,
  transformsEqual,
  userContentKey,
  userContentLocator,
  isUserContentLocator
} from '../../src/cache/cacheKey';

describe('CacheKey', () => {
  describe('diskSuffix', () => {
    it('names the original artifact', () => {
      expect(diskSuffix(ORIGINAL)).toBe('_original');
    });

    it('truncates numeric parameters of scaled transforms', () => {
      const transform = scaled({ width: 100.7, height: 50.2 }, { cornerRadius: 4.9, contentScale: 2 });
      expect(diskSuffix(transform)).toBe('_scaled_100_50_aspectFill_0_false_4_2_nil');
    });

    it('encodes the border color', () => {
      const transform = scaled(
        { width: 10, height: 20 },
        { mode: 'aspectFit', opaque: true, bleed: 1, border: { kind: 'hairline', color: '#ff0000' } }
      );
      expect(diskSuffix(transform)).toBe('_scaled_10_20_aspectFit_1_true_0_0_hairline(%23ff0000)');
    });

    it('puts the scale after the border for round transforms', () => {
      expect(diskSuffix(round({ width: 40, height: 40 }, { contentScale: 3 }))).toBe('_round_40_40_nil_3');
    });

    it('percent-encodes custom edit keys', () => {
      expect(diskSuffix(custom<string>('blur radius/2', value => value))).toBe('_custom_blur%20radius%2F2');
    });

    it('renders negative fractions as zero', () => {
      expect(diskSuffix(round({ width: -0.5, height: 8 }))).toBe('_round_0_8_nil_0');
    });
  });

  describe('identity', () => {
    it('keeps full precision in the transform id', () => {
      const transform = scaled({ width: 100.7, height: 50.2 }, { cornerRadius: 4.9, contentScale: 2 });
      expect(transformId(transform)).toBe('scaled:100.7:50.2:aspectFill:0:false:4.9:none:2');
    });

    it('treats structurally equal keys as the same entry', () => {
      const a = createCacheKey('https://x/img', scaled({ width: 100, height: 100 }));
      const b = createCacheKey('https://x/img', scaled({ width: 100, height: 100 }));
      expect(cacheKeysEqual(a, b)).toBe(true);
      expect(a.id).toBe(b.id);
    });

    it('distinguishes transforms that share a disk suffix', () => {
      const a = scaled({ width: 100, height: 100 });
      const b = scaled({ width: 100.5, height: 100 });
      expect(diskSuffix(a)).toBe(diskSuffix(b));
      expect(transformsEqual(a, b)).toBe(false);
      expect(cacheKeysEqual(createCacheKey('https://x/img', a), createCacheKey('https://x/img', b))).toBe(false);
    });

    it('distinguishes locators and transforms', () => {
      const original = createCacheKey('https://x/img');
      expect(cacheKeysEqual(original, createCacheKey('https://x/other'))).toBe(false);
      expect(cacheKeysEqual(original, createCacheKey('https://x/img', round({ width: 1, height: 1 })))).toBe(false);
    });

    it('compares custom transforms by edit key only', () => {
      const upper = custom<string>('edit', value => value.toUpperCase());
      const lower = custom<string>('edit', value => value.toLowerCase());
      expect(transformsEqual(upper, lower)).toBe(true);
    });

    it('defaults to the original transform', () => {
      expect(createCacheKey('https://x/img').transform).toEqual({ kind: 'original' });
    });
  });

  describe('originalKeyFor', () => {
    it('returns the same key for an original key', () => {
      const key = createCacheKey('https://x/img');
      expect(originalKeyFor(key)).toBe(key);
    });

    it('drops the transform of a derived key', () => {
      const key = createCacheKey('https://x/img', scaled({ width: 10, height: 10 }));
      expect(cacheKeysEqual(originalKeyFor(key), createCacheKey('https://x/img', ORIGINAL))).toBe(true);
    });
  });

  describe('user content locators', () => {
    it('round-trips the caller key', () => {
      const locator = userContentLocator('my key');
      expect(locator).toBe('usercontent://my%20key');
      expect(isUserContentLocator(locator)).toBe(true);
      expect(userContentKey(locator)).toBe('my key');
    });

    it('returns null for other locators', () => {
      expect(isUserContentLocator('https://x/img')).toBe(false);
      expect(userContentKey('https://x/img')).toBeNull();
    });

    it('returns null for malformed encodings', () => {
      expect(userContentKey('usercontent://%E0%A4%A')).toBeNull();
    });
  });
});
