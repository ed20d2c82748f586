/**
 * Cache keys and transform descriptors
 *
 * A {@link CacheKey} pairs a resource locator with a {@link TransformDescriptor}.
 * Keys compare structurally through their `id`, which encodes every field at
 * full precision. The disk suffix, by contrast, truncates numeric parameters
 * to whole units, so two transforms that differ only below one unit share a
 * file on disk.
 */

export interface Size {
  width: number;
  height: number;
}

export type ContentMode = 'aspectFill' | 'aspectFit';

export interface HairlineBorder {
  kind: 'hairline';
  color: string;
}

export type Border = HairlineBorder;

export interface OriginalTransform {
  kind: 'original';
}

export interface ScaledTransform {
  kind: 'scaled';
  size: Size;
  mode: ContentMode;
  /** Extra size drawn beyond the output bounds on every edge */
  bleed: number;
  opaque: boolean;
  /** Corners are rounded when greater than zero */
  cornerRadius: number;
  border?: Border;
  /** Pixels per unit. Zero means the deployment's default. */
  contentScale: number;
}

export interface RoundTransform {
  kind: 'round';
  size: Size;
  border?: Border;
  contentScale: number;
}

/**
 * A caller-supplied transform. Two custom transforms are the same transform
 * whenever their edit keys match; `apply` itself is never compared.
 */
export interface CustomTransform<Content> {
  kind: 'custom';
  editKey: string;
  apply(content: Content): Content;
}

export type TransformDescriptor<Content = unknown> =
  | OriginalTransform
  | ScaledTransform
  | RoundTransform
  | CustomTransform<Content>;

export interface CacheKey<Content = unknown> {
  readonly id: string;
  readonly locator: string;
  readonly transform: TransformDescriptor<Content>;
}

export const ORIGINAL: OriginalTransform = { kind: 'original' };

export function scaled(
  size: Size,
  options: Partial<Omit<ScaledTransform, 'kind' | 'size'>> = {}
): ScaledTransform {
  return {
    kind: 'scaled',
    size: { width: size.width, height: size.height },
    mode: options.mode ?? 'aspectFill',
    bleed: options.bleed ?? 0,
    opaque: options.opaque ?? false,
    cornerRadius: options.cornerRadius ?? 0,
    border: options.border,
    contentScale: options.contentScale ?? 0
  };
}

export function round(
  size: Size,
  options: Partial<Omit<RoundTransform, 'kind' | 'size'>> = {}
): RoundTransform {
  return {
    kind: 'round',
    size: { width: size.width, height: size.height },
    border: options.border,
    contentScale: options.contentScale ?? 0
  };
}

export function custom<Content>(editKey: string, apply: (content: Content) => Content): CustomTransform<Content> {
  return { kind: 'custom', editKey, apply };
}

function borderId(border: Border | undefined): string {
  return border ? `hairline(${JSON.stringify(border.color)})` : 'none';
}

/**
 * Identity of a transform, used for equality and hashing
 */
export function transformId(transform: TransformDescriptor<unknown>): string {
  switch (transform.kind) {
    case 'original':
      return 'original';
    case 'scaled':
      return [
        'scaled',
        transform.size.width,
        transform.size.height,
        transform.mode,
        transform.bleed,
        transform.opaque,
        transform.cornerRadius,
        borderId(transform.border),
        transform.contentScale
      ].join(':');
    case 'round':
      return [
        'round',
        transform.size.width,
        transform.size.height,
        borderId(transform.border),
        transform.contentScale
      ].join(':');
    case 'custom':
      return `custom:${JSON.stringify(transform.editKey)}`;
  }
}

export function transformsEqual(a: TransformDescriptor<unknown>, b: TransformDescriptor<unknown>): boolean {
  return transformId(a) === transformId(b);
}

function whole(value: number): number {
  // Collapse -0 so it renders as "0"
  return Math.trunc(value) || 0;
}

function borderSuffix(border: Border | undefined): string {
  return border ? `_hairline(${encodeURIComponent(border.color)})` : '_nil';
}

/**
 * Filename-safe suffix distinguishing this transform's artifact on disk
 */
export function diskSuffix(transform: TransformDescriptor<unknown>): string {
  switch (transform.kind) {
    case 'original':
      return '_original';
    case 'scaled': {
      const { size, mode, bleed, opaque, cornerRadius, border, contentScale } = transform;
      return `_scaled_${whole(size.width)}_${whole(size.height)}_${mode}_${whole(bleed)}_${opaque}_${whole(cornerRadius)}_${whole(contentScale)}${borderSuffix(border)}`;
    }
    case 'round': {
      const { size, border, contentScale } = transform;
      return `_round_${whole(size.width)}_${whole(size.height)}${borderSuffix(border)}_${whole(contentScale)}`;
    }
    case 'custom':
      return `_custom_${encodeURIComponent(transform.editKey)}`;
  }
}

export function createCacheKey<Content>(locator: string, transform: TransformDescriptor<Content> = ORIGINAL): CacheKey<Content> {
  return Object.freeze({
    id: `${locator}\n${transformId(transform)}`,
    locator,
    transform
  });
}

/**
 * Key of the unmodified artifact for the same locator
 */
export function originalKeyFor<Content>(key: CacheKey<Content>): CacheKey<Content> {
  return key.transform.kind === 'original' ? key : createCacheKey<Content>(key.locator, ORIGINAL);
}

export function cacheKeysEqual(a: CacheKey<unknown>, b: CacheKey<unknown>): boolean {
  return a.id === b.id;
}

// ==========================================================================
// User-provided content
// ==========================================================================

export const USER_CONTENT_SCHEME = 'usercontent://';

/**
 * Locator under which caller-seeded content is stored
 */
export function userContentLocator(key: string): string {
  return `${USER_CONTENT_SCHEME}${encodeURIComponent(key)}`;
}

export function isUserContentLocator(locator: string): boolean {
  return locator.startsWith(USER_CONTENT_SCHEME);
}

/**
 * The caller's original key for a user-content locator, or null for any other locator
 */
export function userContentKey(locator: string): string | null {
  if (!isUserContentLocator(locator)) return null;
  try {
    return decodeURIComponent(locator.slice(USER_CONTENT_SCHEME.length));
  } catch {
    return null;
  }
}
