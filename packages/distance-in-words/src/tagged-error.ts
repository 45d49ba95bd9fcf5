/**
 * Tagged error classes: `Error` subclasses carrying a literal `_tag` and
 * typed props, so callers can narrow on `_tag` instead of `instanceof` chains.
 *
 * @example
 * ```typescript
 * class BucketMissing extends TaggedError('BucketMissing')<{ bucket: string }> {}
 * class BadInput extends TaggedError('BadInput', {
 *   message: (p: { reason: string }) => `Bad input: ${p.reason}`,
 * }) {}
 *
 * const error = new BucketMissing({ bucket: 'x_weeks' });
 * error._tag   // 'BucketMissing'
 * error.bucket // 'x_weeks'
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Shape shared by every tagged error instance.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options accepted by {@link TaggedError}. Props are inferred from the
 * parameter annotation of `message`.
 */
export interface TaggedErrorOptions<Props> {
  message(props: Props): string;
}

// Props with only optional fields make the constructor argument optional.
// eslint-disable-next-line @typescript-eslint/no-empty-object-type
type ConstructorArgs<Props> = {} extends Props ? [props?: Props] : [props: Props];

/**
 * Constructor returned by `TaggedError(tag)`. Props are supplied as a type
 * argument on the `extends` clause.
 */
export interface TaggedErrorConstructor<Tag extends string> {
  // eslint-disable-next-line @typescript-eslint/no-empty-object-type
  new <Props extends object = {}>(
    ...args: ConstructorArgs<Props>
  ): TaggedErrorBase<Tag> & Readonly<Props>;
}

/**
 * Constructor returned by `TaggedError(tag, { message })`.
 */
export interface TaggedErrorWithPropsConstructor<Tag extends string, Props extends object> {
  new (...args: ConstructorArgs<Props>): TaggedErrorBase<Tag> & Readonly<Props>;
}

/** Literal tag of a tagged error (or union of tags for a union). */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/** Variant of an error union carrying the given tag. */
export type ErrorByTag<E, Tag extends string> = Extract<E, { readonly _tag: Tag }>;

/** Props of a tagged error, without the `Error` fields. */
export type PropsOf<E> = Omit<E, keyof TaggedErrorBase>;

// =============================================================================
// Factory
// =============================================================================

class TaggedErrorClass extends Error {
  readonly _tag: string;

  constructor(tag: string, message: string) {
    super(message);
    this._tag = tag;
    this.name = tag;
  }
}

/**
 * Create a tagged error class.
 *
 * Without options the message is the tag itself; with `message` it is built
 * from the props passed to the constructor.
 */
export function TaggedError<Tag extends string>(tag: Tag): TaggedErrorConstructor<Tag>;
export function TaggedError<Tag extends string, Props extends object>(
  tag: Tag,
  options: TaggedErrorOptions<Props>
): TaggedErrorWithPropsConstructor<Tag, Props>;
export function TaggedError(
  tag: string,
  options?: TaggedErrorOptions<Record<string, unknown>>
): unknown {
  class Tagged extends TaggedErrorClass {
    constructor(props?: Record<string, unknown>) {
      const fields = props ?? {};
      super(tag, options ? options.message(fields) : tag);
      Object.assign(this, fields);
    }
  }
  Object.defineProperty(Tagged, "name", { value: tag });
  return Tagged;
}

/**
 * Check whether a value was created by a `TaggedError` class.
 */
function isTaggedError(value: unknown): value is TaggedErrorBase {
  return value instanceof TaggedErrorClass;
}

TaggedError.isTaggedError = isTaggedError;
