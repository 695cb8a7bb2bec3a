/**
 * @module option
 * @description Minimal Option type returned by single-item dequeues.
 * A queue may legitimately hold `undefined` or `null` items, so absence is
 * carried by the `_tag` discriminant rather than by the value itself.
 *
 * @example
 * ```typescript
 * const next = queue.dequeue();
 * if (isSome(next)) {
 *   handle(next.value);
 * }
 * ```
 */

export type Option<T> = Some<T> | None;

export interface Some<T> {
  readonly _tag: "Some";
  readonly value: T;
}

export interface None {
  readonly _tag: "None";
}

const NONE: None = Object.freeze({ _tag: "None" });

export const some = <T,>(value: T): Option<T> => ({
  _tag: "Some",
  value,
});

/**
 * Always returns the same frozen instance.
 */
export const none = (): Option<never> => NONE;

export const isSome = <T,>(option: Option<T>): option is Some<T> =>
  option._tag === "Some";

export const isNone = <T,>(option: Option<T>): option is None =>
  option._tag === "None";

/**
 * Extracts the value or computes a fallback.
 *
 * @example
 * const item = getOrElse(() => 0)(queue.dequeue());
 */
export const getOrElse =
  <T,>(onNone: () => T) =>
  (option: Option<T>): T =>
    isSome(option) ? option.value : onNone();

export const toUndefined = <T,>(option: Option<T>): T | undefined =>
  isSome(option) ? option.value : undefined;
