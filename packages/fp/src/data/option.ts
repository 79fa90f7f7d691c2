/**
 * Option Data Type
 *
 * `Option<A>` is either `Some<A>`, carrying a value, or `None`, carrying
 * nothing. Absence is an ordinary value here rather than a failure, so no
 * function in this module throws and none unwraps a value without checking.
 *
 * ```typescript
 * Some(42)    // { _tag: "Some", value: 42 }
 * None        // { _tag: "None" }
 * of(null)    // None
 * of(0)       // Some(0)
 * ```
 */

// ============================================================================
// Option Type Definition
// ============================================================================

export type Option<A> = Some<A> | None;

export interface Some<A> {
  readonly _tag: "Some";
  readonly value: A;
}

export interface None {
  readonly _tag: "None";
}

// ============================================================================
// Constructors
// ============================================================================

export function Some<A>(value: A): Option<A> {
  return { _tag: "Some", value };
}

/** The single absent value */
export const None: Option<never> = { _tag: "None" };

/**
 * `None`, typed for a given payload
 */
export function none<A = never>(): Option<A> {
  return None;
}

/**
 * Lift a possibly-absent value. `null` and `undefined` become None; every
 * other value, falsy ones included, becomes Some.
 */
export function of<A>(value: A | null | undefined): Option<A> {
  if (value === null || value === undefined) return None;
  return Some(value);
}

/** Alias of `of` */
export const fromNullable = of;

export function fromPredicate<A>(value: A, predicate: (a: A) => boolean): Option<A> {
  return predicate(value) ? Some(value) : None;
}

/**
 * Run a function that may throw; a thrown error becomes None
 */
export function tryCatch<A>(f: () => A): Option<A> {
  try {
    return Some(f());
  } catch {
    return None;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isSome<A>(opt: Option<A>): opt is Some<A> {
  return opt._tag === "Some";
}

export function isNone<A>(opt: Option<A>): opt is None {
  return opt._tag === "None";
}

// ============================================================================
// Transforming
// ============================================================================

/**
 * Transform a present value; `f` never runs for None.
 *
 * @example
 * ```typescript
 * map(Some(2), (n) => n * 3); // Some(6)
 * map(None, (n) => n * 3);    // None
 * ```
 */
export function map<A, B>(opt: Option<A>, f: (a: A) => B): Option<B> {
  if (isNone(opt)) return None;
  return Some(f(opt.value));
}

/**
 * Chain a computation whose result may itself be absent
 */
export function flatMap<A, B>(opt: Option<A>, f: (a: A) => Option<B>): Option<B> {
  if (isNone(opt)) return None;
  return f(opt.value);
}

export function flatten<A>(opt: Option<Option<A>>): Option<A> {
  return flatMap(opt, (inner) => inner);
}

/** Keep the value only when it satisfies `predicate` */
export function filter<A>(opt: Option<A>, predicate: (a: A) => boolean): Option<A> {
  return flatMap(opt, (a) => (predicate(a) ? opt : None));
}

/**
 * `opt` when present, otherwise the lazily built alternative
 */
export function orElse<A>(opt: Option<A>, fallback: () => Option<A>): Option<A> {
  return isSome(opt) ? opt : fallback();
}

// ============================================================================
// Eliminating
// ============================================================================

export function fold<A, B>(opt: Option<A>, onNone: () => B, onSome: (a: A) => B): B {
  return isSome(opt) ? onSome(opt.value) : onNone();
}

/** `fold` with named handlers */
export function match<A, B>(opt: Option<A>, cases: { None: () => B; Some: (a: A) => B }): B {
  return fold(opt, cases.None, cases.Some);
}

/**
 * The value, or the result of `onNone` when absent
 */
export function getOrElse<A>(opt: Option<A>, onNone: () => A): A {
  return fold(opt, onNone, (a) => a);
}

export function getOrElseStrict<A>(opt: Option<A>, fallback: A): A {
  return isSome(opt) ? opt.value : fallback;
}

/**
 * Map and unwrap in one step, with a fallback for None.
 *
 * @example
 * ```typescript
 * mapOr(of(user.nickname), "anonymous", (n) => n.toUpperCase());
 * ```
 */
export function mapOr<A, B>(opt: Option<A>, fallback: B, f: (a: A) => B): B {
  return fold(opt, () => fallback, f);
}

export function exists<A>(opt: Option<A>, predicate: (a: A) => boolean): boolean {
  return isSome(opt) && predicate(opt.value);
}

export function toNullable<A>(opt: Option<A>): A | null {
  return isSome(opt) ? opt.value : null;
}

export function toArray<A>(opt: Option<A>): A[] {
  return isSome(opt) ? [opt.value] : [];
}

// ============================================================================
// Sequencing
// ============================================================================

/**
 * Apply `f` to each item in order; the first None stops the walk and later
 * items are never visited.
 */
export function traverse<A, B>(items: Iterable<A>, f: (a: A) => Option<B>): Option<B[]> {
  const results: B[] = [];
  for (const item of items) {
    const opt = f(item);
    if (isNone(opt)) return None;
    results.push(opt.value);
  }
  return Some(results);
}

export function sequence<A>(opts: Iterable<Option<A>>): Option<A[]> {
  return traverse(opts, (opt) => opt);
}
