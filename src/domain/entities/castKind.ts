/**
 * CastKind Entity
 *
 * The four explicit-conversion operators the analyzer looks for.
 */

/**
 * One of the tracked cast operators.
 */
export type CastKind =
  | "static_cast"
  | "dynamic_cast"
  | "const_cast"
  | "reinterpret_cast";

/**
 * Describes how a cast kind is recognised in a line of source text.
 */
export interface CastDescriptor {
  /** The cast kind this descriptor matches */
  kind: CastKind;

  /** Operator keyword as written in source */
  keyword: string;

  /**
   * Line pattern: keyword, optional whitespace, `<`, a non-greedy run of
   * any characters, `>`, optional whitespace, `(`.
   *
   * Textual only. Occurrences inside comments and string literals match too.
   */
  pattern: RegExp;
}

function descriptor(kind: CastKind): CastDescriptor {
  const keyword: string = kind;
  return {
    kind,
    keyword,
    pattern: new RegExp(`${keyword}\\s*<.*?>\\s*\\(`),
  };
}

/**
 * Cast descriptors in declared order.
 * This order drives both per-line scan order and menu ordinals.
 */
export const CAST_KINDS: readonly CastDescriptor[] = [
  descriptor("static_cast"),
  descriptor("dynamic_cast"),
  descriptor("const_cast"),
  descriptor("reinterpret_cast"),
];
