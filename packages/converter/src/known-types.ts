/**
 * Known Types - foreign type names with a fixed bridge-side meaning
 *
 * Keys are the leaf names the binding generator prints. Primitives pass
 * through the bridge unchanged and are safe by value; standard library
 * containers are renamed to the bridge's own spelling and stay behind
 * indirection.
 *
 * No replacement name is itself a key, so substituting twice is the same as
 * substituting once.
 */

import type { QualifiedName } from "@bridgeforge/frontend";

export type KnownType = {
  /** Native spelling, for messages */
  readonly cppName: string;
  /** Leaf name the bridge layer uses instead, if it differs */
  readonly bridgeReplacement?: string;
  readonly byValueSafe: boolean;
  /** Part of the language itself: never reached through a path */
  readonly builtin?: boolean;
};

const builtin = (cppName: string): KnownType => ({
  cppName,
  byValueSafe: true,
  builtin: true,
});

const primitive = (cppName: string): KnownType => ({
  cppName,
  byValueSafe: true,
});

export const KNOWN_TYPES: ReadonlyMap<string, KnownType> = new Map<
  string,
  KnownType
>([
  // Fixed-width primitives
  ["i8", builtin("int8_t")],
  ["u8", builtin("uint8_t")],
  ["i16", builtin("int16_t")],
  ["u16", builtin("uint16_t")],
  ["i32", builtin("int32_t")],
  ["u32", builtin("uint32_t")],
  ["i64", builtin("int64_t")],
  ["u64", builtin("uint64_t")],
  ["isize", builtin("intptr_t")],
  ["usize", builtin("size_t")],
  ["f32", builtin("float")],
  ["f64", builtin("double")],
  ["bool", builtin("bool")],

  // Raw C aliases
  ["c_char", primitive("char")],
  ["c_schar", primitive("signed char")],
  ["c_uchar", primitive("unsigned char")],
  ["c_short", primitive("short")],
  ["c_ushort", primitive("unsigned short")],
  ["c_int", primitive("int")],
  ["c_uint", primitive("unsigned int")],
  ["c_long", primitive("long")],
  ["c_ulong", primitive("unsigned long")],
  ["c_longlong", primitive("long long")],
  ["c_ulonglong", primitive("unsigned long long")],
  ["c_float", primitive("float")],
  ["c_double", primitive("double")],
  ["c_void", { cppName: "void", byValueSafe: false }],

  // Standard library
  [
    "std_unique_ptr",
    {
      cppName: "std::unique_ptr",
      bridgeReplacement: "UniquePtr",
      byValueSafe: false,
    },
  ],
  [
    "std_string",
    { cppName: "std::string", bridgeReplacement: "CxxString", byValueSafe: false },
  ],
  [
    "std_vector",
    { cppName: "std::vector", bridgeReplacement: "CxxVector", byValueSafe: false },
  ],
]);

export const getKnownType = (name: string): KnownType | undefined =>
  KNOWN_TYPES.get(name);

/**
 * Registry entry a type path denotes. Built-ins match only a bare name;
 * library types match on the leaf, wherever they were imported from.
 */
export const resolveKnownType = (
  name: QualifiedName
): KnownType | undefined => {
  const known = KNOWN_TYPES.get(name.name);
  return known?.builtin && name.namespace.length > 0 ? undefined : known;
};

/**
 * Bridge-side leaf name for a known type, or undefined when the name
 * passes through unchanged.
 */
export const bridgeReplacementFor = (name: string): string | undefined =>
  KNOWN_TYPES.get(name)?.bridgeReplacement;

export const isKnownByValueSafe = (name: string): boolean =>
  KNOWN_TYPES.get(name)?.byValueSafe ?? false;
