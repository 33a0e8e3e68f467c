/**
 * Identifier escaping utilities
 *
 * Reserved words must be written as raw identifiers (`r#type`) when a
 * generated header uses them as field or parameter names.
 */

/**
 * Strict and reserved keywords of the bridge language
 */
const KEYWORDS: ReadonlySet<string> = new Set([
  "as",
  "async",
  "await",
  "break",
  "const",
  "continue",
  "dyn",
  "else",
  "enum",
  "extern",
  "false",
  "fn",
  "for",
  "if",
  "impl",
  "in",
  "let",
  "loop",
  "match",
  "mod",
  "move",
  "mut",
  "pub",
  "ref",
  "return",
  "static",
  "struct",
  "trait",
  "true",
  "type",
  "unsafe",
  "use",
  "where",
  "while",
  // Reserved for future use
  "abstract",
  "become",
  "box",
  "do",
  "final",
  "macro",
  "override",
  "priv",
  "try",
  "typeof",
  "unsized",
  "virtual",
  "yield",
]);

/**
 * Path keywords (`self`, `Self`, `super`, `crate`) cannot be raw identifiers
 * and are never escaped.
 */
export const escapeIdentifier = (name: string): string =>
  KEYWORDS.has(name) ? `r#${name}` : name;
