/**
 * Fully-scoped names of foreign types and functions.
 *
 * QualifiedName values are compared structurally. Maps and sets key them by
 * their canonical string form (`outer::inner::Name`).
 */

export type QualifiedName = {
  readonly namespace: readonly string[];
  readonly name: string;
};

const SEPARATOR = "::";

export const makeQualifiedName = (
  name: string,
  namespace: readonly string[] = []
): QualifiedName => ({ namespace, name });

/**
 * Parse `a::b::Name` into a QualifiedName. A leading `::` is ignored.
 */
export const parseQualifiedName = (text: string): QualifiedName => {
  const parts = text
    .split(SEPARATOR)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  const name = parts.pop() ?? "";
  return { namespace: parts, name };
};

export const qualifiedNameToString = (qn: QualifiedName): string =>
  [...qn.namespace, qn.name].join(SEPARATOR);

export const qualifiedNameEquals = (
  a: QualifiedName,
  b: QualifiedName
): boolean =>
  a.name === b.name &&
  a.namespace.length === b.namespace.length &&
  a.namespace.every((segment, i) => segment === b.namespace[i]);

/**
 * Keep the first occurrence of each name, preserving order.
 */
export const dedupeQualifiedNames = (
  names: Iterable<QualifiedName>
): readonly QualifiedName[] => {
  const seen = new Set<string>();
  const out: QualifiedName[] = [];
  for (const qn of names) {
    const key = qualifiedNameToString(qn);
    if (!seen.has(key)) {
      seen.add(key);
      out.push(qn);
    }
  }
  return out;
};
