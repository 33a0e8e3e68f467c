/**
 * Value-Class Checker - decides which aggregates may cross the bridge by
 * value.
 *
 * Aggregates are ingested first, each recording the types its fields depend
 * on. `classify` then walks the explicitly requested types: a request holds
 * only if the aggregate and every aggregate reachable through its fields is
 * free of pointers and references, and every leaf is a module enum or a
 * primitive the registry knows to be safe. Anything not requested stays
 * opaque.
 *
 * Module items are found by their bare name; a path naming them may carry a
 * leading `self::` or `crate::`. Built-in primitives resolve only by their
 * bare name, library aliases such as `c_int` by their leaf.
 */

import {
  ok,
  error,
  qualifiedNameToString,
  typeToQualifiedName,
  type QualifiedName,
  type RawEnumItem,
  type RawStructItem,
  type RawType,
  type Result,
} from "@bridgeforge/frontend";
import { resolveKnownType } from "./known-types.js";

export type TypeClassification = "valueSafe" | "opaque";

/**
 * Verdict for every ingested aggregate, keyed by canonical name
 */
export type Classification = ReadonlyMap<string, TypeClassification>;

export type ValueSafetyViolation = {
  readonly typeName: QualifiedName;
  readonly reason: string;
};

type AggregateRecord =
  | {
      readonly state: "candidate";
      readonly name: QualifiedName;
      readonly fieldDeps: readonly QualifiedName[];
    }
  | {
      readonly state: "unsafe";
      readonly name: QualifiedName;
      readonly reason: string;
    }
  | {
      // Enums carry no fields and are always plain data
      readonly state: "leaf";
      readonly name: QualifiedName;
    };

export type ValueClassChecker = {
  readonly records: ReadonlyMap<string, AggregateRecord>;
};

export const createValueClassChecker = (): ValueClassChecker => ({
  records: new Map(),
});

type FieldDeps =
  | { readonly ok: true; readonly deps: readonly QualifiedName[] }
  | { readonly ok: false; readonly problem: string };

/**
 * Names a field of this type depends on, or why it rules out by-value use
 */
const fieldTypeDeps = (type: RawType): FieldDeps => {
  switch (type.kind) {
    case "pathType": {
      const name = typeToQualifiedName(type);
      return name ? { ok: true, deps: [name] } : { ok: true, deps: [] };
    }
    case "arrayType":
      return fieldTypeDeps(type.elementType);
    case "tupleType": {
      const deps: QualifiedName[] = [];
      for (const element of type.elementTypes) {
        const inner = fieldTypeDeps(element);
        if (!inner.ok) return inner;
        deps.push(...inner.deps);
      }
      return { ok: true, deps };
    }
    case "pointerType":
      return { ok: false, problem: "is a raw pointer" };
    case "referenceType":
      return { ok: false, problem: "is a reference" };
    case "functionPointerType":
      return { ok: false, problem: "is a function pointer" };
    case "neverType":
      return { ok: false, problem: "has the never type" };
  }
};

const buildRecord = (def: RawStructItem): AggregateRecord => {
  const name: QualifiedName = { namespace: [], name: def.name };

  if (def.generics && def.generics.length > 0) {
    return {
      state: "unsafe",
      name,
      reason: `${def.name} is generic`,
    };
  }

  const fieldDeps: QualifiedName[] = [];
  for (const [index, field] of def.fields.entries()) {
    const deps = fieldTypeDeps(field.type);
    if (!deps.ok) {
      return {
        state: "unsafe",
        name,
        reason: `${def.name}: field '${field.name ?? String(index)}' ${deps.problem}`,
      };
    }
    fieldDeps.push(...deps.deps);
  }

  return { state: "candidate", name, fieldDeps };
};

const withRecord = (
  checker: ValueClassChecker,
  key: string,
  build: () => AggregateRecord
): ValueClassChecker => {
  if (checker.records.has(key)) {
    return checker;
  }
  const records = new Map(checker.records);
  records.set(key, build());
  return { records };
};

/**
 * Record an aggregate definition. A name already ingested is left as it was.
 */
export const ingestAggregate = (
  checker: ValueClassChecker,
  def: RawStructItem
): ValueClassChecker => withRecord(checker, def.name, () => buildRecord(def));

/**
 * Record a module enum as a by-value leaf
 */
export const ingestEnum = (
  checker: ValueClassChecker,
  def: RawEnumItem
): ValueClassChecker =>
  withRecord(checker, def.name, () => ({
    state: "leaf",
    name: { namespace: [], name: def.name },
  }));

const MODULE_ROOTS: ReadonlySet<string> = new Set(["self", "crate"]);

/**
 * The name as seen from inside the module: leading `self`/`crate` segments
 * dropped
 */
const moduleLocalName = (name: QualifiedName): QualifiedName => {
  const start = name.namespace.findIndex(
    (segment) => !MODULE_ROOTS.has(segment)
  );
  return start === 0
    ? name
    : {
        namespace: start < 0 ? [] : name.namespace.slice(start),
        name: name.name,
      };
};

/**
 * Decide the requested value types. Fails on the first type that cannot be
 * proven safe; on success every ingested aggregate has a verdict.
 */
export const classify = (
  checker: ValueClassChecker,
  requests: readonly QualifiedName[]
): Result<Classification, ValueSafetyViolation> => {
  const valueSafe = new Set<string>();
  const queue: QualifiedName[] = [...requests];

  for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
    const local = moduleLocalName(next);
    const key = qualifiedNameToString(local);
    if (valueSafe.has(key)) {
      continue;
    }

    const record = checker.records.get(key);
    if (record) {
      switch (record.state) {
        case "unsafe":
          return error({ typeName: record.name, reason: record.reason });
        case "leaf":
          valueSafe.add(key);
          continue;
        case "candidate":
          valueSafe.add(key);
          queue.push(...record.fieldDeps);
          continue;
      }
    }

    const known = resolveKnownType(local);
    if (known) {
      if (!known.byValueSafe) {
        return error({
          typeName: next,
          reason: `${key} is ${known.cppName}, which cannot be passed by value`,
        });
      }
      continue;
    }

    return error({
      typeName: next,
      reason: `Unable to make ${key} a value type because its definition was never seen`,
    });
  }

  const verdicts = new Map<string, TypeClassification>();
  for (const [key, record] of checker.records) {
    if (record.state !== "leaf") {
      verdicts.set(key, valueSafe.has(key) ? "valueSafe" : "opaque");
    }
  }
  return ok(verdicts);
};

export const isValueSafe = (
  classification: Classification,
  name: string
): boolean => classification.get(name) === "valueSafe";
