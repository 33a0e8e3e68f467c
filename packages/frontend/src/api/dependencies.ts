/**
 * API dependency analysis
 *
 * Answers, for one analysed API item, which other items must be emitted
 * before it. Order is preserved and duplicates are kept; callers that need
 * a set dedupe themselves.
 */

import type { QualifiedName } from "../types/qualified-name.js";
import { qualifiedNameToString } from "../types/qualified-name.js";
import type { Api, FnPhase, FnPrePhase } from "./types.js";

/**
 * Dependency query over the API items of one analysis phase
 */
export type HasDependencies<A> = {
  readonly name: (api: A) => QualifiedName;
  readonly deps: (api: A) => readonly QualifiedName[];
  readonly formatDeps: (api: A) => string;
};

type NonStructApi =
  | Exclude<Api<FnPrePhase>, { readonly kind: "struct" }>
  | Exclude<Api<FnPhase>, { readonly kind: "struct" }>;

/**
 * Dependencies of every kind whose answer is the same in both phases
 */
const phaseIndependentDeps = (api: NonStructApi): readonly QualifiedName[] => {
  switch (api.kind) {
    case "typedef":
      return api.oldTyname
        ? [api.oldTyname, ...api.analysis.deps]
        : api.analysis.deps;
    case "function":
      return api.analysis.deps;
    case "subclass":
      return [api.superclass];
    case "rustSubclassFn":
      return api.details.dependencies;
    case "forwardDeclaration":
    case "concreteType":
    case "stringConstructor":
    case "const":
    case "enum":
    case "cType":
    case "ignoredItem":
    case "rustType":
    case "rustFn":
    case "externCppType":
      return [];
    default: {
      const exhaustive: never = api;
      return exhaustive;
    }
  }
};

const formatWith =
  <A>(deps: (api: A) => readonly QualifiedName[]) =>
  (api: A): string =>
    deps(api).map(qualifiedNameToString).join(",");

const preDeps = (api: Api<FnPrePhase>): readonly QualifiedName[] => {
  if (api.kind !== "struct") {
    return phaseIndependentDeps(api);
  }
  // No allocator information yet: opaque structs depend on nothing
  return api.analysis.kind === "pod" ? api.analysis.fieldTypes : [];
};

const fnPhaseDeps = (api: Api<FnPhase>): readonly QualifiedName[] => {
  if (api.kind !== "struct") {
    return phaseIndependentDeps(api);
  }
  const { pod, constructorAndAllocatorDeps } = api.analysis;
  return pod.kind === "pod"
    ? [...pod.fieldTypes, ...constructorAndAllocatorDeps]
    : constructorAndAllocatorDeps;
};

/**
 * Dependencies as known before constructor and allocator analysis
 */
export const prePhaseDependencies: HasDependencies<Api<FnPrePhase>> = {
  name: (api) => api.name,
  deps: preDeps,
  formatDeps: formatWith(preDeps),
};

/**
 * Dependencies once constructor and allocator analysis has run
 */
export const fnPhaseDependencies: HasDependencies<Api<FnPhase>> = {
  name: (api) => api.name,
  deps: fnPhaseDeps,
  formatDeps: formatWith(fnPhaseDeps),
};

/**
 * Build the dependency map consumed by the emission-ordering stage, keyed by
 * the canonical item name. Items sharing a name (overloads) share an entry.
 */
export const buildApiDependencyGraph = <A>(
  apis: readonly A[],
  capability: HasDependencies<A>
): ReadonlyMap<string, readonly QualifiedName[]> => {
  const graph = new Map<string, QualifiedName[]>();
  for (const api of apis) {
    const key = qualifiedNameToString(capability.name(api));
    const existing = graph.get(key) ?? [];
    graph.set(key, [...existing, ...capability.deps(api)]);
  }
  return graph;
};
