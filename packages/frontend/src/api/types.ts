/**
 * Analysed API items.
 *
 * Every item the external analysis stages discover becomes one `Api`. The
 * per-kind analysis payload depends on the phase: the earlier phase carries
 * field-level struct analysis only, the later one adds the constructor and
 * allocator dependencies found once special members are known. Keeping the
 * phase in the type means code written against `Api<FnPrePhase>` cannot
 * read allocator data that does not exist yet.
 */

import type { QualifiedName } from "../types/qualified-name.js";

export type TypeKind = "pod" | "opaque";

export type PodAnalysis = {
  readonly kind: TypeKind;
  readonly bases: readonly QualifiedName[];
  /** Types of every field, in declaration order */
  readonly fieldTypes: readonly QualifiedName[];
  readonly movable: boolean;
};

export type PodAndDepAnalysis = {
  readonly pod: PodAnalysis;
  readonly constructorAndAllocatorDeps: readonly QualifiedName[];
};

export type TypedefAnalysis = {
  readonly kind: "type" | "use";
  readonly deps: readonly QualifiedName[];
};

export type FnAnalysis = {
  readonly rustName: string;
  readonly cppWrapperName?: string;
  readonly deps: readonly QualifiedName[];
};

/**
 * Payload types for one analysis phase
 */
export type AnalysisPhase = {
  readonly typedefAnalysis: TypedefAnalysis;
  readonly structAnalysis: unknown;
  readonly fnAnalysis: FnAnalysis;
};

export type FnPrePhase = {
  readonly typedefAnalysis: TypedefAnalysis;
  readonly structAnalysis: PodAnalysis;
  readonly fnAnalysis: FnAnalysis;
};

export type FnPhase = {
  readonly typedefAnalysis: TypedefAnalysis;
  readonly structAnalysis: PodAndDepAnalysis;
  readonly fnAnalysis: FnAnalysis;
};

export type FunctionDetails = {
  readonly cppName: string;
  readonly isMethod: boolean;
};

export type RustSubclassFnDetails = {
  readonly methodName: string;
  readonly superclass: QualifiedName;
  readonly dependencies: readonly QualifiedName[];
};

export type Api<P extends AnalysisPhase> =
  | { readonly kind: "forwardDeclaration"; readonly name: QualifiedName }
  | {
      readonly kind: "concreteType";
      readonly name: QualifiedName;
      readonly cppDefinition: string;
    }
  | { readonly kind: "stringConstructor"; readonly name: QualifiedName }
  | {
      readonly kind: "function";
      readonly name: QualifiedName;
      readonly fun: FunctionDetails;
      readonly analysis: P["fnAnalysis"];
    }
  | {
      readonly kind: "const";
      readonly name: QualifiedName;
      readonly value: string;
    }
  | {
      readonly kind: "typedef";
      readonly name: QualifiedName;
      readonly oldTyname?: QualifiedName;
      readonly analysis: P["typedefAnalysis"];
    }
  | {
      readonly kind: "enum";
      readonly name: QualifiedName;
      readonly variants: readonly string[];
    }
  | {
      readonly kind: "struct";
      readonly name: QualifiedName;
      readonly analysis: P["structAnalysis"];
    }
  | {
      readonly kind: "cType";
      readonly name: QualifiedName;
      readonly typename: QualifiedName;
    }
  | {
      readonly kind: "ignoredItem";
      readonly name: QualifiedName;
      readonly reason: string;
    }
  | {
      readonly kind: "rustType";
      readonly name: QualifiedName;
      readonly path: string;
    }
  | {
      readonly kind: "rustFn";
      readonly name: QualifiedName;
      readonly path: string;
    }
  | {
      readonly kind: "rustSubclassFn";
      readonly name: QualifiedName;
      readonly subclass: QualifiedName;
      readonly details: RustSubclassFnDetails;
    }
  | {
      readonly kind: "subclass";
      readonly name: QualifiedName;
      readonly superclass: QualifiedName;
    }
  | {
      readonly kind: "externCppType";
      readonly name: QualifiedName;
      readonly path: string;
      readonly pod: boolean;
    };

export type ApiKind = Api<AnalysisPhase>["kind"];
