/**
 * Raw interface module - the low-level declaration tree produced by the
 * header-to-binding generator.
 *
 * The shapes mirror what such generators print: `extern "C"` blocks of
 * flattened functions (`Class_method(this: *mut Class, ...)`), `#[repr(C)]`
 * structs, enums, and impl blocks with `new` constructors.
 */

export type RawType =
  | RawPathType
  | RawPointerType
  | RawReferenceType
  | RawArrayType
  | RawTupleType
  | RawFunctionPointerType
  | RawNeverType;

/**
 * `a::b::Name<T, U>` - generic arguments may sit on any segment.
 */
export type RawPathType = {
  readonly kind: "pathType";
  readonly leadingColon?: boolean;
  readonly segments: readonly RawPathSegment[];
};

export type RawPathSegment = {
  readonly name: string;
  readonly genericArguments?: readonly RawGenericArgument[];
};

export type RawGenericArgument =
  | { readonly kind: "type"; readonly type: RawType }
  | { readonly kind: "lifetime"; readonly name: string }
  | { readonly kind: "const"; readonly value: string };

/** `*const T` / `*mut T` */
export type RawPointerType = {
  readonly kind: "pointerType";
  readonly mutable: boolean;
  readonly elementType: RawType;
};

/** `&'a T` / `&mut T` */
export type RawReferenceType = {
  readonly kind: "referenceType";
  readonly mutable: boolean;
  readonly lifetime?: string;
  readonly elementType: RawType;
};

export type RawArrayType = {
  readonly kind: "arrayType";
  readonly elementType: RawType;
  readonly length: string;
};

export type RawTupleType = {
  readonly kind: "tupleType";
  readonly elementTypes: readonly RawType[];
};

export type RawFunctionPointerType = {
  readonly kind: "functionPointerType";
  readonly abi?: string;
  readonly isUnsafe?: boolean;
  readonly parameterTypes: readonly RawType[];
  readonly returnType?: RawType;
};

export type RawNeverType = {
  readonly kind: "neverType";
};

/**
 * `#[path tokens]`, e.g. `#[repr(C)]` is `{ path: "repr", tokens: "(C)" }`
 * and `#[link_name = "x"]` is `{ path: "link_name", tokens: " = \"x\"" }`.
 */
export type RawAttribute = {
  readonly path: string;
  readonly tokens?: string;
};

export type RawVisibility = "public" | "crate" | "private";

export type RawField = {
  /** Absent for tuple-struct fields */
  readonly name?: string;
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly type: RawType;
};

export type RawStructItem = {
  readonly kind: "struct";
  readonly name: string;
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly generics?: readonly string[];
  readonly fields: readonly RawField[];
};

export type RawEnumVariant = {
  readonly name: string;
  readonly attributes?: readonly RawAttribute[];
  readonly discriminant?: string;
};

export type RawEnumItem = {
  readonly kind: "enum";
  readonly name: string;
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly variants: readonly RawEnumVariant[];
};

export type RawTypedParameter = {
  readonly kind: "typed";
  readonly name: string;
  readonly type: RawType;
  readonly attributes?: readonly RawAttribute[];
};

/** `self`, `&self` or `&mut self` */
export type RawReceiverParameter = {
  readonly kind: "receiver";
  readonly reference: boolean;
  readonly mutable: boolean;
};

export type RawParameter = RawTypedParameter | RawReceiverParameter;

export type RawSignature = {
  readonly name: string;
  readonly isUnsafe: boolean;
  readonly parameters: readonly RawParameter[];
  readonly returnType?: RawType;
  readonly isVariadic?: boolean;
};

export type RawForeignFn = {
  readonly kind: "fn";
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly signature: RawSignature;
};

export type RawForeignStatic = {
  readonly kind: "static";
  readonly name: string;
  readonly mutable: boolean;
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly type: RawType;
};

export type RawForeignTypeDeclaration = {
  readonly kind: "type";
  readonly name: string;
};

export type RawForeignMacro = {
  readonly kind: "macro";
  readonly text: string;
};

export type RawForeignItem =
  | RawForeignFn
  | RawForeignStatic
  | RawForeignTypeDeclaration
  | RawForeignMacro;

export type RawForeignModItem = {
  readonly kind: "foreignMod";
  readonly abi: string;
  readonly attributes: readonly RawAttribute[];
  readonly items: readonly RawForeignItem[];
};

export type RawMethodBody =
  | { readonly kind: "verbatim"; readonly text: string }
  | {
      readonly kind: "call";
      readonly callee: string;
      readonly arguments: readonly string[];
    };

export type RawImplMethod = {
  readonly kind: "method";
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly signature: RawSignature;
  readonly body: RawMethodBody;
};

export type RawImplConst = {
  readonly kind: "const";
  readonly name: string;
  readonly visibility: RawVisibility;
  readonly type: RawType;
  readonly value: string;
};

export type RawImplMember = RawImplMethod | RawImplConst;

export type RawImplItem = {
  readonly kind: "impl";
  readonly attributes: readonly RawAttribute[];
  readonly isUnsafe?: boolean;
  readonly generics?: readonly string[];
  readonly trait?: string;
  readonly selfType: RawType;
  readonly members: readonly RawImplMember[];
};

export type RawUseItem = {
  readonly kind: "use";
  readonly visibility: RawVisibility;
  readonly path: string;
};

export type RawConstItem = {
  readonly kind: "const";
  readonly name: string;
  readonly visibility: RawVisibility;
  readonly type: RawType;
  readonly value: string;
};

export type RawTypeAliasItem = {
  readonly kind: "typeAlias";
  readonly name: string;
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly type: RawType;
};

/** Anything the generator printed that needs no structure here */
export type RawVerbatimItem = {
  readonly kind: "verbatim";
  readonly text: string;
};

export type RawItem =
  | RawForeignModItem
  | RawStructItem
  | RawEnumItem
  | RawImplItem
  | RawUseItem
  | RawConstItem
  | RawTypeAliasItem
  | RawVerbatimItem;

/**
 * A whole generated module. `content` is absent for a module declared
 * without a body (`mod bindings;`).
 */
export type RawModule = {
  readonly name: string;
  readonly content?: readonly RawItem[];
};
