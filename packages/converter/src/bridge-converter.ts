/**
 * Bridge Converter - rewrites generator output into a bridge module.
 *
 * Tasks performed, in one pass over the items after classification:
 * - merges every foreign block into one, led by `include!` directives
 * - passes value-safe structs through with their fields, minus `repr`
 * - replaces opaque structs with a named type plus an owning wrapper
 * - strips `repr` and `derive` from enums
 * - swaps `new` constructors for `make_unique` factories
 * - drops flattened constructors, converts signatures, turns `this`
 *   parameters into receivers and strips class prefixes from method names
 * - removes `link_name` attributes
 * - wraps everything in one `#[cxx::bridge]` module
 */

import {
  ok,
  error,
  pathType,
  pathTypeToQualifiedName,
  stripAttributes,
  typeToQualifiedName,
  type AdditionalNeed,
  type BridgeConversion,
  type BridgeForeignMod,
  type BridgeItem,
  type BridgeModItem,
  type BridgeModuleMember,
  type EncounteredType,
  type IncludeDirective,
  type QualifiedName,
  type RawEnumItem,
  type RawForeignFn,
  type RawForeignItem,
  type RawForeignModItem,
  type RawImplItem,
  type RawImplMethod,
  type RawItem,
  type RawModule,
  type RawStructItem,
  type Result,
} from "@bridgeforge/frontend";
import type { ConvertError } from "./errors.js";
import { convertSignature } from "./type-conversion.js";
import {
  classify,
  createValueClassChecker,
  ingestAggregate,
  ingestEnum,
  isValueSafe,
  type Classification,
} from "./value-class-checker.js";

export type BridgeConverterConfig = {
  /** Native headers, in order, for the merged foreign block */
  readonly includes: readonly string[];
  /** Aggregates to pass by value */
  readonly podRequests: readonly QualifiedName[];
  /** Skip the extern type declarations paired with each struct and enum */
  readonly legacyMode?: boolean;
};

export const BRIDGE_MODULE_NAME = "cxxbridge";
export const BRIDGE_ATTRIBUTE = "cxx::bridge";
export const CONSTRUCTOR_NAME = "new";
export const FACTORY_NAME = "make_unique";
export const OWNING_POINTER = "UniquePtr";

/**
 * State threaded through the pass. Every handler returns a new state.
 */
type ConversionState = {
  /** Aggregates seen so far, for constructor and method-name matching */
  readonly classNames: ReadonlySet<string>;
  readonly encountered: ReadonlySet<string>;
  readonly passthrough: readonly BridgeItem[];
  readonly bridgeMembers: readonly BridgeModuleMember[];
  readonly foreignMod: BridgeForeignMod | undefined;
  readonly typesToDisable: readonly EncounteredType[];
  readonly additionalCppNeeds: readonly AdditionalNeed[];
};

type PassContext = {
  readonly config: BridgeConverterConfig;
  readonly extraInclude: string | undefined;
  readonly classification: Classification;
  /** Every aggregate in the module, known before the pass starts */
  readonly aggregates: ReadonlySet<string>;
};

const initialState: ConversionState = {
  classNames: new Set(),
  encountered: new Set(),
  passthrough: [],
  bridgeMembers: [],
  foreignMod: undefined,
  typesToDisable: [],
  additionalCppNeeds: [],
};

const localName = (name: string): QualifiedName => ({ namespace: [], name });

const withExternDeclaration = (
  context: PassContext,
  name: string,
  item: RawStructItem | RawEnumItem
): readonly BridgeModuleMember[] =>
  context.config.legacyMode
    ? [item]
    : [{ kind: "externCppType", name }, item];

/**
 * `extern "C" { type Name; }` plus a struct owning one, so the bridge
 * compiler has a definition that mentions the opaque type.
 */
const opaqueTypeAlias = (name: string): readonly BridgeModuleMember[] => [
  { kind: "opaqueType", name },
  {
    kind: "struct",
    name: `${name}ContainingStruct`,
    visibility: "private",
    attributes: [],
    fields: [
      {
        name: "_0",
        visibility: "private",
        attributes: [],
        type: pathType(OWNING_POINTER, pathType(name)),
      },
    ],
  },
];

const convertStruct = (
  context: PassContext,
  state: ConversionState,
  def: RawStructItem
): ConversionState => {
  if (state.encountered.has(def.name)) {
    return state;
  }

  const members = isValueSafe(context.classification, def.name)
    ? withExternDeclaration(context, def.name, {
        ...def,
        attributes: stripAttributes(def.attributes, "repr"),
      })
    : opaqueTypeAlias(def.name);

  return {
    ...state,
    classNames: new Set([...state.classNames, def.name]),
    encountered: new Set([...state.encountered, def.name]),
    bridgeMembers: [...state.bridgeMembers, ...members],
    typesToDisable: [
      ...state.typesToDisable,
      { kind: "struct", name: localName(def.name) },
    ],
  };
};

const convertEnum = (
  context: PassContext,
  state: ConversionState,
  def: RawEnumItem
): ConversionState => {
  if (state.encountered.has(def.name)) {
    return state;
  }

  const converted: RawEnumItem = {
    ...def,
    attributes: stripAttributes(def.attributes, "repr", "derive"),
  };

  return {
    ...state,
    encountered: new Set([...state.encountered, def.name]),
    bridgeMembers: [
      ...state.bridgeMembers,
      ...withExternDeclaration(context, def.name, converted),
    ],
    typesToDisable: [
      ...state.typesToDisable,
      { kind: "enum", name: localName(def.name) },
    ],
  };
};

/**
 * `Type::new(args)` becomes `Type::make_unique(args)` calling the native
 * factory `Type_make_unique(args)`, which the helper generator provides.
 */
const makeUniqueMethod = (
  typeName: string,
  constructor: RawImplMethod
): RawImplMethod => {
  const argumentNames = constructor.signature.parameters.flatMap((param) =>
    param.kind === "typed" ? [param.name] : []
  );
  return {
    kind: "method",
    visibility: constructor.visibility,
    attributes: [],
    signature: {
      ...constructor.signature,
      name: FACTORY_NAME,
      isUnsafe: false,
      returnType: pathType(OWNING_POINTER, pathType(typeName)),
    },
    body: {
      kind: "call",
      callee: `${typeName}_${FACTORY_NAME}`,
      arguments: argumentNames,
    },
  };
};

const convertImpl = (
  context: PassContext,
  state: ConversionState,
  impl: RawImplItem
): ConversionState => {
  const selfName =
    impl.selfType.kind === "pathType"
      ? pathTypeToQualifiedName(impl.selfType)
      : undefined;
  if (
    !selfName ||
    selfName.namespace.length > 0 ||
    !context.aggregates.has(selfName.name)
  ) {
    return state;
  }

  const typeName = selfName.name;
  const constructor = impl.members.find(
    (member): member is RawImplMethod =>
      member.kind === "method" && member.signature.name === CONSTRUCTOR_NAME
  );
  const alreadyNeeded = state.additionalCppNeeds.some(
    (need) => need.typeName.name === typeName
  );
  if (!constructor || alreadyNeeded) {
    return state;
  }

  const constructorArgs = constructor.signature.parameters.flatMap((param) => {
    if (param.kind !== "typed") return [];
    const argType = typeToQualifiedName(param.type);
    return argType ? [argType] : [];
  });

  const factoryImpl: RawImplItem = {
    kind: "impl",
    attributes: [],
    isUnsafe: false,
    generics: impl.generics ?? [],
    ...(impl.trait === undefined ? {} : { trait: impl.trait }),
    selfType: impl.selfType,
    members: [makeUniqueMethod(typeName, constructor)],
  };

  return {
    ...state,
    passthrough: [...state.passthrough, factoryImpl],
    additionalCppNeeds: [
      ...state.additionalCppNeeds,
      { kind: "makeUnique", typeName: selfName, constructorArgs },
    ],
  };
};

/**
 * The generator flattens `Class::method` into `Class_method`. Strip the
 * longest class-name prefix that matches.
 */
export const stripClassPrefix = (
  name: string,
  classNames: ReadonlySet<string>
): string => {
  let best: string | undefined;
  for (const className of classNames) {
    const prefix = `${className}_`;
    if (
      name.startsWith(prefix) &&
      name.length > prefix.length &&
      (best === undefined || className.length > best.length)
    ) {
      best = className;
    }
  }
  return best === undefined ? name : name.slice(best.length + 1);
};

/**
 * Convert one foreign function. Returns undefined for flattened
 * constructors (`Type_Type`), which the factory replaces.
 */
const convertForeignFn = (
  classNames: ReadonlySet<string>,
  fn: RawForeignFn
): RawForeignFn | undefined => {
  const oldName = fn.signature.name;
  for (const className of classNames) {
    if (oldName === `${className}_${className}`) {
      return undefined;
    }
  }

  const { signature, isMethod } = convertSignature(fn.signature);
  return {
    ...fn,
    attributes: stripAttributes(fn.attributes, "link_name"),
    signature: isMethod
      ? { ...signature, name: stripClassPrefix(oldName, classNames) }
      : signature,
  };
};

const unsupportedForeignItem = (
  item: Exclude<RawForeignItem, RawForeignFn>
): ConvertError =>
  item.kind === "macro"
    ? { kind: "unknownForeignItem", itemKind: item.kind }
    : { kind: "unknownForeignItem", itemKind: item.kind, name: item.name };

const mergeForeignMod = (
  context: PassContext,
  state: ConversionState,
  block: RawForeignModItem
): Result<ConversionState, ConvertError> => {
  // The first block seen lends its ABI and attributes to the merged one
  const base: BridgeForeignMod = state.foreignMod ?? {
    kind: "foreignMod",
    abi: block.abi,
    attributes: block.attributes,
    items: [
      ...context.config.includes,
      ...(context.extraInclude === undefined ? [] : [context.extraInclude]),
    ].map((path): IncludeDirective => ({ kind: "include", path })),
  };

  const converted: RawForeignFn[] = [];
  for (const item of block.items) {
    if (item.kind !== "fn") {
      return error(unsupportedForeignItem(item));
    }
    const fn = convertForeignFn(state.classNames, item);
    if (fn) {
      converted.push(fn);
    }
  }

  return ok({
    ...state,
    foreignMod: { ...base, items: [...base.items, ...converted] },
  });
};

const convertItem = (
  context: PassContext,
  state: ConversionState,
  item: RawItem
): Result<ConversionState, ConvertError> => {
  switch (item.kind) {
    case "foreignMod":
      return mergeForeignMod(context, state, item);
    case "struct":
      return ok(convertStruct(context, state, item));
    case "enum":
      return ok(convertEnum(context, state, item));
    case "impl":
      return ok(convertImpl(context, state, item));
    case "use":
    case "const":
    case "typeAlias":
    case "verbatim":
      return ok({ ...state, passthrough: [...state.passthrough, item] });
  }
};

const classifyAggregates = (
  items: readonly RawItem[],
  podRequests: readonly QualifiedName[]
): Result<Classification, ConvertError> => {
  let checker = createValueClassChecker();
  for (const item of items) {
    if (item.kind === "struct") {
      checker = ingestAggregate(checker, item);
    } else if (item.kind === "enum") {
      checker = ingestEnum(checker, item);
    }
  }
  const classification = classify(checker, podRequests);
  return classification.ok
    ? classification
    : error({
        kind: "unsafePodType",
        typeName: classification.error.typeName,
        reason: classification.error.reason,
      });
};

/**
 * Convert a generated module into items ready for the bridge compiler.
 */
export const convertBindings = (
  module: RawModule,
  config: BridgeConverterConfig,
  extraInclude?: string
): Result<BridgeConversion, ConvertError> => {
  const items = module.content;
  if (items === undefined) {
    return error({ kind: "noContent" });
  }

  const classification = classifyAggregates(items, config.podRequests);
  if (!classification.ok) {
    return classification;
  }

  const context: PassContext = {
    config,
    extraInclude,
    classification: classification.value,
    aggregates: new Set(
      items.flatMap((item) => (item.kind === "struct" ? [item.name] : []))
    ),
  };

  let state = initialState;
  for (const item of items) {
    const next = convertItem(context, state, item);
    if (!next.ok) {
      return next;
    }
    state = next.value;
  }

  const bridgeMod: BridgeModItem = {
    kind: "bridgeMod",
    name: BRIDGE_MODULE_NAME,
    visibility: "public",
    attributes: [{ path: BRIDGE_ATTRIBUTE }],
    members: state.foreignMod
      ? [...state.bridgeMembers, state.foreignMod]
      : state.bridgeMembers,
  };

  return ok({
    items: [...state.passthrough, bridgeMod],
    typesToDisable: state.typesToDisable,
    additionalCppNeeds: state.additionalCppNeeds,
  });
};
