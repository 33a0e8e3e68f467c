/**
 * Raw module loader - reads and validates the JSON document the
 * header-to-binding generator writes.
 *
 * Document shape: `{ "name": string, "content"?: RawItem[] }`. Every node is
 * an object with a `kind` discriminator matching the types in `./types.ts`.
 * Optional arrays (`attributes`, `generics`) may be omitted; visibility
 * defaults to `"private"`.
 */

import * as fs from "node:fs";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type {
  Diagnostic,
  DiagnosticCode,
  SourceLocation,
} from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type {
  RawAttribute,
  RawEnumVariant,
  RawField,
  RawForeignItem,
  RawGenericArgument,
  RawImplMember,
  RawItem,
  RawMethodBody,
  RawModule,
  RawParameter,
  RawPathSegment,
  RawSignature,
  RawType,
  RawVisibility,
} from "./types.js";

type Parse<T> = (value: unknown, at: SourceLocation) => Result<T, Diagnostic>;

type JsonObject = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const child = (at: SourceLocation, key: string | number): SourceLocation => ({
  file: at.file,
  pointer: `${at.pointer}/${key}`,
});

const fail = <T>(
  code: DiagnosticCode,
  message: string,
  at: SourceLocation,
  hint?: string
): Result<T, Diagnostic> =>
  error(createDiagnostic(code, "error", message, at, hint));

const asObject = (
  value: unknown,
  at: SourceLocation,
  code: DiagnosticCode,
  what: string
): Result<JsonObject, Diagnostic> =>
  isRecord(value)
    ? ok(value)
    : fail(code, `Invalid ${what}: must be an object`, at);

const readString = (
  obj: JsonObject,
  key: string,
  at: SourceLocation,
  code: DiagnosticCode
): Result<string, Diagnostic> => {
  const value = obj[key];
  return typeof value === "string"
    ? ok(value)
    : fail(code, `Missing or invalid '${key}' field`, child(at, key));
};

const readOptionalString = (
  obj: JsonObject,
  key: string,
  at: SourceLocation,
  code: DiagnosticCode
): Result<string | undefined, Diagnostic> => {
  const value = obj[key];
  if (value === undefined) return ok(undefined);
  return typeof value === "string"
    ? ok(value)
    : fail(code, `'${key}' must be a string if present`, child(at, key));
};

const readBoolean = (
  obj: JsonObject,
  key: string,
  at: SourceLocation,
  code: DiagnosticCode
): Result<boolean, Diagnostic> => {
  const value = obj[key] ?? false;
  return typeof value === "boolean"
    ? ok(value)
    : fail(code, `'${key}' must be a boolean`, child(at, key));
};

const readArray = <T>(
  obj: JsonObject,
  key: string,
  at: SourceLocation,
  code: DiagnosticCode,
  parse: Parse<T>,
  required: boolean
): Result<readonly T[], Diagnostic> => {
  const value = obj[key];
  if (value === undefined && !required) return ok([]);
  if (!Array.isArray(value)) {
    return fail(
      code,
      required
        ? `Missing or invalid '${key}' field`
        : `'${key}' must be an array if present`,
      child(at, key)
    );
  }
  const out: T[] = [];
  const arrayAt = child(at, key);
  for (let i = 0; i < value.length; i++) {
    const parsed = parse(value[i], child(arrayAt, i));
    if (!parsed.ok) return parsed;
    out.push(parsed.value);
  }
  return ok(out);
};

const parseStringValue: Parse<string> = (value, at) =>
  typeof value === "string"
    ? ok(value)
    : fail("BRG9007", "Expected a string", at);

const parseVisibility = (
  obj: JsonObject,
  at: SourceLocation
): Result<RawVisibility, Diagnostic> => {
  const value = obj.visibility ?? "private";
  if (value === "public" || value === "crate" || value === "private") {
    return ok(value);
  }
  return fail(
    "BRG9007",
    "'visibility' must be one of public, crate, private",
    child(at, "visibility")
  );
};

const parseAttribute: Parse<RawAttribute> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "attribute");
  if (!obj.ok) return obj;
  const path = readString(obj.value, "path", at, "BRG9007");
  if (!path.ok) return path;
  const tokens = readOptionalString(obj.value, "tokens", at, "BRG9007");
  if (!tokens.ok) return tokens;
  return ok(
    tokens.value === undefined
      ? { path: path.value }
      : { path: path.value, tokens: tokens.value }
  );
};

const readAttributes = (
  obj: JsonObject,
  at: SourceLocation
): Result<readonly RawAttribute[], Diagnostic> =>
  readArray(obj, "attributes", at, "BRG9007", parseAttribute, false);

// ============================================================================
// Types
// ============================================================================

const parseGenericArgument: Parse<RawGenericArgument> = (value, at) => {
  const obj = asObject(value, at, "BRG9008", "generic argument");
  if (!obj.ok) return obj;
  const kind = obj.value.kind;
  switch (kind) {
    case "type": {
      const type = parseType(obj.value.type, child(at, "type"));
      return type.ok ? ok({ kind: "type", type: type.value }) : type;
    }
    case "lifetime": {
      const name = readString(obj.value, "name", at, "BRG9008");
      return name.ok ? ok({ kind: "lifetime", name: name.value }) : name;
    }
    case "const": {
      const constValue = readString(obj.value, "value", at, "BRG9008");
      return constValue.ok
        ? ok({ kind: "const", value: constValue.value })
        : constValue;
    }
    default:
      return fail(
        "BRG9008",
        `Unknown generic argument kind: ${String(kind)}`,
        child(at, "kind")
      );
  }
};

const parsePathSegment: Parse<RawPathSegment> = (value, at) => {
  const obj = asObject(value, at, "BRG9008", "path segment");
  if (!obj.ok) return obj;
  const name = readString(obj.value, "name", at, "BRG9008");
  if (!name.ok) return name;
  if (obj.value.genericArguments === undefined) {
    return ok({ name: name.value });
  }
  const args = readArray(
    obj.value,
    "genericArguments",
    at,
    "BRG9008",
    parseGenericArgument,
    true
  );
  return args.ok ? ok({ name: name.value, genericArguments: args.value }) : args;
};

export const parseType: Parse<RawType> = (value, at) => {
  const obj = asObject(value, at, "BRG9008", "type");
  if (!obj.ok) return obj;
  const node = obj.value;

  switch (node.kind) {
    case "pathType": {
      const segments = readArray(
        node,
        "segments",
        at,
        "BRG9008",
        parsePathSegment,
        true
      );
      if (!segments.ok) return segments;
      if (segments.value.length === 0) {
        return fail("BRG9008", "Path type has no segments", at);
      }
      const leadingColon = readBoolean(node, "leadingColon", at, "BRG9008");
      if (!leadingColon.ok) return leadingColon;
      return ok(
        leadingColon.value
          ? { kind: "pathType", leadingColon: true, segments: segments.value }
          : { kind: "pathType", segments: segments.value }
      );
    }
    case "pointerType": {
      const mutable = readBoolean(node, "mutable", at, "BRG9008");
      if (!mutable.ok) return mutable;
      const elementType = parseType(node.elementType, child(at, "elementType"));
      if (!elementType.ok) return elementType;
      return ok({
        kind: "pointerType",
        mutable: mutable.value,
        elementType: elementType.value,
      });
    }
    case "referenceType": {
      const mutable = readBoolean(node, "mutable", at, "BRG9008");
      if (!mutable.ok) return mutable;
      const lifetime = readOptionalString(node, "lifetime", at, "BRG9008");
      if (!lifetime.ok) return lifetime;
      const elementType = parseType(node.elementType, child(at, "elementType"));
      if (!elementType.ok) return elementType;
      return ok(
        lifetime.value === undefined
          ? {
              kind: "referenceType",
              mutable: mutable.value,
              elementType: elementType.value,
            }
          : {
              kind: "referenceType",
              mutable: mutable.value,
              lifetime: lifetime.value,
              elementType: elementType.value,
            }
      );
    }
    case "arrayType": {
      const elementType = parseType(node.elementType, child(at, "elementType"));
      if (!elementType.ok) return elementType;
      const length = readString(node, "length", at, "BRG9008");
      if (!length.ok) return length;
      return ok({
        kind: "arrayType",
        elementType: elementType.value,
        length: length.value,
      });
    }
    case "tupleType": {
      const elementTypes = readArray(
        node,
        "elementTypes",
        at,
        "BRG9008",
        parseType,
        true
      );
      if (!elementTypes.ok) return elementTypes;
      return ok({ kind: "tupleType", elementTypes: elementTypes.value });
    }
    case "functionPointerType": {
      const parameterTypes = readArray(
        node,
        "parameterTypes",
        at,
        "BRG9008",
        parseType,
        true
      );
      if (!parameterTypes.ok) return parameterTypes;
      const abi = readOptionalString(node, "abi", at, "BRG9008");
      if (!abi.ok) return abi;
      const isUnsafe = readBoolean(node, "isUnsafe", at, "BRG9008");
      if (!isUnsafe.ok) return isUnsafe;
      const returnType =
        node.returnType === undefined
          ? ok<RawType | undefined, Diagnostic>(undefined)
          : parseType(node.returnType, child(at, "returnType"));
      if (!returnType.ok) return returnType;
      return ok({
        kind: "functionPointerType",
        abi: abi.value,
        isUnsafe: isUnsafe.value,
        parameterTypes: parameterTypes.value,
        returnType: returnType.value,
      });
    }
    case "neverType":
      return ok({ kind: "neverType" });
    default:
      return fail(
        "BRG9008",
        `Unknown type kind: ${String(node.kind)}`,
        child(at, "kind")
      );
  }
};

// ============================================================================
// Signatures
// ============================================================================

const parseParameter: Parse<RawParameter> = (value, at) => {
  const obj = asObject(value, at, "BRG9010", "parameter");
  if (!obj.ok) return obj;
  const node = obj.value;

  if (node.kind === "receiver") {
    const reference = readBoolean(node, "reference", at, "BRG9010");
    if (!reference.ok) return reference;
    const mutable = readBoolean(node, "mutable", at, "BRG9010");
    if (!mutable.ok) return mutable;
    return ok({
      kind: "receiver",
      reference: reference.value,
      mutable: mutable.value,
    });
  }

  if (node.kind === "typed") {
    const name = readString(node, "name", at, "BRG9010");
    if (!name.ok) return name;
    const type = parseType(node.type, child(at, "type"));
    if (!type.ok) return type;
    const attributes = readAttributes(node, at);
    if (!attributes.ok) return attributes;
    return ok({
      kind: "typed",
      name: name.value,
      type: type.value,
      attributes: attributes.value,
    });
  }

  return fail(
    "BRG9010",
    `Unknown parameter kind: ${String(node.kind)}`,
    child(at, "kind")
  );
};

const parseSignature: Parse<RawSignature> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "signature");
  if (!obj.ok) return obj;
  const node = obj.value;

  const name = readString(node, "name", at, "BRG9007");
  if (!name.ok) return name;
  const isUnsafe = readBoolean(node, "isUnsafe", at, "BRG9007");
  if (!isUnsafe.ok) return isUnsafe;
  const isVariadic = readBoolean(node, "isVariadic", at, "BRG9007");
  if (!isVariadic.ok) return isVariadic;
  const parameters = readArray(
    node,
    "parameters",
    at,
    "BRG9010",
    parseParameter,
    false
  );
  if (!parameters.ok) return parameters;
  const returnType =
    node.returnType === undefined
      ? ok<RawType | undefined, Diagnostic>(undefined)
      : parseType(node.returnType, child(at, "returnType"));
  if (!returnType.ok) return returnType;

  return ok({
    name: name.value,
    isUnsafe: isUnsafe.value,
    parameters: parameters.value,
    ...(returnType.value ? { returnType: returnType.value } : {}),
    ...(isVariadic.value ? { isVariadic: true } : {}),
  });
};

// ============================================================================
// Items
// ============================================================================

const parseForeignItem: Parse<RawForeignItem> = (value, at) => {
  const obj = asObject(value, at, "BRG9009", "foreign item");
  if (!obj.ok) return obj;
  const node = obj.value;

  switch (node.kind) {
    case "fn": {
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const signature = parseSignature(node.signature, child(at, "signature"));
      if (!signature.ok) return signature;
      return ok({
        kind: "fn",
        visibility: visibility.value,
        attributes: attributes.value,
        signature: signature.value,
      });
    }
    case "static": {
      const name = readString(node, "name", at, "BRG9009");
      if (!name.ok) return name;
      const mutable = readBoolean(node, "mutable", at, "BRG9009");
      if (!mutable.ok) return mutable;
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const type = parseType(node.type, child(at, "type"));
      if (!type.ok) return type;
      return ok({
        kind: "static",
        name: name.value,
        mutable: mutable.value,
        visibility: visibility.value,
        attributes: attributes.value,
        type: type.value,
      });
    }
    case "type": {
      const name = readString(node, "name", at, "BRG9009");
      return name.ok ? ok({ kind: "type", name: name.value }) : name;
    }
    case "macro": {
      const text = readString(node, "text", at, "BRG9009");
      return text.ok ? ok({ kind: "macro", text: text.value }) : text;
    }
    default:
      return fail(
        "BRG9009",
        `Unknown foreign item kind: ${String(node.kind)}`,
        child(at, "kind")
      );
  }
};

const parseField: Parse<RawField> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "field");
  if (!obj.ok) return obj;
  const node = obj.value;
  const name = readOptionalString(node, "name", at, "BRG9007");
  if (!name.ok) return name;
  const visibility = parseVisibility(node, at);
  if (!visibility.ok) return visibility;
  const attributes = readAttributes(node, at);
  if (!attributes.ok) return attributes;
  const type = parseType(node.type, child(at, "type"));
  if (!type.ok) return type;
  const field = {
    visibility: visibility.value,
    attributes: attributes.value,
    type: type.value,
  };
  return ok(name.value === undefined ? field : { name: name.value, ...field });
};

const parseVariant: Parse<RawEnumVariant> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "enum variant");
  if (!obj.ok) return obj;
  const name = readString(obj.value, "name", at, "BRG9007");
  if (!name.ok) return name;
  const discriminant = readOptionalString(
    obj.value,
    "discriminant",
    at,
    "BRG9007"
  );
  if (!discriminant.ok) return discriminant;
  const attributes = readAttributes(obj.value, at);
  if (!attributes.ok) return attributes;
  return ok({
    name: name.value,
    attributes: attributes.value,
    ...(discriminant.value === undefined
      ? {}
      : { discriminant: discriminant.value }),
  });
};

const parseMethodBody: Parse<RawMethodBody> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "method body");
  if (!obj.ok) return obj;
  const node = obj.value;
  if (node.kind === "verbatim") {
    const text = readString(node, "text", at, "BRG9007");
    return text.ok ? ok({ kind: "verbatim", text: text.value }) : text;
  }
  if (node.kind === "call") {
    const callee = readString(node, "callee", at, "BRG9007");
    if (!callee.ok) return callee;
    const args = readArray(
      node,
      "arguments",
      at,
      "BRG9007",
      parseStringValue,
      false
    );
    if (!args.ok) return args;
    return ok({ kind: "call", callee: callee.value, arguments: args.value });
  }
  return fail(
    "BRG9007",
    `Unknown method body kind: ${String(node.kind)}`,
    child(at, "kind")
  );
};

const parseImplMember: Parse<RawImplMember> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "impl member");
  if (!obj.ok) return obj;
  const node = obj.value;
  const visibility = parseVisibility(node, at);
  if (!visibility.ok) return visibility;

  if (node.kind === "method") {
    const attributes = readAttributes(node, at);
    if (!attributes.ok) return attributes;
    const signature = parseSignature(node.signature, child(at, "signature"));
    if (!signature.ok) return signature;
    const body = parseMethodBody(node.body, child(at, "body"));
    if (!body.ok) return body;
    return ok({
      kind: "method",
      visibility: visibility.value,
      attributes: attributes.value,
      signature: signature.value,
      body: body.value,
    });
  }

  if (node.kind === "const") {
    const name = readString(node, "name", at, "BRG9007");
    if (!name.ok) return name;
    const type = parseType(node.type, child(at, "type"));
    if (!type.ok) return type;
    const constValue = readString(node, "value", at, "BRG9007");
    if (!constValue.ok) return constValue;
    return ok({
      kind: "const",
      name: name.value,
      visibility: visibility.value,
      type: type.value,
      value: constValue.value,
    });
  }

  return fail(
    "BRG9007",
    `Unknown impl member kind: ${String(node.kind)}`,
    child(at, "kind")
  );
};

export const parseItem: Parse<RawItem> = (value, at) => {
  const obj = asObject(value, at, "BRG9007", "item");
  if (!obj.ok) return obj;
  const node = obj.value;

  switch (node.kind) {
    case "foreignMod": {
      const abi = readString(node, "abi", at, "BRG9007");
      if (!abi.ok) return abi;
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const items = readArray(
        node,
        "items",
        at,
        "BRG9009",
        parseForeignItem,
        true
      );
      if (!items.ok) return items;
      return ok({
        kind: "foreignMod",
        abi: abi.value,
        attributes: attributes.value,
        items: items.value,
      });
    }
    case "struct": {
      const name = readString(node, "name", at, "BRG9007");
      if (!name.ok) return name;
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const generics = readArray(
        node,
        "generics",
        at,
        "BRG9007",
        parseStringValue,
        false
      );
      if (!generics.ok) return generics;
      const fields = readArray(node, "fields", at, "BRG9007", parseField, false);
      if (!fields.ok) return fields;
      return ok({
        kind: "struct",
        name: name.value,
        visibility: visibility.value,
        attributes: attributes.value,
        generics: generics.value,
        fields: fields.value,
      });
    }
    case "enum": {
      const name = readString(node, "name", at, "BRG9007");
      if (!name.ok) return name;
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const variants = readArray(
        node,
        "variants",
        at,
        "BRG9007",
        parseVariant,
        true
      );
      if (!variants.ok) return variants;
      return ok({
        kind: "enum",
        name: name.value,
        visibility: visibility.value,
        attributes: attributes.value,
        variants: variants.value,
      });
    }
    case "impl": {
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const isUnsafe = readBoolean(node, "isUnsafe", at, "BRG9007");
      if (!isUnsafe.ok) return isUnsafe;
      const generics = readArray(
        node,
        "generics",
        at,
        "BRG9007",
        parseStringValue,
        false
      );
      if (!generics.ok) return generics;
      const trait = readOptionalString(node, "trait", at, "BRG9007");
      if (!trait.ok) return trait;
      const selfType = parseType(node.selfType, child(at, "selfType"));
      if (!selfType.ok) return selfType;
      const members = readArray(
        node,
        "members",
        at,
        "BRG9007",
        parseImplMember,
        false
      );
      if (!members.ok) return members;
      return ok({
        kind: "impl",
        attributes: attributes.value,
        isUnsafe: isUnsafe.value,
        generics: generics.value,
        ...(trait.value === undefined ? {} : { trait: trait.value }),
        selfType: selfType.value,
        members: members.value,
      });
    }
    case "use": {
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const path = readString(node, "path", at, "BRG9007");
      if (!path.ok) return path;
      return ok({ kind: "use", visibility: visibility.value, path: path.value });
    }
    case "const": {
      const name = readString(node, "name", at, "BRG9007");
      if (!name.ok) return name;
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const type = parseType(node.type, child(at, "type"));
      if (!type.ok) return type;
      const constValue = readString(node, "value", at, "BRG9007");
      if (!constValue.ok) return constValue;
      return ok({
        kind: "const",
        name: name.value,
        visibility: visibility.value,
        type: type.value,
        value: constValue.value,
      });
    }
    case "typeAlias": {
      const name = readString(node, "name", at, "BRG9007");
      if (!name.ok) return name;
      const visibility = parseVisibility(node, at);
      if (!visibility.ok) return visibility;
      const attributes = readAttributes(node, at);
      if (!attributes.ok) return attributes;
      const type = parseType(node.type, child(at, "type"));
      if (!type.ok) return type;
      return ok({
        kind: "typeAlias",
        name: name.value,
        visibility: visibility.value,
        attributes: attributes.value,
        type: type.value,
      });
    }
    case "verbatim": {
      const text = readString(node, "text", at, "BRG9007");
      return text.ok ? ok({ kind: "verbatim", text: text.value }) : text;
    }
    default:
      return fail(
        "BRG9007",
        `Unknown item kind: ${String(node.kind)}`,
        child(at, "kind")
      );
  }
};

/**
 * Validate a parsed JSON document as a raw module.
 * Every item is checked, so one pass reports every bad item.
 */
export const validateRawModule = (
  data: unknown,
  file: string
): Result<RawModule, Diagnostic[]> => {
  const root: SourceLocation = { file, pointer: "" };

  if (!isRecord(data)) {
    return error([
      createDiagnostic(
        "BRG9004",
        "error",
        `Raw module must be an object, got ${Array.isArray(data) ? "array" : typeof data}`,
        root
      ),
    ]);
  }

  const diagnostics: Diagnostic[] = [];

  const name = readString(data, "name", root, "BRG9005");
  if (!name.ok) {
    diagnostics.push(name.error);
  }

  if (data.content === undefined) {
    return name.ok ? ok({ name: name.value }) : error(diagnostics);
  }

  if (!Array.isArray(data.content)) {
    diagnostics.push(
      createDiagnostic(
        "BRG9006",
        "error",
        "'content' must be an array if present",
        child(root, "content")
      )
    );
    return error(diagnostics);
  }

  const items: RawItem[] = [];
  const contentAt = child(root, "content");
  data.content.forEach((value: unknown, i: number) => {
    const item = parseItem(value, child(contentAt, i));
    if (item.ok) {
      items.push(item.value);
    } else {
      diagnostics.push(item.error);
    }
  });

  if (diagnostics.length > 0 || !name.ok) {
    return error(diagnostics);
  }

  return ok({ name: name.value, content: items });
};

/**
 * Load and validate a raw module JSON file.
 */
export const loadRawModuleFile = (
  filePath: string
): Result<RawModule, Diagnostic[]> => {
  const at: SourceLocation = { file: filePath, pointer: "" };

  if (!fs.existsSync(filePath)) {
    return error([
      createDiagnostic(
        "BRG9001",
        "error",
        `Raw module file not found: ${filePath}`,
        at
      ),
    ]);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return error([
      createDiagnostic(
        "BRG9002",
        "error",
        `Failed to read raw module file: ${err instanceof Error ? err.message : String(err)}`,
        at
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return error([
      createDiagnostic(
        "BRG9003",
        "error",
        `Invalid JSON in raw module file: ${err instanceof Error ? err.message : String(err)}`,
        at
      ),
    ]);
  }

  return validateRawModule(parsed, filePath);
};
