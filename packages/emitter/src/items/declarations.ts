/**
 * Type and value declarations: structs, enums, aliases, constants, uses
 */

import type {
  RawConstItem,
  RawEnumItem,
  RawEnumVariant,
  RawField,
  RawStructItem,
  RawTypeAliasItem,
  RawUseItem,
  RawVerbatimItem,
} from "@bridgeforge/frontend";
import { emitAttributes } from "../core/attributes.js";
import {
  emitVisibility,
  escapeIdentifier,
  getIndent,
  indent,
  type EmitterContext,
} from "../emitter-types/index.js";
import { emitType } from "../types/emitter.js";

const emitGenerics = (generics: readonly string[] | undefined): string =>
  generics && generics.length > 0 ? `<${generics.join(", ")}>` : "";

const emitNamedField = (field: RawField, context: EmitterContext): string[] => {
  const ind = getIndent(context);
  const name = escapeIdentifier(field.name ?? "");
  return [
    ...emitAttributes(field.attributes, context),
    `${ind}${emitVisibility(field.visibility)}${name}: ${emitType(field.type)},`,
  ];
};

/**
 * Structs whose fields all lack names print in tuple form.
 */
export const emitStruct = (
  item: RawStructItem,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  const head = `${ind}${emitVisibility(item.visibility)}struct ${item.name}${emitGenerics(item.generics)}`;
  const lines = [...emitAttributes(item.attributes, context)];

  if (item.fields.length === 0) {
    lines.push(`${head} {}`);
  } else if (item.fields.every((field) => field.name === undefined)) {
    const fields = item.fields.map(
      (field) => `${emitVisibility(field.visibility)}${emitType(field.type)}`
    );
    lines.push(`${head}(${fields.join(", ")});`);
  } else {
    const fieldContext = indent(context);
    lines.push(`${head} {`);
    for (const field of item.fields) {
      lines.push(...emitNamedField(field, fieldContext));
    }
    lines.push(`${ind}}`);
  }

  return lines.join("\n");
};

const emitVariant = (
  variant: RawEnumVariant,
  context: EmitterContext
): string[] => {
  const ind = getIndent(context);
  const value =
    variant.discriminant === undefined ? "" : ` = ${variant.discriminant}`;
  return [
    ...emitAttributes(variant.attributes, context),
    `${ind}${variant.name}${value},`,
  ];
};

export const emitEnum = (item: RawEnumItem, context: EmitterContext): string => {
  const ind = getIndent(context);
  const head = `${ind}${emitVisibility(item.visibility)}enum ${item.name}`;
  const lines = [...emitAttributes(item.attributes, context)];

  if (item.variants.length === 0) {
    lines.push(`${head} {}`);
  } else {
    const variantContext = indent(context);
    lines.push(`${head} {`);
    for (const variant of item.variants) {
      lines.push(...emitVariant(variant, variantContext));
    }
    lines.push(`${ind}}`);
  }

  return lines.join("\n");
};

export const emitUse = (item: RawUseItem, context: EmitterContext): string =>
  `${getIndent(context)}${emitVisibility(item.visibility)}use ${item.path};`;

export const emitConst = (
  item: RawConstItem,
  context: EmitterContext
): string =>
  `${getIndent(context)}${emitVisibility(item.visibility)}const ${item.name}: ${emitType(item.type)} = ${item.value};`;

export const emitTypeAlias = (
  item: RawTypeAliasItem,
  context: EmitterContext
): string =>
  [
    ...emitAttributes(item.attributes, context),
    `${getIndent(context)}${emitVisibility(item.visibility)}type ${item.name} = ${emitType(item.type)};`,
  ].join("\n");

/**
 * Verbatim text is re-indented line by line
 */
export const emitVerbatim = (
  item: RawVerbatimItem,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  return item.text
    .split("\n")
    .map((line) => (line.length > 0 ? `${ind}${line}` : line))
    .join("\n");
};
