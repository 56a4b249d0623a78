/**
 * Bind Value Object
 *
 * Positional values for `?` placeholders and the one-character type tag
 * that tells the driver how to serialize each of them.
 */

import { BindTypeError } from "../errors/index.js";

export type BindValue = boolean | number | bigint | string;

export type BindTypeTag = "i" | "d" | "s";

export const BindTypeTagValues = {
  INTEGER: "i" as const,
  FLOAT: "d" as const,
  STRING: "s" as const,
};

export function isBindTypeTag(tag: string): tag is BindTypeTag {
  return Object.values(BindTypeTagValues).some((value) => value === tag);
}

/**
 * Booleans and whole numbers share the integer tag.
 */
export function bindTypeTag(value: unknown, position = 0): BindTypeTag {
  switch (typeof value) {
    case "boolean":
    case "bigint":
      return BindTypeTagValues.INTEGER;
    case "number":
      return Number.isInteger(value)
        ? BindTypeTagValues.INTEGER
        : BindTypeTagValues.FLOAT;
    case "string":
      return BindTypeTagValues.STRING;
    default:
      throw new BindTypeError(position, describeKind(value));
  }
}

export function buildTypeString(values: readonly unknown[]): string {
  return values.map((value, i) => bindTypeTag(value, i)).join("");
}

export function isBindValue(value: unknown): value is BindValue {
  return (
    typeof value === "boolean" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "string"
  );
}

function describeKind(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  return typeof value;
}
