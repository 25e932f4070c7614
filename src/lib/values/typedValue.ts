import type { TypedValue } from "../../types/dataset";

const numericPattern = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const fractionalPattern = /[.eE]/;

export const MISSING_CELL = "N/A";

export const isNumericText = (text: string): boolean => numericPattern.test(text);

export const parseNumericText = (text: string): number | null => {
  if (!isNumericText(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
};

export const coerceText = (text: string): TypedValue => {
  if (text === "true" || text === "false") {
    return { kind: "boolean", value: text === "true" };
  }
  const numeric = parseNumericText(text);
  if (numeric === null) {
    return { kind: "string", value: text };
  }
  if (fractionalPattern.test(text)) {
    return { kind: "float", value: numeric };
  }
  // integers past 2^53 keep their source digits
  return Number.isSafeInteger(numeric)
    ? { kind: "integer", value: numeric }
    : { kind: "string", value: text };
};

export const fromJsonValue = (value: unknown): TypedValue => {
  if (value === null || value === undefined) {
    return { kind: "null" };
  }
  if (typeof value === "string") {
    return coerceText(value);
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return { kind: "null" };
    }
    return Number.isSafeInteger(value)
      ? { kind: "integer", value }
      : { kind: "float", value };
  }
  if (typeof value === "boolean") {
    return { kind: "boolean", value };
  }
  // nested objects and arrays are shown as their JSON text
  return { kind: "string", value: JSON.stringify(value) };
};

export const renderValue = (value: TypedValue | undefined): string => {
  if (value === undefined) {
    return MISSING_CELL;
  }
  switch (value.kind) {
    case "string":
      return value.value;
    case "integer":
      return String(value.value);
    case "float":
      return value.value.toFixed(2);
    case "boolean":
      return value.value ? "true" : "false";
    case "null":
      return "null";
  }
};

export const formatNumber = (value: number): string =>
  Number.isInteger(value) ? String(value) : value.toFixed(2);
