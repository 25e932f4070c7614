import { readFileSync } from "fs";
import { extname } from "path";
import { describeError, FormatError } from "../errors";
import type { ParsedInput } from "../../types/dataset";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer } from "./parseXlsx";

export const SUPPORTED_EXTENSIONS = [".json", ".csv", ".xlsx"] as const;

export const fileExtension = (path: string): string => extname(path).toLowerCase();

const numberToken = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

// JSON.parse rounds integer literals past 2^53, so those are read as strings.
const quoteUnsafeIntegers = (text: string): string => {
  let result = "";
  let index = 0;
  let inString = false;

  while (index < text.length) {
    const char = text[index];
    if (inString) {
      if (char === "\\") {
        result += text.slice(index, index + 2);
        index += 2;
        continue;
      }
      inString = char !== '"';
      result += char;
      index += 1;
      continue;
    }

    if (char === '"') {
      inString = true;
      result += char;
      index += 1;
      continue;
    }

    numberToken.lastIndex = index;
    const match = char === "-" || (char >= "0" && char <= "9") ? numberToken.exec(text) : null;
    if (match) {
      const token = match[0];
      const isUnsafeInteger = !/[.eE]/.test(token) && !Number.isSafeInteger(Number(token));
      result += isUnsafeInteger ? `"${token}"` : token;
      index += token.length;
      continue;
    }

    result += char;
    index += 1;
  }
  return result;
};

export const parseJsonText = (text: string, source?: string): ParsedInput => {
  try {
    return { format: "json", value: JSON.parse(quoteUnsafeIntegers(text.replace(/^\uFEFF/, ""))) };
  } catch (error) {
    throw new FormatError(`Invalid JSON: ${describeError(error)}`, source);
  }
};

export const parseContent = (path: string, content: Buffer): ParsedInput => {
  const extension = fileExtension(path);
  if (extension === ".json") {
    return parseJsonText(content.toString("utf8"), path);
  }

  if (extension === ".csv") {
    return { format: "tabular", tables: [parseCsvText(content.toString("utf8"))] };
  }

  if (extension === ".xlsx") {
    const tables = parseXlsxBuffer(content);
    if (tables.length === 0) {
      throw new FormatError("No sheets detected in the XLSX file.", path);
    }
    return { format: "tabular", tables };
  }

  throw new FormatError(
    `Unsupported file type "${extension || path}". Supported: ${SUPPORTED_EXTENSIONS.join(", ")}.`,
    path
  );
};

export const readSourceFile = (path: string): { content: Buffer; input: ParsedInput } => {
  const content = readFileSync(path);
  return { content, input: parseContent(path, content) };
};
