import { EmptyInputError } from "../errors";
import type { RawTable } from "../../types/dataset";

const sanitizeText = (text: string): string =>
  text
    .replace(/^\uFEFF/, "")
    .replace(/\r\n/g, "\n")
    .replace(/\r/g, "\n");

const detectDelimiter = (headerLine: string): string => {
  const commaCount = (headerLine.match(/,/g) ?? []).length;
  const semicolonCount = (headerLine.match(/;/g) ?? []).length;
  return semicolonCount > commaCount ? ";" : ",";
};

export const parseDelimitedLine = (line: string, delimiter = ","): string[] => {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];
    if (char === '"') {
      const nextChar = line[index + 1];
      if (inQuotes && nextChar === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = "";
      continue;
    }

    current += char;
  }

  result.push(current.trim());
  return result;
};

// Short rows keep their length so that missing trailing cells stay missing.
export const parseCsvText = (text: string): RawTable => {
  const sanitized = sanitizeText(text);
  const lines = sanitized.split("\n").filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new EmptyInputError("CSV appears to be empty.");
  }

  const delimiter = detectDelimiter(lines[0]);
  const headers = parseDelimitedLine(lines[0], delimiter);
  const rows = lines.slice(1).map((line) => parseDelimitedLine(line, delimiter));

  return {
    headers,
    rows
  };
};
