import { ParseError } from "../search/errors.js";
import { NOT_FOUND_VALUE } from "../search/types.js";

export type ResponseFormat =
  | "empty"
  | "not_found"
  | "json"
  | "json_array"
  | "json_block"
  | "result_prefix"
  | "key_value_exact"
  | "key_value_partial"
  | "key_value_single"
  | "structured_single"
  | "structured_multiple"
  | "plain_text";

export interface ParsedLlmResponse {
  value: string;
  confidence: number;
  format: ResponseFormat;
  notFound: boolean;
}

/** Confidence given to an answer no convention could parse. */
export const UNPARSED_CONFIDENCE = 0.3;

const NOT_FOUND_PATTERNS = [
  "информация не найдена",
  "данные не найдены",
  "не удалось найти",
  "отсутствует информация",
  "нет данных",
  "не указан",
  "не определен",
  "информация отсутствует"
];

const RESULT_PREFIXES = ["РЕЗУЛЬТАТ", "ОТВЕТ", "ЗНАЧЕНИЕ"];

const JSON_BLOCK_PATTERNS = [/```json\s*([\s\S]*?)\s*```/g, /```\s*([\s\S]*?)\s*```/g, /\{[^{}]*\}/g, /\{[\s\S]*?\}/g];

const STRUCTURED_PATTERNS = [/^\d+\.\s*(.+)$/, /^-\s*(.+)$/, /^•\s*(.+)$/, /^\*\s*(.+)$/];

const CONFIDENCE_MARKER = /^\s*(?:уверенность|confidence)\s*:\s*(\d+(?:[.,]\d+)?)\s*(%?)\s*$/gim;

type Match = Pick<ParsedLlmResponse, "value" | "confidence" | "format">;

export const isNotFoundAnswer = (text: string): boolean => {
  const lower = text.toLowerCase();
  return NOT_FOUND_PATTERNS.some((pattern) => lower.includes(pattern));
};

const clampConfidence = (value: number): number => Math.min(1, Math.max(0, value));

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const stringify = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
};

const readConfidence = (value: unknown, fallback: number): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return clampConfidence(value);
  }
  if (typeof value === "string" && value.trim().length > 0 && Number.isFinite(Number(value))) {
    return clampConfidence(Number(value));
  }
  return fallback;
};

/** Pulls `Уверенность: 0.8` / `Confidence: 80%` lines out of the answer. */
export const extractConfidenceMarker = (response: string): { body: string; confidence: number | null } => {
  let confidence: number | null = null;
  const body = response.replace(CONFIDENCE_MARKER, (_line, rawNumber: string, percent: string) => {
    const parsed = Number(rawNumber.replace(",", "."));
    const scaled = percent === "%" || parsed > 1 ? parsed / 100 : parsed;
    confidence = clampConfidence(scaled);
    return "";
  });
  return { body: body.trim(), confidence };
};

const parseJsonValue = (text: string, query: string): Match | null => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }

  if (Array.isArray(data)) {
    return data.length === 1 ? { value: stringify(data[0]), confidence: 0.8, format: "json_array" } : null;
  }
  if (!data || typeof data !== "object") {
    return null;
  }

  const record = new Map(Object.entries(data));
  for (const key of ["value", "result"]) {
    if (record.has(key)) {
      return {
        value: stringify(record.get(key)),
        confidence: readConfidence(record.get("confidence"), 0.9),
        format: "json"
      };
    }
  }

  const queryLower = query.toLowerCase();
  for (const [key, value] of record) {
    const keyLower = key.toLowerCase();
    if (queryLower.includes(keyLower) || keyLower.includes(queryLower)) {
      return { value: stringify(value), confidence: 0.85, format: "json" };
    }
  }

  if (record.size === 1) {
    const [only] = record.values();
    return { value: stringify(only), confidence: 0.8, format: "json" };
  }

  return null;
};

const parseJsonBlock = (text: string, query: string): Match | null => {
  for (const pattern of JSON_BLOCK_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const candidate = match[1] ?? match[0];
      const parsed = parseJsonValue(candidate, query);
      if (parsed) {
        return { ...parsed, format: "json_block" };
      }
    }
  }
  return null;
};

const parseResultPrefix = (text: string): Match | null => {
  for (const prefix of RESULT_PREFIXES) {
    const match = new RegExp(`${prefix}:\\s*(.+)`, "im").exec(text);
    if (match) {
      return { value: match[1].trim(), confidence: 0.9, format: "result_prefix" };
    }
  }
  return null;
};

const parseKeyValue = (text: string, query: string): Match | null => {
  const lines = text.split("\n");

  const exact = new RegExp(`${escapeRegExp(query)}\\s*:\\s*(.+)`, "i");
  for (const line of lines) {
    const match = exact.exec(line);
    const value = match?.[1].trim();
    if (value && !isNotFoundAnswer(value)) {
      return { value, confidence: 0.95, format: "key_value_exact" };
    }
  }

  const queryWords = query.toLowerCase().split(/\s+/).filter(Boolean);
  for (const line of lines) {
    const separator = line.indexOf(":");
    if (separator < 0) {
      continue;
    }
    const key = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    if (value && queryWords.some((word) => key.includes(word)) && !isNotFoundAnswer(value)) {
      return { value, confidence: 0.85, format: "key_value_partial" };
    }
  }

  const colonLines = lines.filter((line) => line.includes(":") && line.trim().length > 0);
  if (colonLines.length === 1) {
    const line = colonLines[0];
    const value = line.slice(line.indexOf(":") + 1).trim();
    if (value && !isNotFoundAnswer(value)) {
      return { value, confidence: 0.75, format: "key_value_single" };
    }
  }

  return null;
};

const parseStructured = (text: string, query: string): Match | null => {
  const queryWords = query.toLowerCase().split(/\s+/).filter(Boolean);
  const values: string[] = [];

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    for (const pattern of STRUCTURED_PATTERNS) {
      const match = pattern.exec(line);
      if (!match) {
        continue;
      }
      const value = match[1].trim();
      if (value && !isNotFoundAnswer(value) && queryWords.some((word) => value.toLowerCase().includes(word))) {
        values.push(value);
        break;
      }
    }
  }

  if (values.length === 1) {
    return { value: values[0], confidence: 0.85, format: "structured_single" };
  }
  if (values.length > 1) {
    return { value: values.join("; "), confidence: 0.8, format: "structured_multiple" };
  }
  return null;
};

/** Tries every known answer convention in order; throws when none applies. */
export const parseStrict = (body: string, query: string): Match => {
  const match =
    parseJsonValue(body, query) ??
    parseJsonBlock(body, query) ??
    parseResultPrefix(body) ??
    parseKeyValue(body, query) ??
    parseStructured(body, query);
  if (!match) {
    throw new ParseError("LLM response matches no known answer format");
  }
  return match;
};

export const parseLlmResponse = (response: string, query: string): ParsedLlmResponse => {
  const { body, confidence: markerConfidence } = extractConfidenceMarker(response);

  if (body.length === 0) {
    return { value: NOT_FOUND_VALUE, confidence: 0, format: "empty", notFound: true };
  }
  if (isNotFoundAnswer(body)) {
    return { value: NOT_FOUND_VALUE, confidence: 0.1, format: "not_found", notFound: true };
  }

  try {
    const match = parseStrict(body, query);
    return { ...match, confidence: markerConfidence ?? match.confidence, notFound: false };
  } catch (error) {
    if (!(error instanceof ParseError)) {
      throw error;
    }
    return { value: body, confidence: UNPARSED_CONFIDENCE, format: "plain_text", notFound: false };
  }
};
