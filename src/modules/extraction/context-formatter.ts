import type { RetrievalCandidate } from "../search/types.js";

export const DEFAULT_CONTEXT_TOKENS = 8192;
export const RESERVED_PROMPT_TOKENS = 500;
const CHARS_PER_TOKEN = 4;
const MIN_TRUNCATED_CHARS = 100;
const TRUNCATION_SLACK_CHARS = 50;
const SEPARATOR = `${"-".repeat(40)}\n`;
const OMITTED_NOTE = "\nПримечание: Некоторые документы не были включены из-за ограничения размера контекста.";
const SHORTENED_NOTE = "\nПримечание: Документы были сокращены из-за ограничения размера контекста.";
const MISSING = "Н/Д";

export interface FormatContextOptions {
  maxTokens?: number;
  reservedTokens?: number;
}

export interface FormattedContext {
  text: string;
  includedCount: number;
  truncated: boolean;
}

const buildHeader = (candidate: RetrievalCandidate, position: number): string => {
  const lines = [
    `Документ ${position}:`,
    `Источник: ${candidate.document_id}, страница ${candidate.page_number ?? MISSING}`,
    `Раздел: ${candidate.section ?? MISSING}`,
    `Тип: ${candidate.content_type ?? MISSING}`
  ];
  if (candidate.rerank_score !== null) {
    lines.push(`Оценка релевантности (ререйтинг): ${candidate.rerank_score.toFixed(4)}`);
  }
  if (candidate.score !== null) {
    lines.push(`Оценка релевантности: ${candidate.score.toFixed(4)}`);
  }
  return `${lines.join("\n")}\n`;
};

/**
 * Serializes candidates in ranked order with provenance, keeping the estimate
 * (4 characters per token) inside `maxTokens - reservedTokens`. The first
 * candidate that does not fit is cut short and the rest are dropped.
 */
export const formatContext = (
  candidates: RetrievalCandidate[],
  options: FormatContextOptions = {}
): FormattedContext => {
  const maxTokens = options.maxTokens ?? DEFAULT_CONTEXT_TOKENS;
  const available = maxTokens - (options.reservedTokens ?? RESERVED_PROMPT_TOKENS);
  const parts: string[] = [];
  let usedTokens = 0;
  let includedCount = 0;
  let truncated = false;

  for (const [index, candidate] of candidates.entries()) {
    if (usedTokens >= available) {
      parts.push(OMITTED_NOTE);
      truncated = true;
      break;
    }

    const header = buildHeader(candidate, index + 1);
    const estimatedTokens = (header.length + candidate.text.length) / CHARS_PER_TOKEN;

    if (estimatedTokens > available - usedTokens) {
      const availableChars =
        Math.floor((available - usedTokens) * CHARS_PER_TOKEN) - header.length - TRUNCATION_SLACK_CHARS;
      if (availableChars > MIN_TRUNCATED_CHARS) {
        parts.push(`${header}Текст:\n${candidate.text.slice(0, availableChars)}... [сокращено]\n${SEPARATOR}`);
        includedCount += 1;
      }
      parts.push(SHORTENED_NOTE);
      truncated = true;
      break;
    }

    parts.push(`${header}Текст:\n${candidate.text}\n${SEPARATOR}`);
    usedTokens += estimatedTokens;
    includedCount += 1;
  }

  return { text: parts.join("\n"), includedCount, truncated };
};
