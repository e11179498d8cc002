export const DEFAULT_EXTRACTION_PROMPT_TEMPLATE = [
  "Ты эксперт по анализу документации. Ниже приведены фрагменты документов заявки.",
  "",
  "{context}",
  "",
  "Найди в приведённых фрагментах значение параметра «{query}».",
  "Ответь строго в формате:",
  "{query}: <значение>",
  "Уверенность: <число от 0 до 1>",
  "",
  "Если во фрагментах нет нужной информации, ответь: Информация не найдена"
].join("\n");

export const RERANK_SYSTEM_PROMPT = [
  "You are a relevance scorer for document retrieval.",
  "For each numbered passage, rate how well it answers the query on a scale from 0 to 1.",
  "Return only valid JSON of the form {\"scores\": [number, ...]} with exactly one score per passage, in passage order.",
  "Do not include any explanation or extra keys."
].join(" ");

const RERANK_PASSAGE_MAX_CHARS = 2000;

export const buildRerankUserPrompt = (input: { query: string; texts: string[] }): string => {
  const passages = input.texts.map((text, index) => {
    const trimmed = text.length > RERANK_PASSAGE_MAX_CHARS ? `${text.slice(0, RERANK_PASSAGE_MAX_CHARS)}…` : text;
    return [`Passage ${index + 1}:`, trimmed].join("\n");
  });

  return [
    "Query:",
    input.query,
    "",
    `Score all ${input.texts.length} passages.`,
    "",
    passages.join("\n\n")
  ].join("\n");
};
