import { describe, expect, it } from "vitest";
import {
  UNPARSED_CONFIDENCE,
  extractConfidenceMarker,
  isNotFoundAnswer,
  parseLlmResponse,
  parseStrict
} from "../../src/modules/extraction/response-parser.js";
import { ParseError } from "../../src/modules/search/errors.js";
import { NOT_FOUND_VALUE } from "../../src/modules/search/types.js";

describe("parseLlmResponse", () => {
  it("treats an empty answer as not found with zero confidence", () => {
    expect(parseLlmResponse("   ", "ИНН")).toEqual({
      value: NOT_FOUND_VALUE,
      confidence: 0,
      format: "empty",
      notFound: true
    });
  });

  it("recognises the not-found sentinel", () => {
    expect(parseLlmResponse("Информация не найдена", "ИНН")).toEqual({
      value: NOT_FOUND_VALUE,
      confidence: 0.1,
      format: "not_found",
      notFound: true
    });
    expect(parseLlmResponse("ИНН: не указан", "ИНН").notFound).toBe(true);
  });

  it("reads value and confidence from a JSON object", () => {
    expect(parseLlmResponse("{\"value\": \"ООО\", \"confidence\": 0.7}", "форма")).toEqual({
      value: "ООО",
      confidence: 0.7,
      format: "json",
      notFound: false
    });
  });

  it("reads a JSON key that matches the query", () => {
    const parsed = parseLlmResponse("{\"ИНН\": \"7700000000\", \"КПП\": \"770001001\"}", "ИНН организации");
    expect(parsed).toMatchObject({ value: "7700000000", confidence: 0.85, format: "json" });
  });

  it("reads a one-element JSON array", () => {
    expect(parseLlmResponse("[\"АО\"]", "форма")).toMatchObject({ value: "АО", confidence: 0.8, format: "json_array" });
  });

  it("finds a fenced JSON block inside prose", () => {
    const response = "Ответ модели\n```json\n{\"result\": \"ПАО\"}\n```";
    expect(parseLlmResponse(response, "форма")).toMatchObject({ value: "ПАО", confidence: 0.9, format: "json_block" });
  });

  it("reads a result prefix", () => {
    expect(parseLlmResponse("РЕЗУЛЬТАТ: 15 лет", "срок")).toMatchObject({
      value: "15 лет",
      confidence: 0.9,
      format: "result_prefix"
    });
  });

  it("lets a confidence marker override the key-value confidence", () => {
    const response = "Организационно-правовая форма: Общество с ограниченной ответственностью\nУверенность: 0.8";
    expect(parseLlmResponse(response, "Организационно-правовая форма")).toEqual({
      value: "Общество с ограниченной ответственностью",
      confidence: 0.8,
      format: "key_value_exact",
      notFound: false
    });
  });

  it("accepts a percentage confidence marker", () => {
    expect(parseLlmResponse("Срок действия: 5 лет\nConfidence: 80%", "Срок действия")).toMatchObject({
      value: "5 лет",
      confidence: 0.8
    });
  });

  it("falls back to a partial key match and then to a single colon line", () => {
    expect(parseLlmResponse("Юридический адрес: г. Москва", "адрес организации")).toMatchObject({
      value: "г. Москва",
      confidence: 0.85,
      format: "key_value_partial"
    });
    expect(parseLlmResponse("Номер: 1027700000000", "ОГРН")).toMatchObject({
      value: "1027700000000",
      confidence: 0.75,
      format: "key_value_single"
    });
  });

  it("joins numbered lines that mention the query", () => {
    expect(parseLlmResponse("1. Учредитель Иванов\n2. Учредитель Петров", "учредитель")).toMatchObject({
      value: "Учредитель Иванов; Учредитель Петров",
      confidence: 0.8,
      format: "structured_multiple"
    });
  });

  it("returns the raw answer with low confidence when nothing parses", () => {
    expect(parseLlmResponse("Компания зарегистрирована в 2010 году", "дата")).toEqual({
      value: "Компания зарегистрирована в 2010 году",
      confidence: UNPARSED_CONFIDENCE,
      format: "plain_text",
      notFound: false
    });
  });
});

describe("parseStrict", () => {
  it("throws ParseError for free text", () => {
    expect(() => parseStrict("просто текст", "дата")).toThrow(ParseError);
  });
});

describe("extractConfidenceMarker", () => {
  it("strips the marker line and scales values above one", () => {
    expect(extractConfidenceMarker("Ответ\nУверенность: 75")).toEqual({ body: "Ответ", confidence: 0.75 });
    expect(extractConfidenceMarker("Ответ")).toEqual({ body: "Ответ", confidence: null });
  });
});

describe("isNotFoundAnswer", () => {
  it("matches sentinel phrases case-insensitively", () => {
    expect(isNotFoundAnswer("ДАННЫЕ НЕ НАЙДЕНЫ в документах")).toBe(true);
    expect(isNotFoundAnswer("ООО Ромашка")).toBe(false);
  });
});
