/**
 * AnnotationClient: external keyword bracketing over a Messages-style API
 *
 * Implements the TextAnnotator interface. One request per phrase, no
 * retry: any failure is raised as AnnotationError and ends the run.
 */

import type { TextAnnotator } from "@/interfaces";
import type {
  AnnotationConfig,
  AnnotationContentBlock,
  AnnotationResponse,
  HttpRequestFn,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  ANNOTATION_API_VERSION,
  ANNOTATION_MAX_TOKENS,
  ANNOTATION_SYSTEM_PROMPT,
  ANNOTATION_TIMEOUT_MS,
  SURROUNDING_QUOTES,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Error thrown when the annotation service cannot annotate a phrase.
 */
export class AnnotationError extends Error {
  public readonly word: string;
  public readonly phrase: string;

  constructor(word: string, phrase: string, reason: string) {
    super(`Annotation failed for "${word}" in "${phrase}": ${reason}`);
    this.name = "AnnotationError";
    this.word = word;
    this.phrase = phrase;
  }
}

export interface AnnotationClientConfig extends AnnotationConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
  timeoutMs?: number;
}

function isContentBlock(value: unknown): value is AnnotationContentBlock {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string"
  );
}

function isAnnotationResponse(value: unknown): value is AnnotationResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "content" in value &&
    Array.isArray(value.content) &&
    value.content.every(isContentBlock)
  );
}

/**
 * Trim and remove quote characters wrapping the whole text.
 *
 * Only paired quotes (one at each end) are removed, so a phrase ending
 * in a quotation keeps its closing mark.
 *
 * @example
 * stripSurroundingQuotes(' "[Hunden] skäller." ') // "[Hunden] skäller."
 * stripSurroundingQuotes('Han sa "[hund]"') // 'Han sa "[hund]"'
 */
export function stripSurroundingQuotes(text: string): string {
  let result = text.trim();
  while (
    result.length >= 2 &&
    SURROUNDING_QUOTES.includes(result[0]) &&
    SURROUNDING_QUOTES.includes(result[result.length - 1])
  ) {
    result = result.slice(1, -1).trim();
  }
  return result;
}

/**
 * Pick the annotated phrase out of a service response
 *
 * @returns The first text block, cleaned, or null when there is none
 */
export function extractAnnotatedText(response: AnnotationResponse): string | null {
  const block = response.content.find(
    (item) => item.type === "text" && typeof item.text === "string",
  );
  if (!block?.text) {
    return null;
  }
  const text = stripSurroundingQuotes(block.text);
  return text.length > 0 ? text : null;
}

export function buildAnnotationPrompt(word: string, phrase: string): string {
  return `Base word: ${word}\nSentence: ${phrase}`;
}

export class AnnotationClient implements TextAnnotator {
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: AnnotationClientConfig) {
    if (!config.apiKey) {
      throw new Error(
        "Annotation configuration missing: ANNOTATION_API_KEY. " +
          "Set it in the environment or .env to use --annotate.",
      );
    }

    this.apiUrl = config.apiUrl;
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs ?? ANNOTATION_TIMEOUT_MS;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("AnnotationClient initialized", { apiUrl: this.apiUrl, model: this.model });
  }

  /**
   * @throws {AnnotationError} On transport failure, unexpected response shape or empty text
   */
  async annotate(word: string, phrase: string): Promise<string> {
    let response: unknown;
    try {
      response = await this.httpRequest<unknown>({
        method: "POST",
        url: this.apiUrl,
        headers: {
          "x-api-key": this.apiKey,
          "anthropic-version": ANNOTATION_API_VERSION,
        },
        json: {
          model: this.model,
          max_tokens: ANNOTATION_MAX_TOKENS,
          system: ANNOTATION_SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildAnnotationPrompt(word, phrase) }],
        },
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new AnnotationError(
        word,
        phrase,
        error instanceof Error ? error.message : String(error),
      );
    }

    if (!isAnnotationResponse(response)) {
      throw new AnnotationError(word, phrase, "unexpected response shape");
    }

    const text = extractAnnotatedText(response);
    if (text === null) {
      throw new AnnotationError(word, phrase, "response contained no text");
    }
    return text;
  }
}
