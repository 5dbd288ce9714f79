/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { ErrorUtils, TranslationError } from "./errors.ts";
import { createLogger, type Logger } from "./logger.ts";

export interface TranslationRequest {
  sourceLang: string;
  targetLang: string;
}

/**
 * A batch translation backend. Implementations return exactly one result
 * per input, in input order.
 */
export interface Translator {
  translateTexts(
    texts: readonly string[],
    request: TranslationRequest,
  ): Promise<string[]>;
}

export const DEEPL_FREE_API_URL = "https://api-free.deepl.com/v2/translate";
export const DEEPL_PRO_API_URL = "https://api.deepl.com/v2/translate";

export const DeepLResponseSchema = z.object({
  translations: z.array(
    z.object({
      text: z.string(),
      detected_source_language: z.string().optional(),
    }),
  ),
});

export type DeepLResponse = z.infer<typeof DeepLResponseSchema>;

export interface DeepLTranslatorOptions {
  authKey: string;
  /** Overrides the endpoint picked from the key */
  apiUrl?: string;
  timeout?: number;
  maxBatchItems?: number;
  maxBatchChars?: number;
  client?: Pick<AxiosInstance, "post">;
  logger?: Logger;
}

/**
 * Free-tier keys end in ":fx" and are only accepted by the free endpoint
 */
export function resolveDeepLApiUrl(authKey: string, override?: string): string {
  if (override) return override;
  return authKey.endsWith(":fx") ? DEEPL_FREE_API_URL : DEEPL_PRO_API_URL;
}

/**
 * Split texts into request-sized batches, keeping order
 */
export function chunkTexts(
  texts: readonly string[],
  maxItems: number,
  maxChars: number,
): string[][] {
  const batches: string[][] = [];
  let current: string[] = [];
  let currentChars = 0;

  for (const text of texts) {
    if (
      current.length > 0 &&
      (current.length >= maxItems || currentChars + text.length > maxChars)
    ) {
      batches.push(current);
      current = [];
      currentChars = 0;
    }
    current.push(text);
    currentChars += text.length;
  }

  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}

function describeResponseBody(data: unknown): string {
  const body = typeof data === "string" ? data : JSON.stringify(data ?? "");
  return body.slice(0, 500);
}

/**
 * DeepL v2 `/translate` client
 */
export class DeepLTranslator implements Translator {
  private readonly authKey: string;
  private readonly apiUrl: string;
  private readonly timeout: number;
  private readonly maxBatchItems: number;
  private readonly maxBatchChars: number;
  private readonly client: Pick<AxiosInstance, "post">;
  private readonly logger: Logger;

  constructor(options: DeepLTranslatorOptions) {
    this.authKey = options.authKey;
    this.apiUrl = resolveDeepLApiUrl(options.authKey, options.apiUrl);
    this.timeout = options.timeout ?? 60_000;
    this.maxBatchItems = options.maxBatchItems ?? 40;
    this.maxBatchChars = options.maxBatchChars ?? 12_000;
    this.client = options.client ?? axios.create();
    this.logger = options.logger ?? createLogger("DeepL");
  }

  getApiUrl(): string {
    return this.apiUrl;
  }

  async translateTexts(
    texts: readonly string[],
    request: TranslationRequest,
  ): Promise<string[]> {
    if (texts.length === 0) {
      return [];
    }

    const results: string[] = [];
    const batches = chunkTexts(texts, this.maxBatchItems, this.maxBatchChars);

    for (const [index, batch] of batches.entries()) {
      this.logger.debug(`Translating batch ${index + 1}/${batches.length}`, {
        operation: "translateTexts",
        count: batch.length,
      });
      results.push(...(await this.translateBatch(batch, request)));
    }

    if (results.length !== texts.length) {
      throw new TranslationError(
        `DeepL returned ${results.length} translations for ${texts.length} inputs`,
      );
    }

    return results;
  }

  private async translateBatch(
    batch: readonly string[],
    request: TranslationRequest,
  ): Promise<string[]> {
    const form = new URLSearchParams();
    form.append("target_lang", request.targetLang.toUpperCase());
    form.append("source_lang", request.sourceLang.toUpperCase());
    form.append("preserve_formatting", "1");
    for (const text of batch) {
      form.append("text", text);
    }

    let data: unknown;
    try {
      const response = await this.client.post<unknown>(this.apiUrl, form.toString(), {
        headers: {
          Authorization: `DeepL-Auth-Key ${this.authKey}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        timeout: this.timeout,
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const detail = describeResponseBody(error.response.data);
        throw new TranslationError(
          `DeepL API error (${error.response.status}). Response: ${detail}`,
          { status: error.response.status, responseBody: detail, cause: error },
        );
      }
      throw new TranslationError(
        `DeepL API connection error: ${ErrorUtils.getErrorMessage(error)}`,
        { cause: ErrorUtils.toError(error) },
      );
    }

    const parsed = DeepLResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TranslationError(
        "Unexpected DeepL response format (missing translations)",
        { responseBody: describeResponseBody(data) },
      );
    }

    return parsed.data.translations.map((translation) => translation.text);
  }
}
