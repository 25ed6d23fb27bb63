import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { JobCancelledError } from '../worker/job-errors';
import {
  ExtractionFailure,
  ExtractionInput,
  ExtractionOutput,
  ExtractionProvider,
} from './extraction-provider';
import { parseModelResponse } from './response-parser';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

const SYSTEM_PROMPT =
  'Extract all text from this document. Represent any tables as a JSON ' +
  "array of objects with 'headers' and 'rows' keys. When the document " +
  'contains tables, reply with a single ```json fenced block of the form ' +
  '{"text": string, "tables": [{"headers": string[], "rows": string[][]}]}.';

type ContentPart = OpenAI.Chat.Completions.ChatCompletionContentPart;

/**
 * Builds the user content part carrying the document: PDFs as an inline
 * `file` part, images as a base64 data URL.
 */
export function buildDocumentPart(input: ExtractionInput): ContentPart {
  const base64 = input.bytes.toString('base64');

  if (input.mediaType === 'application/pdf') {
    return {
      type: 'file',
      file: {
        filename: input.sourceName,
        file_data: `data:application/pdf;base64,${base64}`,
      },
    };
  }

  if (input.mediaType.startsWith('image/')) {
    return {
      type: 'image_url',
      image_url: { url: `data:${input.mediaType};base64,${base64}` },
    };
  }

  throw new ExtractionFailure(
    'unsupported',
    `Unsupported file type: ${input.mediaType}`,
  );
}

/**
 * Maps an SDK error to what the worker records. Messages are fixed
 * strings; the original error travels as `cause` for the logs only.
 */
export function classifyProviderError(error: unknown): Error {
  if (error instanceof ExtractionFailure || error instanceof JobCancelledError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new JobCancelledError();
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ExtractionFailure(
      'unavailable',
      'The extraction service could not be reached',
      { cause: error },
    );
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 0;
    if (status === 401 || status === 403) {
      return new ExtractionFailure(
        'auth',
        'The extraction service rejected the configured credentials',
        { cause: error },
      );
    }
    if (status === 429) {
      return new ExtractionFailure(
        'rate_limited',
        'The extraction service is rate limited, try again later',
        { cause: error },
      );
    }
    if (status >= 500) {
      return new ExtractionFailure(
        'unavailable',
        'The extraction service is temporarily unavailable',
        { cause: error },
      );
    }
    return new ExtractionFailure(
      'provider',
      `The extraction service refused the document (HTTP ${status})`,
      { cause: error },
    );
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * ExtractionProvider backed by OpenAI chat completions.
 *
 * One request per document at temperature 0; the whole reply becomes a
 * single page. Token usage is logged at debug level.
 */
export class OpenAiExtractionProvider extends ExtractionProvider {
  private readonly logger = new Logger(OpenAiExtractionProvider.name);

  constructor(
    private readonly client: OpenAI,
    private readonly model: string = DEFAULT_OPENAI_MODEL,
  ) {
    super();
  }

  async extract(
    input: ExtractionInput,
    signal: AbortSignal,
  ): Promise<ExtractionOutput> {
    const documentPart = buildDocumentPart(input);

    this.logger.debug(
      `Requesting extraction of "${input.sourceName}" (${input.mediaType}, ${input.bytes.length} bytes) from ${this.model}`,
    );

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: 0,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: [documentPart] },
          ],
        },
        { signal },
      );
    } catch (error) {
      throw classifyProviderError(error);
    }

    const usage = completion.usage;
    if (usage) {
      this.logger.debug(
        `Extraction of "${input.sourceName}" used ${usage.prompt_tokens} input and ${usage.completion_tokens} output tokens`,
      );
    }

    const text = completion.choices[0]?.message?.content ?? '';
    if (text.trim().length === 0) {
      throw new ExtractionFailure(
        'empty',
        'The extraction service returned an empty response',
      );
    }

    return { pages: [parseModelResponse(text)] };
  }
}
