import { z } from 'zod';
import { ExtractedPage } from './extraction-provider';

const FENCE_OPEN = '```json';
const FENCE_CLOSE = '```';

const cell = z.union([z.string(), z.number(), z.boolean(), z.null()]).transform(
  (value) => (value === null ? '' : String(value)),
);

const tableSchema = z.object({
  headers: z.array(cell),
  rows: z.array(z.array(cell)),
});

const responseSchema = z.object({
  text: z.string().optional(),
  tables: z.array(tableSchema).optional(),
});

/**
 * Interprets a model reply.
 *
 * A reply that, once trimmed, is a ```json fenced block is parsed as
 * `{ text?, tables? }`. Anything else, including a fenced block that is not
 * valid JSON or does not match that shape, is treated as plain text.
 */
export function parseModelResponse(raw: string): ExtractedPage {
  const trimmed = raw.trim();

  if (
    trimmed.length >= FENCE_OPEN.length + FENCE_CLOSE.length &&
    trimmed.startsWith(FENCE_OPEN) &&
    trimmed.endsWith(FENCE_CLOSE)
  ) {
    const body = trimmed.slice(FENCE_OPEN.length, -FENCE_CLOSE.length).trim();
    const parsed = responseSchema.safeParse(parseJson(body));
    if (parsed.success) {
      return {
        text: parsed.data.text ?? '',
        tables: parsed.data.tables ?? [],
      };
    }
  }

  return { text: trimmed, tables: [] };
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}
