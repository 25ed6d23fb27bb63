/** What the provider is given for one job. */
export interface ExtractionInput {
  bytes: Buffer;
  mediaType: string;
  sourceName: string;
}

export interface ExtractedPageTable {
  headers: string[];
  rows: string[][];
}

export interface ExtractedPage {
  text: string;
  tables: ExtractedPageTable[];
}

export interface ExtractionOutput {
  pages: ExtractedPage[];
}

export type ExtractionFailureReason =
  | 'unsupported'
  | 'missing_file'
  | 'rate_limited'
  | 'auth'
  | 'unavailable'
  | 'malformed'
  | 'empty'
  | 'provider';

/**
 * An extraction that ended without a usable document. The message is
 * stored on the job and shown to clients, so it never carries provider
 * payloads, keys or stack traces.
 */
export class ExtractionFailure extends Error {
  constructor(
    readonly reason: ExtractionFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExtractionFailure';
  }
}

/**
 * ExtractionProvider — turns document bytes into pages of text and tables.
 *
 * Implementations must honour `signal`: once it aborts, stop work and
 * reject with JobCancelledError.
 *
 * @throws ExtractionFailure for anything the client should see
 */
export abstract class ExtractionProvider {
  abstract extract(
    input: ExtractionInput,
    signal: AbortSignal,
  ): Promise<ExtractionOutput>;
}
