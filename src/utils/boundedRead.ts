import { formatByteLimit } from './byteLimit';
import { AppError, IOError, ValidationError } from '../errors';

export interface BoundedReadOptions {
  limit: number;
  signal?: AbortSignal | undefined;
}

/**
 * Drains `source` into a single Buffer, failing as soon as the running total
 * passes `limit`. The chunk that crosses the limit is never retained and
 * nothing further is pulled from the source.
 */
export const readBounded = async (
  source: AsyncIterable<Uint8Array>,
  { limit, signal }: BoundedReadOptions
): Promise<Buffer> => {
  let chunks: Buffer[] = [];
  let total = 0;

  try {
    signal?.throwIfAborted();
    for await (const chunk of source) {
      signal?.throwIfAborted();
      total += chunk.byteLength;
      if (total > limit) {
        throw new ValidationError(`File exceeds the ${formatByteLimit(limit)} size limit.`);
      }
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
  } catch (error) {
    chunks = [];
    if (error instanceof AppError) throw error;
    throw new IOError(signal?.aborted ? 'Upload aborted' : 'Failed to read upload', { cause: error });
  }

  return Buffer.concat(chunks, total);
};
