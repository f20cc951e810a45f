import { addAbortSignal } from 'stream';
import type { Request } from 'express';
import multer from 'multer';
import { readBounded } from '../utils/boundedRead';

type HandleFileCallback = (error?: unknown, info?: Partial<Express.Multer.File>) => void;

/**
 * Multer storage engine that keeps each file in memory, reading its stream
 * through {@link readBounded} so an upload never buffers past `limit`.
 */
export class BoundedMemoryStorage implements multer.StorageEngine {
  constructor(private readonly limit: number) {}

  _handleFile(req: Request, file: Express.Multer.File, callback: HandleFileCallback) {
    const controller = new AbortController();
    const onClose = () => {
      if (!req.complete) controller.abort(new Error('Client disconnected'));
    };
    req.once('close', onClose);

    const finish: HandleFileCallback = (error, info) => {
      req.off('close', onClose);
      callback(error, info);
    };

    void readBounded(addAbortSignal(controller.signal, file.stream), {
      limit: this.limit,
      signal: controller.signal,
    }).then((buffer) => finish(null, { buffer, size: buffer.byteLength }), finish);
  }

  _removeFile(_req: Request, file: Express.Multer.File, callback: (error: Error | null) => void) {
    file.buffer = Buffer.alloc(0);
    callback(null);
  }
}

export const createUploadMiddleware = (limit: number) =>
  multer({
    storage: new BoundedMemoryStorage(limit),
    limits: { files: 1 },
    // A part with an empty filename counts as no file at all.
    fileFilter: (_req, file, cb) => cb(null, Boolean(file.originalname)),
  }).single('file');
