import busboy from 'busboy';
import { Request } from 'express';
import { errorMessage, ValidationError } from '../errors';

export interface FilePart {
  fieldName: string;
  /** Empty when the client sent the part without a filename. */
  originalName: string;
  mimeType: string;
  buffer: Buffer;
}

export interface MultipartBody {
  /** Names of every part seen, including ones sent as plain fields because they carried no filename. */
  fieldNames: Set<string>;
  files: FilePart[];
}

interface BufferingPart extends Omit<FilePart, 'buffer'> {
  chunks: Buffer[];
}

export const isMultipart = (req: Request) => Boolean(req.is('multipart/form-data'));

/**
 * Buffers every file part of a multipart request, in request order, and notes which field
 * names appeared. A part larger than `maxFileBytes` is cut off at `maxFileBytes + 1` bytes
 * and the rest is drained, so the caller can reject that file alone.
 */
export const readMultipart = (req: Request, maxFileBytes: number) =>
  new Promise<MultipartBody>((resolve, reject) => {
    const contentType = req.headers['content-type'];
    if (!contentType) {
      reject(new ValidationError('Missing Content-Type header'));
      return;
    }

    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: { ...req.headers, 'content-type': contentType },
        defParamCharset: 'utf8',
        limits: { fileSize: maxFileBytes + 1 },
      });
    } catch (error) {
      reject(new ValidationError(`Malformed multipart request: ${errorMessage(error)}`));
      return;
    }

    const fieldNames = new Set<string>();
    const parts: BufferingPart[] = [];
    parser.on('field', (fieldName) => {
      fieldNames.add(fieldName);
    });
    parser.on('file', (fieldName, stream, info) => {
      fieldNames.add(fieldName);
      const part: BufferingPart = { fieldName, originalName: info.filename, mimeType: info.mimeType, chunks: [] };
      parts.push(part);
      stream.on('data', (chunk: Buffer) => {
        part.chunks.push(chunk);
      });
    });
    parser.on('error', (error: unknown) => {
      req.unpipe(parser);
      reject(new ValidationError(`Malformed multipart request: ${errorMessage(error)}`));
    });
    parser.on('close', () => {
      resolve({ fieldNames, files: parts.map(({ chunks, ...part }) => ({ ...part, buffer: Buffer.concat(chunks) })) });
    });

    req.pipe(parser);
  });
