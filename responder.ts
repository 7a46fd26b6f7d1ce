import { randomBytes } from 'crypto';
import type { ServerResponse } from 'http';
import { pipeline, Readable } from 'stream';
import { promisify } from 'util';
import type { ByteRange, MediaEntry, RangeRequestOutcome } from './types';
import type { CatalogIndex } from './catalog';
import { describeError, errorCode } from './errors';
import { DEFAULT_CHUNK_SIZE, openMediaFile, readFileInterval, readInterval } from './fileReader';
import {
  formatContentRange,
  formatUnsatisfiedRange,
  ifRangeMatches,
  parseRange,
  rangeSize,
} from './range';
import { getMimeType } from './utils/mediaUtils';

const streamPipeline = promisify(pipeline);

export type HeaderMap = Record<string, string | number>;

export interface MediaRequest {
  range?: string;
  ifRange?: string;
}

export interface PlanOptions {
  maxRanges?: number;
  createBoundary?: () => string;
}

export interface MultipartPart {
  header: string;
  range: ByteRange;
}

export type ResponseBody =
  | { type: 'empty' }
  | { type: 'json'; payload: Record<string, unknown> }
  | { type: 'interval'; range: ByteRange }
  | { type: 'multipart'; parts: MultipartPart[]; closing: string };

export interface MediaResponsePlan {
  key: string;
  status: 200 | 206 | 404 | 416;
  headers: HeaderMap;
  body: ResponseBody;
  entry: MediaEntry | null;
}

export interface SendOptions {
  method?: string;
  chunkSize?: number;
}

export const createBoundary = (): string => randomBytes(24).toString('hex');

export const entityTag = (entry: MediaEntry): string =>
  `"${entry.size.toString(16)}-${Math.floor(entry.lastModified).toString(16)}"`;

const baseHeaders = (entry: MediaEntry): HeaderMap => ({
  'Accept-Ranges': 'bytes',
  'Last-Modified': new Date(entry.lastModified).toUTCString(),
  ETag: entityTag(entry),
});

// Range header handling, after If-Range has had its say.
function interpret(entry: MediaEntry, request: MediaRequest, options: PlanOptions): RangeRequestOutcome {
  if (entry.size === 0) return { type: 'full' };
  if (request.range && request.ifRange) {
    const validators = { etag: entityTag(entry), lastModified: entry.lastModified };
    if (!ifRangeMatches(request.ifRange, validators)) return { type: 'full' };
  }
  return parseRange(request.range, entry.size, { maxRanges: options.maxRanges });
}

function planMultipart(entry: MediaEntry, ranges: ByteRange[], boundary: string): MediaResponsePlan {
  const mimeType = getMimeType(entry.kind);
  const parts = ranges.map((range, i) => ({
    header:
      `${i === 0 ? '' : '\r\n'}--${boundary}\r\n` +
      `Content-Type: ${mimeType}\r\n` +
      `Content-Range: ${formatContentRange(range)}\r\n\r\n`,
    range,
  }));
  const closing = `\r\n--${boundary}--\r\n`;
  const contentLength = parts.reduce(
    (total, part) => total + Buffer.byteLength(part.header) + rangeSize(part.range),
    Buffer.byteLength(closing)
  );

  return {
    key: entry.key,
    status: 206,
    headers: {
      ...baseHeaders(entry),
      'Content-Type': `multipart/byteranges; boundary=${boundary}`,
      'Content-Length': contentLength,
    },
    body: { type: 'multipart', parts, closing },
    entry,
  };
}

/**
 * Works out the response for `GET /media/<key>`: resolve the entry, interpret
 * the range headers against its current size, then pick the response shape.
 * Nothing is read from the file here.
 */
export async function planMediaResponse(
  catalog: Pick<CatalogIndex, 'resolve'>,
  key: string,
  request: MediaRequest,
  options: PlanOptions = {}
): Promise<MediaResponsePlan> {
  const entry = await catalog.resolve(key);
  if (!entry) {
    return {
      key,
      status: 404,
      headers: {},
      body: { type: 'json', payload: { error: 'Media not found' } },
      entry: null,
    };
  }

  const outcome = interpret(entry, request, options);
  const mimeType = getMimeType(entry.kind);

  switch (outcome.type) {
    case 'full':
      return {
        key,
        status: 200,
        headers: { ...baseHeaders(entry), 'Content-Type': mimeType, 'Content-Length': entry.size },
        body:
          entry.size === 0
            ? { type: 'empty' }
            : { type: 'interval', range: { start: 0, end: entry.size - 1, length: entry.size } },
        entry,
      };

    case 'partial': {
      const [only] = outcome.ranges;
      if (only && outcome.ranges.length === 1) {
        return {
          key,
          status: 206,
          headers: {
            ...baseHeaders(entry),
            'Content-Type': mimeType,
            'Content-Length': rangeSize(only),
            'Content-Range': formatContentRange(only),
          },
          body: { type: 'interval', range: only },
          entry,
        };
      }
      return planMultipart(entry, outcome.ranges, (options.createBoundary ?? createBoundary)());
    }

    case 'unsatisfiable':
      return {
        key,
        status: 416,
        headers: {
          ...baseHeaders(entry),
          'Content-Range': formatUnsatisfiedRange(outcome.length),
          'Content-Length': 0,
        },
        body: { type: 'empty' },
        entry,
      };
  }
}

async function* multipartBody(
  path: string,
  parts: MultipartPart[],
  closing: string,
  chunkSize: number
): AsyncGenerator<Buffer, void, undefined> {
  const file = await openMediaFile(path);
  try {
    for (const part of parts) {
      yield Buffer.from(part.header);
      yield* readInterval(file, part.range.start, part.range.end, chunkSize);
    }
    yield Buffer.from(closing);
  } finally {
    await file.close();
  }
}

/** Lazy body for a plan with file content; null when there is nothing to read. */
export function createBodyStream(
  plan: MediaResponsePlan,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): AsyncGenerator<Buffer, void, undefined> | null {
  if (!plan.entry) return null;
  const { body } = plan;
  switch (body.type) {
    case 'interval':
      return readFileInterval(plan.entry.absolutePath, body.range.start, body.range.end, chunkSize);
    case 'multipart':
      return multipartBody(plan.entry.absolutePath, body.parts, body.closing, chunkSize);
    default:
      return null;
  }
}

/**
 * Writes the plan to `res`: headers first, then the body. Once bytes are on
 * the wire a failure cannot be reported to the client, so the response is
 * destroyed (the client sees a short read) and the failure is logged.
 */
export async function sendMediaResponse(
  res: ServerResponse,
  plan: MediaResponsePlan,
  options: SendOptions = {}
): Promise<void> {
  const { body } = plan;

  if (body.type === 'json') {
    const payload = JSON.stringify(body.payload);
    res.writeHead(plan.status, {
      ...plan.headers,
      'Content-Type': 'application/json; charset=utf-8',
      'Content-Length': Buffer.byteLength(payload),
    });
    res.end(payload);
    return;
  }

  res.writeHead(plan.status, plan.headers);
  const stream = options.method === 'HEAD' ? null : createBodyStream(plan, options.chunkSize);
  if (!stream) {
    res.end();
    return;
  }

  try {
    await streamPipeline(Readable.from(stream), res);
  } catch (err) {
    if (errorCode(err) === 'ERR_STREAM_PREMATURE_CLOSE') {
      console.log(`[Stream] Client closed ${plan.key} before the response finished`);
    } else {
      console.error(`[Stream] Transport failure on ${plan.key}: ${describeError(err)}`);
    }
  }
}
