export class TruncatedReadError extends Error {
  readonly path: string;
  readonly expected: number;
  readonly received: number;

  constructor(path: string, expected: number, received: number) {
    super(`File ended after ${received} of ${expected} bytes: ${path}`);
    this.name = 'TruncatedReadError';
    this.path = path;
    this.expected = expected;
    this.received = received;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const describeError = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};

export const errorCode = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};
