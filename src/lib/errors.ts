/**
 * Error taxonomy for the survey pipeline plus the shared error formatter.
 *
 * Tile-level failures are recoverable and get collected; configuration and
 * empty-result errors stop the stage that raised them.
 */

// ==========================================
// ERROR CLASSES
// ==========================================

export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';
}

export class EmptyResultError extends Error {
  readonly name = 'EmptyResultError';

  constructor(
    message: string,
    readonly batch: { index: number; start: number; end: number }
  ) {
    super(message);
  }
}

export class RasterLimitError extends Error {
  readonly name = 'RasterLimitError';

  constructor(
    message: string,
    readonly pixels: number,
    readonly budget: number
  ) {
    super(message);
  }
}

export class TileTimeoutError extends Error {
  readonly name = 'TileTimeoutError';

  constructor(readonly tileIndex: number, readonly timeoutMs: number) {
    super(`Tile ${tileIndex} timed out after ${timeoutMs}ms`);
  }
}

export class PartialTileFailure extends Error {
  readonly name = 'PartialTileFailure';

  constructor(readonly tileIndex: number, cause: unknown) {
    super(`Tile ${tileIndex} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

// ==========================================
// FORMATTING
// ==========================================

const DEBUG_ERRORS =
  process.env.DEBUG_ERRORS === '1' ||
  process.env.DEBUG_ERRORS === 'true' ||
  process.env.DEBUG_ERRORS === 'yes';

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function readField(source: object, key: string): unknown {
  return key in source ? Reflect.get(source, key) : undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const parts: string[] = [`${error.name || 'Error'}: ${error.message || String(error)}`];
    const code = readField(error, 'code');
    if (code !== undefined) parts.push(`code=${String(code)}`);
    const status = readField(error, 'statusCode') ?? readField(error, 'status');
    if (status !== undefined) parts.push(`status=${String(status)}`);
    if (error instanceof EmptyResultError) parts.push(`batch=${safeStringify(error.batch)}`);
    if (error instanceof RasterLimitError) parts.push(`pixels=${error.pixels} budget=${error.budget}`);
    if (error.cause !== undefined) {
      parts.push(`cause=${formatError(error.cause)}`);
    }
    return parts.join(' | ');
  }
  return safeStringify(error);
}

export function logErrorDetails(prefix: string, error: unknown): void {
  console.warn(prefix + formatError(error));
  if (DEBUG_ERRORS && error instanceof Error && error.stack) {
    console.warn(error.stack);
  }
}
