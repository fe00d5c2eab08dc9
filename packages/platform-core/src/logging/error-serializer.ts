export interface SerializedError {
  message: string;
  stack?: string;
  name?: string;
  cause?: SerializedError;
  code?: string;
  details?: Record<string, unknown>;
}

function readStringField(source: object, field: string): string | undefined {
  const value: unknown = Reflect.get(source, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Flatten an error (and its cause chain) into a plain object winston can log.
 */
export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const serialized: SerializedError = {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };

    const code = readStringField(error, 'code');
    if (code) {
      serialized.code = code;
    }

    if (error.cause !== undefined) {
      serialized.cause = serializeError(error.cause);
    }

    const details: unknown = Reflect.get(error, 'details');
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      serialized.details = Object.fromEntries(Object.entries(details));
    }

    return serialized;
  }

  if (typeof error === 'string') {
    return { message: error };
  }

  if (error && typeof error === 'object') {
    return {
      message: readStringField(error, 'message') ?? readStringField(error, 'error') ?? JSON.stringify(error),
      name: readStringField(error, 'name'),
      code: readStringField(error, 'code'),
    };
  }

  return { message: String(error) };
}
