const MAX_CAUSE_DEPTH = 3;

/** Exchange errors wrap the ccxt error as `cause`; the chain is logged a few levels deep. */
export function formatError(error: unknown, depth = 0): Record<string, unknown> {
  if (error instanceof Error) {
    const formatted: Record<string, unknown> = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
    if ('details' in error && typeof error.details === 'object' && error.details !== null) {
      formatted.details = error.details;
    }
    if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
      formatted.cause = formatError(error.cause, depth + 1);
    }
    return formatted;
  }
  if (typeof error === 'object' && error !== null) {
    try {
      return JSON.parse(JSON.stringify(error));
    } catch {
      return { message: String(error) };
    }
  }
  return { message: String(error) };
}

export function errorMessage(error: unknown) {
  if (error instanceof Error) return error.message;
  return String(error);
}
