const DEFAULT_ERROR_LOG_LIMIT = 500;

export function truncateForConsole(value: string, limit = DEFAULT_ERROR_LOG_LIMIT): string {
  if (value.length <= limit) {
    return value;
  }
  const slice = value.slice(0, limit);
  return `${slice}...[truncated ${value.length - limit} chars]`;
}

export function describeError(error: unknown, limit = DEFAULT_ERROR_LOG_LIMIT): string {
  const message = error instanceof Error ? error.message : String(error ?? 'Unknown error');
  return truncateForConsole(message, limit);
}
