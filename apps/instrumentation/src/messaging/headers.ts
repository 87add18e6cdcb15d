/**
 * amqplib types message properties and headers loosely; these narrow them.
 */

/**
 * Copy AMQP headers into a plain record
 */
export function toHeaderRecord(headers: unknown): Record<string, unknown> {
  if (typeof headers !== 'object' || headers === null || Array.isArray(headers)) {
    return {};
  }
  return Object.fromEntries(Object.entries(headers));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringOrUndefined(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * AMQP timestamps are seconds; publishers that set Date.now() send milliseconds
 */
export function timestampToMs(timestamp: unknown): number | undefined {
  if (typeof timestamp !== 'number' || !Number.isFinite(timestamp) || timestamp <= 0) {
    return undefined;
  }
  return timestamp < 1e12 ? timestamp * 1000 : timestamp;
}
