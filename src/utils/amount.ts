import { domainError, ErrorCode } from '../errors/taxonomy.js';

/**
 * Amounts are persisted as base-10 integer strings and handled as bigint in memory.
 */
export function parseAmount(value: string, field: string): bigint {
  let parsed: bigint;
  try {
    parsed = BigInt(value);
  } catch {
    throw domainError(ErrorCode.InvalidArgument, `${field} must be a valid integer string`, { field, value });
  }
  if (parsed < 0n) {
    throw domainError(ErrorCode.InvalidArgument, `${field} must be >= 0`, { field, value });
  }
  return parsed;
}

export function addAmount(current: string | undefined, delta: bigint, field: string): string {
  const base = parseAmount(current ?? '0', field);
  const next = base + delta;
  if (next < 0n) {
    throw domainError(ErrorCode.InvalidArgument, `${field} would be negative`, {
      field,
      current: base.toString(),
      delta: delta.toString(),
    });
  }
  return next.toString();
}
