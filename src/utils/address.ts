import { getAddress, isAddress, type Address } from 'viem';
import { domainError, ErrorCode } from '../errors/taxonomy.js';

/**
 * Normalize an account to its checksummed form, rejecting anything that is not a 20-byte hex address.
 */
export function toAccount(value: string, field = 'account'): Address {
  if (!isAddress(value, { strict: false })) {
    throw domainError(ErrorCode.InvalidArgument, `${field} is not a valid address.`, { field, value });
  }
  return getAddress(value);
}
