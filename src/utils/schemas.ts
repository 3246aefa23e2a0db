import { getAddress, isAddress, isHex, size, type Address, type Hex } from 'viem';
import { z } from 'zod';

export const addressSchema = z.string()
  .refine((value) => isAddress(value, { strict: false }), { message: 'must be a 20-byte hex address' })
  .transform((value): Address => getAddress(value));

/** Non-negative integer given as a decimal string. */
export const amountSchema = z.string()
  .regex(/^\d+$/, 'must be a non-negative integer string')
  .transform((value) => BigInt(value));

export const hexSchema = z.string()
  .refine((value): value is Hex => isHex(value, { strict: true }), { message: 'must be 0x-prefixed hex' });

export const bytes32Schema = z.string()
  .transform((value) => value.toLowerCase())
  .refine((value): value is Hex => isHex(value, { strict: true }) && size(value) === 32, {
    message: 'must be a 32-byte hex value',
  });
