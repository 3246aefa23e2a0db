/**
 * Content-addressed operation ids.
 *
 *   id = keccak256(abi.encode(address target, uint256 value, bytes data, bytes32 predecessor, bytes32 salt))
 *
 * The encoding is standard Solidity ABI encoding, so any verifier with an ABI
 * library can recompute an id.
 */

import { encodeAbiParameters, keccak256, parseAbiParameters, type Hex } from 'viem';
import type { OperationCall } from './timelockTypes.js';

const operationParameters = parseAbiParameters(
  'address target, uint256 value, bytes data, bytes32 predecessor, bytes32 salt',
);

export function encodeOperation(call: OperationCall): Hex {
  return encodeAbiParameters(operationParameters, [
    call.target,
    call.value,
    call.data,
    call.predecessor,
    call.salt,
  ]);
}

export function hashOperation(call: OperationCall): Hex {
  return keccak256(encodeOperation(call));
}
