/**
 * Call surface the proposal registry exposes to the execution queue.
 */
export const GovernorAbi = [
  {
    inputs: [{ name: 'proposalId', type: 'uint256' }],
    name: 'execute',
    outputs: [],
    stateMutability: 'nonpayable',
    type: 'function',
  },
] as const;
