import type { ProposalStatus } from './governanceTypes.js';

export interface TallyInput {
  forVotes: bigint;
  againstVotes: bigint;
  snapshotSupply: bigint;
  quorumPercentage: number;
}

export interface TallyOutcome {
  status: Extract<ProposalStatus, 'passed' | 'failed'>;
  quorumRequired: bigint;
  quorumReached: boolean;
}

export const quorumFor = (snapshotSupply: bigint, quorumPercentage: number): bigint =>
  (snapshotSupply * BigInt(quorumPercentage)) / 100n;

/**
 * Quorum counts both sides. Ties fail.
 */
export function tallyOutcome(input: TallyInput): TallyOutcome {
  const quorumRequired = quorumFor(input.snapshotSupply, input.quorumPercentage);
  const quorumReached = input.forVotes + input.againstVotes >= quorumRequired;

  if (!quorumReached) {
    return { status: 'failed', quorumRequired, quorumReached };
  }

  return {
    status: input.forVotes > input.againstVotes ? 'passed' : 'failed',
    quorumRequired,
    quorumReached,
  };
}
