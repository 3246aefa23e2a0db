import { zeroAddress } from 'viem';
import { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const DEFAULT_QUORUM_PERCENTAGE = 4;

export const createDefaultState = (): AppState => ({
  governance: {
    proposalCount: 0,
    proposals: {},
    votes: {},
    quorumPercentage: DEFAULT_QUORUM_PERCENTAGE,
    executor: zeroAddress,
    executorHandedOff: false,
  },
  timelock: {
    minDelay: 0,
    operations: {},
    metadata: {},
  },
  roles: {
    members: {},
  },
  token: {
    minter: zeroAddress,
    maxSupply: '0',
    totalSupply: '0',
    balances: {},
    checkpoints: {},
    supplyCheckpoints: [],
  },
  native: {},
  deployment: null,
  metrics: {
    startedAt: isoNow(),
    transactionsCommitted: 0,
  },
});
