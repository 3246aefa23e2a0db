import type { Address } from 'viem';
import { bootstrapGovernance, GenesisInput, parseGenesis } from '../src/bootstrap.js';
import { AppConfig } from '../src/config.js';
import { ManualClock } from '../src/infra/ledger/clock.js';
import { EventLogger } from '../src/infra/logger.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { createGovernanceSystem, GovernanceSystem, SystemSettings } from '../src/system.js';
import { DAY_SECONDS } from '../src/utils/time.js';

// Digit-only addresses are already in checksum form.
export const DEPLOYER: Address = '0x0000000000000000000000000000000000000900';
export const V1: Address = '0x0000000000000000000000000000000000001001';
export const P: Address = '0x0000000000000000000000000000000000001002';
export const V3: Address = '0x0000000000000000000000000000000000001003';
export const FILLER: Address = '0x0000000000000000000000000000000000001004';
export const TREASURY: Address = '0x0000000000000000000000000000000000002000';
export const RECIPIENT: Address = '0x0000000000000000000000000000000000002001';
export const MULTISIG: Address = '0x0000000000000000000000000000000000003001';
export const EXECUTOR: Address = '0x0000000000000000000000000000000000003002';
export const OUTSIDER: Address = '0x0000000000000000000000000000000000004004';

export const T0 = 1_700_000_000;
export const VOTING_PERIOD = 7 * DAY_SECONDS;
export const MIN_DELAY = 300;

/** Total supply 100,000: P holds 2,000 and the quorum at 4% is 4,000. */
export const scenarioGenesis: GenesisInput = {
  holders: [
    { account: V1, amount: '3000' },
    { account: P, amount: '2000' },
    { account: V3, amount: '1000' },
    { account: FILLER, amount: '94000' },
  ],
  treasury: '10000',
  timelockBalance: '1000',
  proposers: [MULTISIG],
  executors: [EXECUTOR],
  cancellers: [MULTISIG],
};

export function testSettings(overrides: { maxSupply?: bigint } = {}): SystemSettings {
  return {
    ledger: { network: 'testnet', deployer: DEPLOYER, autoBootstrap: true },
    governance: { proposalThreshold: 1_000n, votingDurationSeconds: VOTING_PERIOD, quorumPercentage: 4 },
    timelock: { minDelaySeconds: 0 },
    token: { maxSupply: overrides.maxSupply ?? 1_000_000n },
  };
}

export function testConfig(): AppConfig {
  return {
    ...testSettings(),
    app: { name: 'governance-test', env: 'test', port: 0 },
    paths: {
      dataDir: '/tmp/governance-test',
      stateFile: '/tmp/governance-test/state.json',
      logFile: '/tmp/governance-test/events.ndjson',
      genesisFile: '/tmp/governance-test/genesis.json',
    },
  };
}

export type TestSystem = GovernanceSystem & { clock: ManualClock };

export async function createSystem(options: {
  genesis?: GenesisInput;
  maxSupply?: bigint;
} = {}): Promise<TestSystem> {
  const store = new StateStore(null);
  const logger = new EventLogger(null);
  const clock = new ManualClock(T0);
  const settings = testSettings({ maxSupply: options.maxSupply });

  const system = createGovernanceSystem(store, clock, logger, settings);
  await bootstrapGovernance(system, settings, parseGenesis(options.genesis ?? scenarioGenesis));
  return { ...system, clock };
}
