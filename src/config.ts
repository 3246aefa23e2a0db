import dotenv from 'dotenv';
import path from 'node:path';
import type { LedgerNetwork } from './domain/timelock/timelockTypes.js';
import { DAY_SECONDS } from './utils/time.js';

dotenv.config();

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseBool = (input: string | undefined, fallback: boolean): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseBigInt = (input: string | undefined, fallback: bigint): bigint => {
  if (input === undefined || !/^\d+$/.test(input.trim())) return fallback;
  return BigInt(input.trim());
};

const parseNetwork = (input: string | undefined): LedgerNetwork => (
  input === 'mainnet' ? 'mainnet' : 'testnet'
);

export const config = {
  app: {
    name: 'ledger-governance-engine',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir: process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data'),
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'state.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
    genesisFile: process.env.GENESIS_FILE ?? path.resolve(process.cwd(), 'config', 'genesis.json'),
  },
  ledger: {
    network: parseNetwork(process.env.LEDGER_NETWORK),
    deployer: process.env.DEPLOYER_ADDRESS ?? '0x00000000000000000000000000000000000000d1',
    /** Apply genesis allocations and role wiring on first start. */
    autoBootstrap: parseBool(process.env.AUTO_BOOTSTRAP, true),
  },
  governance: {
    proposalThreshold: parseBigInt(process.env.PROPOSAL_THRESHOLD, 1_000n),
    votingDurationSeconds: parseNumber(process.env.VOTING_DURATION_SECONDS, 7 * DAY_SECONDS),
    quorumPercentage: parseNumber(process.env.QUORUM_PERCENTAGE, 4),
  },
  timelock: {
    /** 0 means "use the network floor". */
    minDelaySeconds: parseNumber(process.env.TIMELOCK_MIN_DELAY_SECONDS, 0),
  },
  token: {
    maxSupply: parseBigInt(process.env.TOKEN_MAX_SUPPLY, 1_000_000n),
  },
};

export type AppConfig = typeof config;
