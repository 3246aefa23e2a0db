import { getContractAddress, type Address } from 'viem';
import type { AppConfig } from './config.js';
import { CallRouter } from './infra/ledger/callRouter.js';
import { LedgerClock } from './infra/ledger/clock.js';
import { NativeLedger } from './infra/ledger/nativeLedger.js';
import { LedgerVotesToken } from './infra/ledger/votesToken.js';
import { EventLogger } from './infra/logger.js';
import { StateStore } from './infra/storage/stateStore.js';
import { TransitionPublisher } from './infra/transitions.js';
import { GovernanceService } from './services/governanceService.js';
import { RoleAuthorityService } from './services/roleAuthorityService.js';
import { TimelockService } from './services/timelockService.js';
import { toAccount } from './utils/address.js';

export type SystemSettings = Pick<AppConfig, 'ledger' | 'governance' | 'timelock' | 'token'>;

export interface DeploymentAddresses {
  deployer: Address;
  token: Address;
  governor: Address;
  timelock: Address;
}

export interface GovernanceSystem {
  store: StateStore;
  clock: LedgerClock;
  logger: EventLogger;
  publisher: TransitionPublisher;
  addresses: DeploymentAddresses;
  token: LedgerVotesToken;
  native: NativeLedger;
  router: CallRouter;
  roles: RoleAuthorityService;
  governance: GovernanceService;
  timelock: TimelockService;
}

/**
 * Contract addresses follow from the deployer's nonces, in deployment order.
 */
export function deriveAddresses(deployer: string): DeploymentAddresses {
  const from = toAccount(deployer, 'deployer');
  return {
    deployer: from,
    token: getContractAddress({ from, nonce: 0n }),
    governor: getContractAddress({ from, nonce: 1n }),
    timelock: getContractAddress({ from, nonce: 2n }),
  };
}

export function createGovernanceSystem(
  store: StateStore,
  clock: LedgerClock,
  logger: EventLogger,
  settings: SystemSettings,
): GovernanceSystem {
  const addresses = deriveAddresses(settings.ledger.deployer);
  const publisher = new TransitionPublisher(store, clock, logger);

  const token = new LedgerVotesToken(store, clock);
  const native = new NativeLedger(store);
  const router = new CallRouter();
  const roles = new RoleAuthorityService(store, publisher);

  const governance = new GovernanceService(store, clock, token, native, publisher, {
    address: addresses.governor,
    proposalThreshold: settings.governance.proposalThreshold,
    votingDurationSeconds: settings.governance.votingDurationSeconds,
  });

  const timelock = new TimelockService(store, clock, roles, router, native, publisher, {
    address: addresses.timelock,
    network: settings.ledger.network,
  });

  router.register(addresses.token, token);
  router.register(addresses.governor, governance);
  router.register(addresses.timelock, timelock);

  return {
    store,
    clock,
    logger,
    publisher,
    addresses,
    token,
    native,
    router,
    roles,
    governance,
    timelock,
  };
}
