/**
 * First-start wiring of the governance system: genesis allocations, roles and
 * the hand-offs that leave the deployer with no privileges.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import { Roles } from './domain/access/roles.js';
import { domainError, ErrorCode } from './errors/taxonomy.js';
import type { GovernanceSystem, SystemSettings } from './system.js';
import { DeploymentRecord } from './types.js';
import { addressSchema, amountSchema } from './utils/schemas.js';

export const genesisSchema = z.object({
  holders: z.array(z.object({
    account: addressSchema,
    amount: amountSchema,
  })).default([]),
  /** Native funds held by the proposal registry. */
  treasury: amountSchema.default('0'),
  timelockBalance: amountSchema.default('0'),
  proposers: z.array(addressSchema).default([]),
  executors: z.array(addressSchema).default([]),
  cancellers: z.array(addressSchema).default([]),
});

export type Genesis = z.output<typeof genesisSchema>;
export type GenesisInput = z.input<typeof genesisSchema>;

export function parseGenesis(raw: unknown): Genesis {
  const parse = genesisSchema.safeParse(raw);
  if (!parse.success) {
    throw domainError(ErrorCode.InvalidPayload, 'Invalid genesis file.', parse.error.flatten());
  }
  return parse.data;
}

export async function loadGenesis(filePath: string): Promise<Genesis> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return parseGenesis(JSON.parse(raw));
}

/**
 * Apply genesis and wire authorities. Runs once; later calls return the stored
 * deployment record. Everything commits together or not at all.
 */
export async function bootstrapGovernance(
  system: GovernanceSystem,
  settings: SystemSettings,
  genesis: Genesis,
): Promise<DeploymentRecord> {
  const { store, clock, addresses, roles, token, native, governance, timelock } = system;
  const { deployer } = addresses;

  const quorum = settings.governance.quorumPercentage;
  if (!Number.isInteger(quorum) || quorum < 1 || quorum > 100) {
    throw domainError(ErrorCode.InvalidArgument, 'Quorum percentage must be an integer between 1 and 100.', {
      quorumPercentage: quorum,
    });
  }

  const record = await store.transaction(async (state) => {
    if (state.deployment) return state.deployment;

    await roles.initializeAdmin(deployer);

    await token.initialize(deployer, settings.token.maxSupply);
    for (const holder of genesis.holders) {
      await token.mint(deployer, holder.account, holder.amount);
    }
    await token.setMinter(deployer, governance.address);

    if (genesis.treasury > 0n) {
      await native.credit(governance.address, genesis.treasury);
    }
    if (genesis.timelockBalance > 0n) {
      await native.credit(timelock.address, genesis.timelockBalance);
    }

    state.governance.quorumPercentage = quorum;
    await timelock.initializeMinDelay(Math.max(settings.timelock.minDelaySeconds, timelock.delayFloor));

    // The queue administers its own roles from here on.
    await roles.grantRole(deployer, Roles.admin, timelock.address);
    for (const account of genesis.proposers) {
      await roles.grantRole(deployer, Roles.proposer, account);
    }
    for (const account of genesis.executors) {
      await roles.grantRole(deployer, Roles.executor, account);
    }
    for (const account of genesis.cancellers) {
      await roles.grantRole(deployer, Roles.canceller, account);
    }

    await governance.initializeExecutor(deployer);
    await governance.transferExecutorship(deployer, timelock.address);

    await roles.renounceRole(deployer, Roles.admin, deployer);

    const deployment: DeploymentRecord = {
      deployer,
      token: addresses.token,
      governor: addresses.governor,
      timelock: addresses.timelock,
      bootstrappedAt: clock.now(),
    };
    state.deployment = deployment;
    return deployment;
  });

  return structuredClone(record);
}
