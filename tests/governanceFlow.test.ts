import { beforeEach, describe, expect, it } from 'vitest';
import { Roles } from '../src/domain/access/roles.js';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { eventBus, EventType } from '../src/infra/eventBus.js';
import {
  createSystem,
  DEPLOYER,
  EXECUTOR,
  MIN_DELAY,
  MULTISIG,
  P,
  scenarioGenesis,
  TestSystem,
  TREASURY,
  V1,
  V3,
  VOTING_PERIOD,
} from './fixtures.js';

describe('governance through the execution queue', () => {
  let sys: TestSystem;

  beforeEach(async () => {
    eventBus.clear();
    sys = await createSystem();
    sys.clock.advance(1);
  });

  it('executes a passed mint proposal after the queue delay', async () => {
    const events: EventType[] = [];
    eventBus.on('*', (event) => {
      events.push(event);
    });

    await sys.governance.proposeMint(P, 'Mint 500 to treasury', TREASURY, 500n);
    await sys.governance.castVote(V1, 1, true);
    await sys.governance.castVote(P, 1, true);
    await sys.governance.castVote(V3, 1, false);
    sys.clock.advance(VOTING_PERIOD + 1);
    await sys.governance.finalize(1);

    const call = sys.governance.executionCall(1);
    const queued = await sys.timelock.schedule(MULTISIG, {
      ...call,
      delay: MIN_DELAY,
      description: 'Execute proposal 1',
      category: 'proposal_execution',
    });

    sys.clock.advance(MIN_DELAY - 1);
    await expect(sys.timelock.execute(EXECUTOR, call))
      .rejects.toMatchObject({ code: ErrorCode.NotReady });

    sys.clock.advance(1);
    const done = await sys.timelock.execute(EXECUTOR, call);

    expect(done.id).toBe(queued.id);
    expect(done.state).toBe('done');
    expect(sys.governance.getProposal(1)?.status).toBe('executed');
    expect(sys.token.balanceOf(TREASURY)).toBe(500n);
    expect(events).toEqual([
      'proposal.created',
      'vote.cast',
      'vote.cast',
      'vote.cast',
      'proposal.finalized',
      'operation.queued',
      'proposal.executed',
      'operation.executed',
    ]);
  });

  it('keeps the queued call pending when the proposal did not pass', async () => {
    await sys.governance.proposeMint(P, 'Mint 500 to treasury', TREASURY, 500n);
    await sys.governance.castVote(V3, 1, false);
    sys.clock.advance(VOTING_PERIOD + 1);

    const call = sys.governance.executionCall(1);
    const { id } = await sys.timelock.schedule(MULTISIG, { ...call, delay: MIN_DELAY });
    sys.clock.advance(MIN_DELAY);

    await expect(sys.timelock.execute(EXECUTOR, call)).rejects.toMatchObject({
      code: ErrorCode.ExternalActionFailure,
      details: { operationId: id, reason: ErrorCode.NotPassed },
    });
    // The settle inside the failed execution rolled back with it.
    expect(sys.governance.getProposal(1)?.status).toBe('active');
    expect(sys.timelock.isOperationPending(id)).toBe(true);
  });

  it('executes a queued quorum change', async () => {
    await sys.governance.proposeQuorumUpdate(P, 'Quorum to 6%', 6);
    await sys.governance.castVote(V1, 1, true);
    await sys.governance.castVote(P, 1, true);
    sys.clock.advance(VOTING_PERIOD + 1);

    const call = sys.governance.executionCall(1);
    await sys.timelock.schedule(MULTISIG, { ...call, delay: MIN_DELAY });
    sys.clock.advance(MIN_DELAY);
    await sys.timelock.execute(EXECUTOR, call);

    expect(sys.governance.getQuorumPercentage()).toBe(6);
    expect(sys.governance.getProposal(1)?.status).toBe('executed');
  });
});

describe('bootstrapGovernance', () => {
  it('leaves the deployer without privileges', async () => {
    const sys = await createSystem();

    expect(sys.roles.hasRole(Roles.admin, DEPLOYER)).toBe(false);
    expect(sys.roles.members(Roles.admin)).toEqual([sys.timelock.address]);
    expect(sys.roles.members(Roles.proposer)).toEqual([MULTISIG]);
    expect(sys.roles.members(Roles.executor)).toEqual([EXECUTOR]);
    expect(sys.roles.members(Roles.canceller)).toEqual([MULTISIG]);
    expect(sys.governance.getExecutor()).toBe(sys.timelock.address);
    expect(sys.token.minter()).toBe(sys.governance.address);
    expect(sys.token.totalSupply()).toBe(100_000n);
    expect(sys.native.balanceOf(sys.governance.address)).toBe(10_000n);
  });

  it('derives distinct contract addresses from the deployer', async () => {
    const sys = await createSystem();
    const { token, governor, timelock } = sys.addresses;

    expect(new Set([token, governor, timelock, DEPLOYER]).size).toBe(4);
    expect(sys.router.isContract(governor)).toBe(true);
    expect(sys.router.isContract(TREASURY)).toBe(false);
  });

  it('rolls back when the genesis allocation exceeds the supply cap', async () => {
    await expect(createSystem({ maxSupply: 99_999n })).rejects.toMatchObject({
      code: ErrorCode.InvalidArgument,
    });
  });

  it('rejects a malformed genesis file', async () => {
    await expect(createSystem({ genesis: { ...scenarioGenesis, treasury: '-5' } }))
      .rejects.toMatchObject({ code: ErrorCode.InvalidPayload });
  });
});
