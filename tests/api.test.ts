import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppContext, buildApp } from '../src/app.js';
import { parseGenesis } from '../src/bootstrap.js';
import { eventBus } from '../src/infra/eventBus.js';
import { ManualClock } from '../src/infra/ledger/clock.js';
import {
  EXECUTOR,
  MIN_DELAY,
  MULTISIG,
  P,
  RECIPIENT,
  scenarioGenesis,
  T0,
  testConfig,
  TREASURY,
  V1,
  VOTING_PERIOD,
} from './fixtures.js';

describe('HTTP API', () => {
  let ctx: AppContext;
  let clock: ManualClock;

  beforeEach(async () => {
    eventBus.clear();
    clock = new ManualClock(T0);
    ctx = await buildApp(testConfig(), {
      clock,
      persist: false,
      genesis: parseGenesis(scenarioGenesis),
    });
    clock.advance(1);
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('GET /health reports the deployment', async () => {
    const res = await ctx.app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.network).toBe('testnet');
    expect(body.contracts.governor).toBe(ctx.system.governance.address);
    expect(body.contracts.timelock).toBe(ctx.system.timelock.address);
    expect(body.metrics.ledgerTime).toBe(T0 + 1);
    expect(body.metrics.activeProposals).toBe(0);
  });

  describe('proposals', () => {
    const createMint = () => ctx.app.inject({
      method: 'POST',
      url: '/proposals',
      headers: { 'x-account': P },
      payload: { kind: 'mint_tokens', description: 'Mint to treasury', target: TREASURY, amount: '500' },
    });

    it('creates a proposal for the calling account', async () => {
      const res = await createMint();

      expect(res.statusCode).toBe(201);
      const body = res.json();
      expect(body.id).toBe(1);
      expect(body.proposer).toBe(P);
      expect(body.action).toEqual({ kind: 'mint_tokens', target: TREASURY, amount: '500' });
      expect(body.status).toBe('active');
    });

    it('requires the x-account header on writes', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/proposals',
        payload: { kind: 'general', description: 'Anonymous' },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json().error.code).toBe('unauthorized');
    });

    it('validates the payload', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/proposals',
        headers: { 'x-account': P },
        payload: { kind: 'mint_tokens', description: 'Bad target', target: 'nope', amount: '500' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('invalid_payload');
    });

    it('records votes and reports quorum progress', async () => {
      await createMint();

      const vote = await ctx.app.inject({
        method: 'POST',
        url: '/proposals/1/votes',
        headers: { 'x-account': V1 },
        payload: { support: true },
      });
      expect(vote.statusCode).toBe(201);
      expect(vote.json().weight).toBe('3000');

      const again = await ctx.app.inject({
        method: 'POST',
        url: '/proposals/1/votes',
        headers: { 'x-account': V1 },
        payload: { support: false },
      });
      expect(again.statusCode).toBe(409);
      expect(again.json().error.code).toBe('already_voted');

      const quorum = await ctx.app.inject({ method: 'GET', url: '/proposals/1/quorum' });
      expect(quorum.json()).toMatchObject({ quorumRequired: '4000', votesCast: '3000', reached: false });

      const receipt = await ctx.app.inject({ method: 'GET', url: `/proposals/1/votes/${V1}` });
      expect(receipt.json().receipt).toMatchObject({ voter: V1, support: true, weight: '3000' });
    });

    it('maps lifecycle errors to status codes', async () => {
      await createMint();

      const finalize = await ctx.app.inject({ method: 'POST', url: '/proposals/1/finalize' });
      expect(finalize.statusCode).toBe(409);
      expect(finalize.json().error.code).toBe('voting_not_ended');

      const execute = await ctx.app.inject({
        method: 'POST',
        url: '/proposals/1/execute',
        headers: { 'x-account': P },
      });
      expect(execute.statusCode).toBe(403);

      const missing = await ctx.app.inject({ method: 'GET', url: '/proposals/99' });
      expect(missing.statusCode).toBe(404);
      expect(missing.json().error.code).toBe('proposal_not_found');

      const badFilter = await ctx.app.inject({ method: 'GET', url: '/proposals?status=bogus' });
      expect(badFilter.statusCode).toBe(400);
    });

    it('refuses requests sent in the name of a contract account', async () => {
      await createMint();
      for (const voter of [V1, P]) {
        await ctx.app.inject({
          method: 'POST',
          url: '/proposals/1/votes',
          headers: { 'x-account': voter },
          payload: { support: true },
        });
      }
      clock.advance(VOTING_PERIOD + 1);

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/proposals/1/execute',
        headers: { 'x-account': ctx.system.timelock.address },
      });

      expect(res.statusCode).toBe(403);
      expect(res.json().error.code).toBe('unauthorized');
      expect(ctx.system.token.balanceOf(TREASURY)).toBe(0n);
      expect(ctx.system.governance.getProposal(1)?.executed).toBe(false);
    });

    it('returns the queue call that executes a proposal', async () => {
      await createMint();

      const res = await ctx.app.inject({ method: 'GET', url: '/proposals/1/execution-call' });

      expect(res.json()).toEqual({
        target: ctx.system.governance.address,
        value: '0',
        data: ctx.system.governance.executionCall(1).data,
      });
    });
  });

  describe('execution queue', () => {
    const call = { target: RECIPIENT, value: '100' };

    it('schedules, hashes, lists and cancels operations', async () => {
      const scheduled = await ctx.app.inject({
        method: 'POST',
        url: '/timelock/schedule',
        headers: { 'x-account': MULTISIG },
        payload: { ...call, delay: MIN_DELAY, category: 'treasury', description: 'Pay recipient' },
      });
      expect(scheduled.statusCode).toBe(201);
      const operation = scheduled.json();
      expect(operation.state).toBe('waiting');
      expect(operation.readyTimestamp).toBe(T0 + 1 + MIN_DELAY);

      const hashed = await ctx.app.inject({ method: 'POST', url: '/timelock/hash', payload: call });
      expect(hashed.json().operationId).toBe(operation.id);

      const early = await ctx.app.inject({
        method: 'POST',
        url: '/timelock/execute',
        headers: { 'x-account': EXECUTOR },
        payload: call,
      });
      expect(early.statusCode).toBe(409);
      expect(early.json().error.code).toBe('not_ready');

      const listed = await ctx.app.inject({ method: 'GET', url: '/timelock/operations?state=waiting' });
      expect(listed.json().operations).toHaveLength(1);

      const cancelled = await ctx.app.inject({
        method: 'POST',
        url: `/timelock/operations/${operation.id}/cancel`,
        headers: { 'x-account': MULTISIG },
      });
      expect(cancelled.json()).toEqual({ operationId: operation.id, cancelled: true });

      const gone = await ctx.app.inject({ method: 'GET', url: `/timelock/operations/${operation.id}` });
      expect(gone.statusCode).toBe(404);
      expect(gone.json().error.code).toBe('operation_not_found');
    });

    it('executes a ready operation', async () => {
      await ctx.app.inject({
        method: 'POST',
        url: '/timelock/schedule',
        headers: { 'x-account': MULTISIG },
        payload: { ...call, delay: MIN_DELAY },
      });
      clock.advance(MIN_DELAY);

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/timelock/execute',
        headers: { 'x-account': EXECUTOR },
        payload: call,
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().state).toBe('done');

      const balances = await ctx.app.inject({ method: 'GET', url: `/token/${RECIPIENT}` });
      expect(balances.json().nativeBalance).toBe('100');
    });

    it('rejects a value wider than uint256', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/timelock/schedule',
        headers: { 'x-account': MULTISIG },
        payload: { target: RECIPIENT, value: (2n ** 256n).toString(), delay: MIN_DELAY },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('invalid_argument');
      expect(ctx.system.timelock.listOperations()).toHaveLength(0);
    });

    it('describes the queue configuration', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/timelock' });
      expect(res.json()).toEqual({
        address: ctx.system.timelock.address,
        minDelay: MIN_DELAY,
        delayFloor: MIN_DELAY,
        maxDelay: 30 * 24 * 60 * 60,
      });
    });
  });

  describe('roles and balances', () => {
    it('lists role members by name', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/roles/proposer/members' });
      expect(res.json().members).toEqual([MULTISIG]);

      const unknown = await ctx.app.inject({ method: 'GET', url: '/roles/owner/members' });
      expect(unknown.statusCode).toBe(400);
    });

    it('reports token and native balances', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/token/${P}` });

      expect(res.json()).toEqual({
        account: P,
        balance: '2000',
        votingPower: '2000',
        nativeBalance: '0',
        totalSupply: '100000',
        maxSupply: '1000000',
      });
    });
  });
});
