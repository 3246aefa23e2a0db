import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Address } from 'viem';
import { z, ZodError } from 'zod';
import { AppConfig } from '../config.js';
import { isRoleName, Roles } from '../domain/access/roles.js';
import { PROPOSAL_STATUSES } from '../domain/governance/governanceTypes.js';
import { OPERATION_CATEGORIES } from '../domain/timelock/timelockTypes.js';
import { DomainError, domainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { MAX_DELAY_SECONDS } from '../services/timelockService.js';
import { GovernanceSystem } from '../system.js';
import { RuntimeMetrics } from '../types.js';
import { toAccount } from '../utils/address.js';
import { addressSchema, amountSchema, bytes32Schema, hexSchema } from '../utils/schemas.js';

interface RouteDeps {
  config: AppConfig;
  system: GovernanceSystem;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const descriptionSchema = z.string().max(2_000);

const createProposalSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('general'),
    description: descriptionSchema,
  }),
  z.object({
    kind: z.literal('mint_tokens'),
    description: descriptionSchema,
    target: addressSchema,
    amount: amountSchema,
  }),
  z.object({
    kind: z.literal('transfer_funds'),
    description: descriptionSchema,
    target: addressSchema,
    amount: amountSchema,
  }),
  z.object({
    kind: z.literal('update_quorum'),
    description: descriptionSchema,
    newPercentage: z.number().int(),
  }),
]);

const voteSchema = z.object({
  support: z.boolean(),
});

const proposalParamsSchema = z.object({
  id: z.coerce.number().int(),
});

const proposalListQuerySchema = z.object({
  status: z.enum(PROPOSAL_STATUSES).optional(),
});

const operationCallSchema = z.object({
  target: addressSchema,
  value: amountSchema.optional(),
  data: hexSchema.optional(),
  predecessor: bytes32Schema.optional(),
  salt: bytes32Schema.optional(),
});

const scheduleSchema = operationCallSchema.extend({
  delay: z.number().int().nonnegative(),
  description: z.string().max(500).optional(),
  category: z.enum(OPERATION_CATEGORIES).optional(),
});

const operationParamsSchema = z.object({
  id: bytes32Schema,
});

const operationListQuerySchema = z.object({
  state: z.enum(['waiting', 'ready', 'done']).optional(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, message: string, error: ZodError): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, message, error.flatten()));

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { governance, timelock, roles, token, native, router } = deps.system;

  /**
   * The simulated ledger sender of a write request.
   * Contract accounts only act through ledger calls, never as a request sender.
   */
  const callerOf = (request: FastifyRequest): Address => {
    const header = request.headers['x-account'];
    if (typeof header !== 'string' || header.length === 0) {
      throw domainError(ErrorCode.Unauthorized, 'Missing x-account header.');
    }
    const account = toAccount(header, 'x-account');
    if (router.isContract(account)) {
      throw domainError(ErrorCode.Unauthorized, 'Contract accounts cannot originate requests.', { account });
    }
    return account;
  };

  app.get('/health', async () => ({
    name: deps.config.app.name,
    status: 'ok',
    network: deps.config.ledger.network,
    contracts: {
      token: deps.system.addresses.token,
      governor: governance.address,
      timelock: timelock.address,
    },
    metrics: deps.getRuntimeMetrics(),
  }));

  // ─── Proposals ────────────────────────────────────────────────────────

  app.get('/proposals', async (request, reply) => {
    const parse = proposalListQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid query params.', parse.error);
    }

    return {
      proposals: governance.listProposals(parse.data.status),
      quorumPercentage: governance.getQuorumPercentage(),
    };
  });

  app.get('/proposals/active', async () => ({
    proposals: governance.listActiveProposals(),
  }));

  app.get('/proposals/:id', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid proposal id.', params.error);
    }

    const proposal = governance.getProposal(params.data.id);
    if (!proposal) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.ProposalNotFound, 'Proposal not found.'));
    }
    return proposal;
  });

  app.get('/proposals/:id/quorum', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid proposal id.', params.error);
    }

    try {
      return governance.getQuorumProgress(params.data.id);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/proposals/:id/eligibility/:account', async (request, reply) => {
    const params = proposalParamsSchema.extend({ account: addressSchema }).safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid path params.', params.error);
    }

    try {
      return governance.getVoterEligibility(params.data.id, params.data.account);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/proposals/:id/votes/:account', async (request, reply) => {
    const params = proposalParamsSchema.extend({ account: addressSchema }).safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid path params.', params.error);
    }

    return {
      proposalId: params.data.id,
      account: params.data.account,
      receipt: governance.getVoteReceipt(params.data.id, params.data.account),
    };
  });

  app.get('/proposals/:id/execution-call', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid proposal id.', params.error);
    }
    if (!governance.getProposal(params.data.id)) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.ProposalNotFound, 'Proposal not found.'));
    }

    const call = governance.executionCall(params.data.id);
    return { target: call.target, value: call.value.toString(), data: call.data };
  });

  app.post('/proposals', async (request, reply) => {
    const parse = createProposalSchema.safeParse(request.body);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid request payload.', parse.error);
    }

    try {
      const proposal = await governance.createProposal(callerOf(request), parse.data);
      return reply.code(201).send(proposal);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/proposals/:id/votes', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid proposal id.', params.error);
    }
    const parse = voteSchema.safeParse(request.body);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid request payload.', parse.error);
    }

    try {
      const receipt = await governance.castVote(callerOf(request), params.data.id, parse.data.support);
      return reply.code(201).send(receipt);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/proposals/:id/finalize', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid proposal id.', params.error);
    }

    try {
      return await governance.finalize(params.data.id);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/proposals/:id/execute', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid proposal id.', params.error);
    }

    try {
      return await governance.execute(callerOf(request), params.data.id);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  // ─── Execution queue ──────────────────────────────────────────────────

  app.get('/timelock', async () => ({
    address: timelock.address,
    minDelay: timelock.getMinDelay(),
    delayFloor: timelock.delayFloor,
    maxDelay: MAX_DELAY_SECONDS,
  }));

  app.post('/timelock/hash', async (request, reply) => {
    const parse = operationCallSchema.safeParse(request.body);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid request payload.', parse.error);
    }

    try {
      return { operationId: timelock.hashOperation(parse.data) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/timelock/schedule', async (request, reply) => {
    const parse = scheduleSchema.safeParse(request.body);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid request payload.', parse.error);
    }

    try {
      const operation = await timelock.schedule(callerOf(request), parse.data);
      return reply.code(201).send(operation);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/timelock/execute', async (request, reply) => {
    const parse = operationCallSchema.safeParse(request.body);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid request payload.', parse.error);
    }

    try {
      return await timelock.execute(callerOf(request), parse.data);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/timelock/operations/:id/cancel', async (request, reply) => {
    const params = operationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid operation id.', params.error);
    }

    try {
      await timelock.cancel(callerOf(request), params.data.id);
      return { operationId: params.data.id, cancelled: true };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/timelock/operations', async (request, reply) => {
    const parse = operationListQuerySchema.safeParse(request.query);
    if (!parse.success) {
      return sendInvalid(reply, 'Invalid query params.', parse.error);
    }
    return { operations: timelock.listOperations(parse.data.state) };
  });

  app.get('/timelock/operations/:id', async (request, reply) => {
    const params = operationParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid operation id.', params.error);
    }

    const operation = timelock.getOperation(params.data.id);
    if (!operation) {
      return reply.code(404).send(toErrorEnvelope(ErrorCode.OperationNotFound, 'Operation is not scheduled.'));
    }
    return operation;
  });

  // ─── Roles & balances ─────────────────────────────────────────────────

  app.get('/roles/:role/members', async (request, reply) => {
    const params = z.object({ role: z.string() }).safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid role.', params.error);
    }
    const { role } = params.data;
    if (!isRoleName(role)) {
      return reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Unknown role.', { role }));
    }
    return { role, roleId: Roles[role], members: roles.members(Roles[role]) };
  });

  app.get('/token/:account', async (request, reply) => {
    const params = z.object({ account: addressSchema }).safeParse(request.params);
    if (!params.success) {
      return sendInvalid(reply, 'Invalid account.', params.error);
    }

    const { account } = params.data;
    return {
      account,
      balance: token.balanceOf(account).toString(),
      votingPower: token.currentVotingPower(account).toString(),
      nativeBalance: native.balanceOf(account).toString(),
      totalSupply: token.totalSupply().toString(),
      maxSupply: token.maxSupply().toString(),
    };
  });
}
