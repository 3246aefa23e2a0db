import { describe, it, expect, vi } from 'vitest';
import { GovernanceAPIError, GovernanceClient } from '../src/sdk/index.js';

// ─── Mock fetch helper ─────────────────────────────────────────────────────

function mockFetch(status: number, body: unknown) {
  return vi.fn<typeof globalThis.fetch>().mockImplementation(async () => new Response(
    typeof body === 'string' ? body : JSON.stringify(body),
    { status, headers: { 'content-type': 'application/json' } },
  ));
}

const ACCOUNT = '0x0000000000000000000000000000000000001002';

describe('GovernanceClient', () => {
  const BASE = 'http://localhost:8787';

  it('constructs with string args', () => {
    const client = new GovernanceClient(BASE, ACCOUNT);
    expect(client).toBeInstanceOf(GovernanceClient);
  });

  it('strips trailing slashes from baseUrl', async () => {
    const fetch = mockFetch(200, { status: 'ok' });
    const client = new GovernanceClient({ baseUrl: 'http://localhost:8787///', fetch });

    await client.health();

    expect(fetch).toHaveBeenCalledWith('http://localhost:8787/health', expect.anything());
  });

  it('sends the account header and JSON body on writes', async () => {
    const fetch = mockFetch(201, { id: 1, status: 'active' });
    const client = new GovernanceClient({ baseUrl: BASE, account: ACCOUNT, fetch });

    const proposal = await client.createProposal({ kind: 'general', description: 'Hello' });

    expect(proposal.id).toBe(1);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-account': ACCOUNT },
      body: JSON.stringify({ kind: 'general', description: 'Hello' }),
    });
  });

  it('acts as another account with as()', async () => {
    const fetch = mockFetch(201, { proposalId: 3, weight: '10' });
    const voter = new GovernanceClient({ baseUrl: BASE, fetch }).as(ACCOUNT);

    const receipt = await voter.castVote(3, false);

    expect(receipt.weight).toBe('10');
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals/3/votes`, expect.objectContaining({
      headers: { 'content-type': 'application/json', 'x-account': ACCOUNT },
      body: JSON.stringify({ support: false }),
    }));
  });

  it('unwraps list responses and encodes filters', async () => {
    const fetch = mockFetch(200, { proposals: [{ id: 2 }, { id: 1 }], quorumPercentage: 4 });
    const client = new GovernanceClient({ baseUrl: BASE, fetch });

    const proposals = await client.listProposals('passed');

    expect(proposals.map((p) => p.id)).toEqual([2, 1]);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals?status=passed`, expect.objectContaining({ method: 'GET' }));
  });

  it('posts an empty object for body-less commands', async () => {
    const fetch = mockFetch(200, { operationId: '0x01', cancelled: true });
    const client = new GovernanceClient({ baseUrl: BASE, account: ACCOUNT, fetch });

    await client.cancelOperation('0x01');

    expect(fetch).toHaveBeenCalledWith(`${BASE}/timelock/operations/0x01/cancel`, expect.objectContaining({
      method: 'POST',
      body: '{}',
    }));
  });

  it('throws GovernanceAPIError with the envelope details', async () => {
    const fetch = mockFetch(409, {
      error: { code: 'not_ready', message: 'Operation is not ready yet.', details: { readyTimestamp: 10 } },
    });
    const client = new GovernanceClient({ baseUrl: BASE, account: ACCOUNT, fetch });

    const error = await client.executeOperation({ target: ACCOUNT }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(GovernanceAPIError);
    expect(error).toMatchObject({
      status: 409,
      code: 'not_ready',
      message: 'Operation is not ready yet.',
      details: { readyTimestamp: 10 },
    });
  });

  it('falls back to the HTTP status when the error body is not JSON', async () => {
    const fetch = mockFetch(502, 'bad gateway');
    const client = new GovernanceClient({ baseUrl: BASE, fetch });

    await expect(client.getProposal(1)).rejects.toMatchObject({ status: 502, code: 'HTTP_502' });
  });
});
