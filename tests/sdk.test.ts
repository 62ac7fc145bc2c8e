import { describe, it, expect, vi } from 'vitest';
import { GovernanceAPIClient, GovernanceAPIError } from '../src/sdk/index.js';

const BASE = 'http://localhost:8787';
const ADMIN = '0x00000000000000000000000000000000000000a1';

// ─── Mock fetch helper ─────────────────────────────────────────────────────

function mockFetch(status: number, body: unknown) {
  return vi.fn().mockResolvedValue({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  });
}

function clientWith(fetch: ReturnType<typeof mockFetch>, callerAddress?: string): GovernanceAPIClient {
  return new GovernanceAPIClient({
    baseUrl: BASE,
    callerAddress,
    fetch: fetch as unknown as typeof globalThis.fetch,
  });
}

describe('GovernanceAPIClient', () => {
  it('constructs with string args', () => {
    const client = new GovernanceAPIClient(BASE, ADMIN);
    expect(client).toBeInstanceOf(GovernanceAPIClient);
  });

  it('strips trailing slashes from baseUrl', async () => {
    const fetch = mockFetch(200, { administrator: ADMIN });
    const client = new GovernanceAPIClient({
      baseUrl: 'http://localhost:8787///',
      fetch: fetch as unknown as typeof globalThis.fetch,
    });

    await client.getAdministrator();

    expect(fetch).toHaveBeenCalledWith('http://localhost:8787/governance/admin', expect.anything());
  });

  it('sends the caller address on state-changing requests', async () => {
    const fetch = mockFetch(201, { id: 0, proposal: { id: 0 } });
    const client = clientWith(fetch, ADMIN);

    const result = await client.createProposal({ title: 'A', description: 'desc' });

    expect(result.id).toBe(0);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-caller-address': ADMIN },
      body: JSON.stringify({ title: 'A', description: 'desc' }),
    });
  });

  it('omits the caller header when no address is configured', async () => {
    const fetch = mockFetch(200, { count: 3 });
    const client = clientWith(fetch);

    expect(await client.getProposalCount()).toBe(3);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals/count`, {
      method: 'GET',
      headers: { 'content-type': 'application/json' },
      body: undefined,
    });
  });

  it('lists active proposal ids', async () => {
    const fetch = mockFetch(200, { status: 'active', ids: [0, 2] });
    const client = clientWith(fetch);

    expect(await client.listProposalIds('active')).toEqual([0, 2]);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals?status=active`, expect.anything());
  });

  it('votes and unwraps hasVoted', async () => {
    const voteFetch = mockFetch(201, { proposalId: 1, voter: ADMIN, support: false, yesCount: 0, noCount: 1 });
    const receipt = await clientWith(voteFetch, ADMIN).vote(1, false);
    expect(receipt.noCount).toBe(1);
    expect(voteFetch).toHaveBeenCalledWith(`${BASE}/proposals/1/votes`, expect.objectContaining({
      method: 'POST',
      body: JSON.stringify({ support: false }),
    }));

    const hasVotedFetch = mockFetch(200, { proposalId: 1, voter: ADMIN, hasVoted: true });
    expect(await clientWith(hasVotedFetch).hasVoted(1, ADMIN)).toBe(true);
    expect(hasVotedFetch).toHaveBeenCalledWith(`${BASE}/proposals/1/votes/${ADMIN}`, expect.anything());
  });

  it('closes a proposal with an empty JSON body', async () => {
    const fetch = mockFetch(200, { proposal: { id: 0, active: false } });
    const proposal = await clientWith(fetch, ADMIN).closeProposal(0);

    expect(proposal.active).toBe(false);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/proposals/0/close`, expect.objectContaining({ body: '{}' }));
  });

  it('throws GovernanceAPIError with the server error envelope', async () => {
    const fetch = mockFetch(409, {
      error: { code: 'duplicate_vote', message: 'Address has already voted on this proposal.', details: { proposalId: 0 } },
    });
    const client = clientWith(fetch, ADMIN);

    const error = await client.vote(0, true).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GovernanceAPIError);
    expect(error).toMatchObject({
      status: 409,
      code: 'duplicate_vote',
      message: 'Address has already voted on this proposal.',
      details: { proposalId: 0 },
    });
  });

  it('falls back to the HTTP status when the error body is not an envelope', async () => {
    const fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 502,
      json: async () => {
        throw new SyntaxError('Unexpected token <');
      },
    });
    const client = clientWith(fetch);

    await expect(client.getProposal(3)).rejects.toMatchObject({
      status: 502,
      code: 'HTTP_502',
      message: 'Request failed: GET /proposals/3 → 502',
    });
  });
});
