import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AppContext, buildApp } from '../src/app.js';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { EventType } from '../src/infra/eventBus.js';

const ADMIN = '0x00000000000000000000000000000000000000a1';
const VOTER_X = '0x00000000000000000000000000000000000000b1';
const VOTER_Y = '0x00000000000000000000000000000000000000b2';
const VOTER_Z = '0x00000000000000000000000000000000000000b3';
const NOW = 1_700_000_000;

const makeTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0 },
  paths: {
    stateFile: path.join(dir, 'ledger.json'),
    logFile: path.join(dir, 'events.ndjson'),
  },
  ledger: { adminAddress: ADMIN },
  ws: { enabled: true },
});

let ctx: AppContext;
let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ledger-api-'));
  ctx = await buildApp(makeTestConfig(dir), { clock: () => NOW });
});

afterEach(async () => {
  await ctx.app.close();
  await ctx.stateStore.flush();
  await ctx.logger.flush();
  await fs.rm(dir, { recursive: true, force: true });
});

const post = (url: string, caller: string | undefined, payload: object) => ctx.app.inject({
  method: 'POST',
  url,
  headers: caller ? { 'x-caller-address': caller } : {},
  payload,
});

const get = (url: string) => ctx.app.inject({ method: 'GET', url });

describe('governance routes', () => {
  it('reports service health', async () => {
    const res = await get('/health');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'ok',
      env: 'test',
      wsClients: 0,
      ledger: { proposalCount: 0, activeProposals: 0, administrator: ADMIN },
    });
  });

  it('creates a proposal as the administrator', async () => {
    const res = await post('/proposals', ADMIN, { title: 'A', description: 'desc' });

    expect(res.statusCode).toBe(201);
    expect(res.json()).toEqual({
      id: 0,
      proposal: {
        id: 0,
        title: 'A',
        description: 'desc',
        yesCount: 0,
        noCount: 0,
        active: true,
        createdAt: NOW,
        creator: ADMIN,
      },
    });
    expect((await get('/proposals/count')).json()).toEqual({ count: 1 });
  });

  it('rejects proposals from other callers with 403', async () => {
    const res = await post('/proposals', VOTER_X, { title: 'A', description: 'desc' });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      error: { code: 'unauthorized', message: 'Only the administrator may create proposals.' },
    });
    expect((await get('/proposals/count')).json()).toEqual({ count: 0 });
  });

  it('rejects mutations without a caller header with 401', async () => {
    const res = await post('/proposals', undefined, { title: 'A', description: 'desc' });

    expect(res.statusCode).toBe(401);
    expect(res.json().error.code).toBe('missing_caller');
  });

  it('maps empty text to invalid_input', async () => {
    const res = await post('/proposals', ADMIN, { title: ' ', description: 'desc' });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: 'invalid_input',
      message: 'Title and description must not be empty.',
      details: { titleEmpty: true, descriptionEmpty: false },
    });
  });

  it('accepts long proposal text', async () => {
    const title = 'T'.repeat(300);
    const description = 'd'.repeat(6000);

    const res = await post('/proposals', ADMIN, { title, description });

    expect(res.statusCode).toBe(201);
    expect(res.json().proposal).toMatchObject({ title, description });
  });

  it('rejects malformed payloads and ids', async () => {
    await post('/proposals', ADMIN, { title: 'A', description: 'desc' });

    const badBody = await post('/proposals/0/votes', VOTER_X, { support: 'yes' });
    expect(badBody.statusCode).toBe(400);
    expect(badBody.json().error.code).toBe('invalid_input');

    const badId = await get('/proposals/abc');
    expect(badId.statusCode).toBe(400);

    const unknown = await get('/proposals/5');
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json().error).toEqual({
      code: 'proposal_not_found',
      message: 'Proposal 5 not found.',
      details: { proposalId: 5, proposalCount: 1 },
    });
  });

  it('runs the full vote lifecycle over HTTP', async () => {
    const received: EventType[] = [];
    ctx.events.on('*', (event) => received.push(event));

    await post('/proposals', ADMIN, { title: 'A', description: 'desc' });

    const first = await post('/proposals/0/votes', VOTER_X, { support: true });
    expect(first.statusCode).toBe(201);
    expect(first.json()).toEqual({ proposalId: 0, voter: VOTER_X, support: true, yesCount: 1, noCount: 0 });

    const duplicate = await post('/proposals/0/votes', VOTER_X, { support: true });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json().error.code).toBe('duplicate_vote');

    await post('/proposals/0/votes', VOTER_Y, { support: false });

    expect((await get('/proposals/0/percentages')).json()).toEqual({ proposalId: 0, yesPct: 5000, noPct: 5000 });
    expect((await get('/proposals/0/result')).json()).toEqual({
      proposalId: 0,
      approved: false,
      yesCount: 1,
      noCount: 1,
    });
    expect((await get(`/proposals/0/votes/${VOTER_X}`)).json()).toEqual({
      proposalId: 0,
      voter: VOTER_X,
      hasVoted: true,
    });
    expect((await get(`/proposals/0/votes/${VOTER_Z}`)).json().hasVoted).toBe(false);

    const close = await post('/proposals/0/close', ADMIN, {});
    expect(close.statusCode).toBe(200);
    expect(close.json().proposal.active).toBe(false);

    const late = await post('/proposals/0/votes', VOTER_Z, { support: true });
    expect(late.statusCode).toBe(409);
    expect(late.json().error.code).toBe('proposal_inactive');

    const again = await post('/proposals/0/close', ADMIN, {});
    expect(again.statusCode).toBe(409);
    expect(again.json().error.code).toBe('proposal_already_closed');

    expect(received).toEqual(['proposal.created', 'proposal.voted', 'proposal.voted', 'proposal.closed']);
  });

  it('lists all and active proposal ids', async () => {
    await post('/proposals', ADMIN, { title: 'A', description: 'desc' });
    await post('/proposals', ADMIN, { title: 'B', description: 'desc' });
    await post('/proposals', ADMIN, { title: 'C', description: 'desc' });
    await post('/proposals/1/close', ADMIN, {});

    expect((await get('/proposals')).json()).toEqual({ status: 'all', ids: [0, 1, 2] });
    expect((await get('/proposals?status=active')).json()).toEqual({ status: 'active', ids: [0, 2] });
    expect((await get('/proposals?status=closed')).statusCode).toBe(400);
  });

  it('transfers the administrator role', async () => {
    const denied = await post('/governance/admin/transfer', VOTER_X, { newAdmin: VOTER_X });
    expect(denied.statusCode).toBe(403);

    const zero = await post('/governance/admin/transfer', ADMIN, { newAdmin: `0x${'0'.repeat(40)}` });
    expect(zero.statusCode).toBe(400);
    expect(zero.json().error.code).toBe('invalid_input');

    const res = await post('/governance/admin/transfer', ADMIN, { newAdmin: VOTER_X.toUpperCase().replace('0X', '0x') });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ administrator: VOTER_X });
    expect((await get('/governance/admin')).json()).toEqual({ administrator: VOTER_X });
  });

  it('persists the ledger across restarts', async () => {
    await post('/proposals', ADMIN, { title: 'A', description: 'desc' });
    await post('/proposals/0/votes', VOTER_X, { support: true });
    await ctx.app.close();

    ctx = await buildApp(makeTestConfig(dir), { clock: () => NOW });

    expect((await get('/proposals/0')).json()).toMatchObject({ id: 0, yesCount: 1, active: true });
    const duplicate = await post('/proposals/0/votes', VOTER_X, { support: false });
    expect(duplicate.json().error.code).toBe('duplicate_vote');
  });

  it('writes accepted and rejected requests to the event log', async () => {
    await post('/proposals', ADMIN, { title: 'A', description: 'desc' });
    await post('/proposals', VOTER_X, { title: 'B', description: 'desc' });
    await ctx.logger.flush();

    const lines = (await fs.readFile(path.join(dir, 'events.ndjson'), 'utf-8'))
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));

    expect(lines.map((line) => line.event)).toEqual(['proposal.created', 'request.rejected']);
    expect(lines[1]).toMatchObject({ action: 'proposal.create', code: 'unauthorized' });
  });
});
