import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { ADDRESS_PATTERN, normalizeIdentity } from '../domain/governance/identity.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import { resolveCaller } from '../services/auth.js';
import { GovernanceService } from '../services/governanceService.js';
import { RuntimeMetrics } from '../types.js';

interface RouteDeps {
  config: AppConfig;
  governanceService: GovernanceService;
  getRuntimeMetrics: () => RuntimeMetrics;
}

const addressSchema = z.string().trim().regex(ADDRESS_PATTERN, 'expected a 0x-prefixed 20-byte hex address');

const proposalParamsSchema = z.object({
  id: z.string().regex(/^\d+$/, 'proposal id must be a non-negative integer').transform(Number),
});

const voterParamsSchema = proposalParamsSchema.extend({
  voter: addressSchema,
});

const createProposalSchema = z.object({
  title: z.string(),
  description: z.string(),
});

const castVoteSchema = z.object({
  support: z.boolean(),
});

const transferAdminSchema = z.object({
  newAdmin: addressSchema,
});

const listProposalsQuerySchema = z.object({
  status: z.enum(['all', 'active']).default('all'),
});

const sendDomainError = (reply: FastifyReply, error: unknown): FastifyReply => {
  if (error instanceof DomainError) {
    return reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
  }

  return reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendInvalid = (reply: FastifyReply, message: string, error: z.ZodError): FastifyReply => (
  reply.code(400).send(toErrorEnvelope(ErrorCode.InvalidInput, message, error.flatten()))
);

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const governance = deps.governanceService;

  app.get('/', async () => ({
    name: deps.config.app.name,
    version: '0.1.0',
    status: 'ok',
  }));

  app.get('/health', async () => {
    const runtime = deps.getRuntimeMetrics();

    return {
      status: 'ok',
      env: deps.config.app.env,
      uptimeSeconds: runtime.uptimeSeconds,
      processPid: runtime.processPid,
      wsClients: runtime.wsClients,
      ledger: {
        proposalCount: governance.getProposalCount(),
        activeProposals: governance.getActiveProposalIds().length,
        administrator: governance.getAdministrator(),
      },
    };
  });

  // ─── Access control ───────────────────────────────────────────────────

  app.get('/governance/admin', async () => ({
    administrator: governance.getAdministrator(),
  }));

  app.post('/governance/admin/transfer', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return reply;

    const parse = transferAdminSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const administrator = await governance.transferAdministrator(parse.data.newAdmin, caller);
      return { administrator };
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  // ─── Proposals ────────────────────────────────────────────────────────

  app.get('/proposals', async (request, reply) => {
    const parse = listProposalsQuerySchema.safeParse(request.query);
    if (!parse.success) return sendInvalid(reply, 'Invalid query params.', parse.error);

    const ids = parse.data.status === 'active'
      ? governance.getActiveProposalIds()
      : governance.getAllProposalIds();

    return { status: parse.data.status, ids };
  });

  app.get('/proposals/count', async () => ({
    count: governance.getProposalCount(),
  }));

  app.post('/proposals', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return reply;

    const parse = createProposalSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const proposal = await governance.createProposal({ ...parse.data, caller });
      return reply.code(201).send({ id: proposal.id, proposal });
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return governance.getProposal(params.data.id);
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.post('/proposals/:id/votes', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return reply;

    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    const parse = castVoteSchema.safeParse(request.body);
    if (!parse.success) return sendInvalid(reply, 'Invalid request payload.', parse.error);

    try {
      const receipt = await governance.castVote(params.data.id, {
        voter: caller,
        support: parse.data.support,
      });
      return reply.code(201).send(receipt);
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/votes/:voter', async (request, reply) => {
    const params = voterParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return {
        proposalId: params.data.id,
        voter: normalizeIdentity(params.data.voter),
        hasVoted: governance.hasVoted(params.data.id, params.data.voter),
      };
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.post('/proposals/:id/close', async (request, reply) => {
    const caller = resolveCaller(request, reply);
    if (!caller) return reply;

    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      const proposal = await governance.closeProposal(params.data.id, caller);
      return { proposal };
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  // ─── Tally ────────────────────────────────────────────────────────────

  app.get('/proposals/:id/percentages', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return {
        proposalId: params.data.id,
        ...governance.getVotePercentages(params.data.id),
      };
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });

  app.get('/proposals/:id/result', async (request, reply) => {
    const params = proposalParamsSchema.safeParse(request.params);
    if (!params.success) return sendInvalid(reply, 'Invalid path params.', params.error);

    try {
      return governance.getProposalResult(params.data.id);
    } catch (error) {
      return sendDomainError(reply, error);
    }
  });
}
