import { FastifyReply, FastifyRequest } from 'fastify';
import { ADDRESS_PATTERN } from '../domain/governance/identity.js';
import { ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';

export const CALLER_HEADER = 'x-caller-address';

/**
 * Reads the caller's account address from the request. Proving ownership of
 * the address (wallet signatures) is left to the transport in front of the API.
 */
export const resolveCaller = (request: FastifyRequest, reply: FastifyReply): string | null => {
  const raw = request.headers[CALLER_HEADER];
  const caller = typeof raw === 'string' ? raw.trim() : '';

  if (!ADDRESS_PATTERN.test(caller)) {
    void reply.code(401).send(toErrorEnvelope(
      ErrorCode.MissingCaller,
      `${CALLER_HEADER} header must carry a 0x-prefixed 20-byte hex address.`,
    ));
    return null;
  }

  return caller;
};
