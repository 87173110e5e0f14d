import type { FastifyRequest } from 'fastify';

export class UnauthorizedError extends Error {
  readonly statusCode = 401;

  constructor(message: string) {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export type Authenticator = (request: FastifyRequest) => string;

/** Resolves `Authorization: Bearer <key>` to the caller identity mapped in API_KEYS. */
export function createAuthenticator(apiKeys: ReadonlyMap<string, string>): Authenticator {
  return (request) => {
    const header = request.headers.authorization;
    if (!header) {
      throw new UnauthorizedError('Missing Authorization header');
    }

    const [scheme, token] = header.split(' ');
    if (scheme !== 'Bearer' || !token) {
      throw new UnauthorizedError('Expected a Bearer token');
    }

    const identity = apiKeys.get(token);
    if (identity === undefined) {
      throw new UnauthorizedError('Unknown API key');
    }
    return identity;
  };
}
