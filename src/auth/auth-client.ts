/**
 * Token authentication.
 *
 * A token is obtained at most once per operation and handed to every call
 * that follows. Nothing here caches it.
 */

import { AuthenticationError, OrcaErrorCode, ServerError, describeError } from '../errors.js';
import { PATH_LOGIN, requestJson, type ApiContext } from '../http/api-request.js';
import { TokenResponse } from '../schemas/output.schema.js';
import type { Credential } from './credential.js';

/**
 * Exchange a username and password for a token.
 *
 * Throws AuthenticationError when the service rejects the credentials
 * (400, 401 or 403) or answers without a usable `token` field.
 */
export async function login(
  ctx: ApiContext,
  username: string,
  password: string,
): Promise<string> {
  ctx.logger.debug('Logging in', { username });
  try {
    const { token } = await requestJson(
      ctx,
      { method: 'POST', path: PATH_LOGIN, body: { username, password } },
      TokenResponse,
    );
    return token;
  } catch (err) {
    if (err instanceof ServerError && (err.status === 400 || err.code === OrcaErrorCode.INVALID_RESPONSE)) {
      throw new AuthenticationError(
        `Login as "${username}" did not yield a token: ${describeError(err)}`,
        err.status,
        { cause: err },
      );
    }
    throw err;
  }
}

/**
 * Token for `credential`: the API key itself, or the result of one login.
 */
export async function resolveToken(ctx: ApiContext, credential: Credential): Promise<string> {
  switch (credential.kind) {
    case 'api-key':
      ctx.logger.debug('API key provided, skipping login');
      return credential.apiKey;
    case 'user-pass':
      return login(ctx, credential.username, credential.password);
  }
}
