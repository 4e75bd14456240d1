import { ValidationError } from '../errors.js';
import type { ConnectionParams } from '../schemas/input.schema.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/**
 * How the caller proves identity. Resolved once from validated parameters;
 * nothing past the operations layer inspects raw parameter fields.
 */
export type Credential =
  | { kind: 'api-key'; apiKey: string }
  | { kind: 'user-pass'; username: string; password: string };

// ---------------------------------------------------------------------------
// resolveCredential
// ---------------------------------------------------------------------------

/**
 * Pick the credential form from connection parameters. An API key wins over
 * a username/password pair when both are present.
 */
export function resolveCredential(
  params: Pick<ConnectionParams, 'apiKey' | 'username' | 'password'>,
): Credential {
  if (params.apiKey) {
    return { kind: 'api-key', apiKey: params.apiKey };
  }
  if (params.username && params.password) {
    return { kind: 'user-pass', username: params.username, password: params.password };
  }
  throw new ValidationError('If no apiKey is specified, username and password are required');
}
