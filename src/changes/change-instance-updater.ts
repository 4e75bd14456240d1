import {
  PATH_CHANGE_INSTANCES,
  requestJson,
  type ApiContext,
} from '../http/api-request.js';
import type { ChangeState, JsonObject } from '../schemas/input.schema.js';
import { UpdateResponse } from '../schemas/output.schema.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ChangeInstanceFields {
  state: ChangeState;
  /** Attached as `deployed_item`; omitted when undefined or null */
  deployedItem?: unknown;
  /** Sent as-is, null included; `{}` when undefined */
  description?: JsonObject | null;
}

/**
 * Body of the PUT. The endpoint replaces the whole document, so
 * `description` is always present.
 */
export interface UpdateDocument {
  description: JsonObject | null;
  state: ChangeState;
  deployed_item?: unknown;
}

// ---------------------------------------------------------------------------
// buildUpdateDocument
// ---------------------------------------------------------------------------

export function buildUpdateDocument(fields: ChangeInstanceFields): UpdateDocument {
  const document: UpdateDocument = {
    description: fields.description === undefined ? {} : fields.description,
    state: fields.state,
  };
  if (fields.deployedItem !== undefined && fields.deployedItem !== null) {
    document.deployed_item = fields.deployedItem;
  }
  return document;
}

// ---------------------------------------------------------------------------
// updateChangeInstance
// ---------------------------------------------------------------------------

/**
 * Replace the change instance `uuid` with a document built from `fields`
 * and return the server's representation unchanged.
 *
 * There is no concurrency check: the last write wins.
 */
export async function updateChangeInstance(
  ctx: ApiContext,
  token: string,
  uuid: string,
  fields: ChangeInstanceFields,
): Promise<UpdateResponse> {
  const document = buildUpdateDocument(fields);
  ctx.logger.debug('Updating change instance', { uuid, state: document.state });
  return requestJson(
    ctx,
    {
      method: 'PUT',
      path: `${PATH_CHANGE_INSTANCES}${encodeURIComponent(uuid)}/`,
      token,
      body: document,
    },
    UpdateResponse,
  );
}
