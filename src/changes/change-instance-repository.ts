import {
  PATH_CHANGE_INSTANCES,
  requestFirstPage,
  type ApiContext,
} from '../http/api-request.js';
import type { ChangeState } from '../schemas/input.schema.js';
import { ChangeInstance } from '../schemas/output.schema.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ChangeInstanceQuery {
  /** Sent as the `state` query parameter */
  state?: ChangeState;
  /** Applied client-side after retrieval */
  serviceName?: string;
}

// ---------------------------------------------------------------------------
// filterByService
// ---------------------------------------------------------------------------

/**
 * Keep the change instances whose service item belongs to `serviceName`,
 * in their original order.
 */
export function filterByService(
  changes: readonly ChangeInstance[],
  serviceName: string,
): ChangeInstance[] {
  return changes.filter((change) => change.service_item.service.name === serviceName);
}

// ---------------------------------------------------------------------------
// listChangeInstances
// ---------------------------------------------------------------------------

/**
 * List the change instances visible to `token`.
 *
 * The state filter runs server-side; the service filter runs on the
 * returned page. Only the first page is read, so with a paginating server
 * a service filter can miss entries that live on later pages.
 */
export async function listChangeInstances(
  ctx: ApiContext,
  token: string,
  query: ChangeInstanceQuery = {},
): Promise<ChangeInstance[]> {
  const changes = await requestFirstPage(
    ctx,
    { path: PATH_CHANGE_INSTANCES, token, query: { state: query.state } },
    ChangeInstance,
  );
  ctx.logger.debug('Fetched change instances', { state: query.state, count: changes.length });

  if (query.serviceName) {
    return filterByService(changes, query.serviceName);
  }
  return changes;
}
