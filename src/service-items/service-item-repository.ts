import {
  PATH_SERVICE_ITEMS,
  requestFirstPage,
  type ApiContext,
} from '../http/api-request.js';
import { ServiceItem } from '../schemas/output.schema.js';

/**
 * List the service items of `serviceName`. The filter runs server-side and
 * the result is not re-filtered. First page only.
 */
export async function listServiceItems(
  ctx: ApiContext,
  token: string,
  serviceName: string,
): Promise<ServiceItem[]> {
  const items = await requestFirstPage(
    ctx,
    { path: PATH_SERVICE_ITEMS, token, query: { service_name: serviceName } },
    ServiceItem,
  );
  ctx.logger.debug('Fetched service items', { serviceName, count: items.length });
  return items;
}
