import { describe, it, expect } from 'vitest';
import {
  filterByService,
  listChangeInstances,
} from '../src/changes/change-instance-repository.js';
import { AuthenticationError } from '../src/errors.js';
import {
  createFakeHttpClient,
  jsonResponse,
  makeChange,
  makeContext,
  page,
  target,
} from './helpers/fake-http-client.js';

// ---------------------------------------------------------------------------
// listChangeInstances
// ---------------------------------------------------------------------------

describe('listChangeInstances', () => {
  it('GETs the change instance endpoint with the token header', async () => {
    const http = createFakeHttpClient(() => page([makeChange('a', 'LoadBalancer')]));

    const changes = await listChangeInstances(makeContext(http), 'test-token');

    expect(changes.map((c) => c.uuid)).toEqual(['a']);
    expect(http.requests).toHaveLength(1);
    expect(http.requests[0]!.method).toBe('GET');
    expect(target(http.requests[0]!)).toBe('/orcabase/change_instances/');
    expect(http.requests[0]!.headers['Authorization']).toBe('Token test-token');
  });

  it('sends the state filter as a query parameter', async () => {
    const http = createFakeHttpClient(() => page([]));

    await listChangeInstances(makeContext(http), 'test-token', { state: 'PENDING' });

    expect(target(http.requests[0]!)).toBe('/orcabase/change_instances/?state=PENDING');
  });

  it('does not send the service name to the server', async () => {
    const http = createFakeHttpClient(() => page([]));

    await listChangeInstances(makeContext(http), 'test-token', {
      state: 'APPROVED',
      serviceName: 'LoadBalancer',
    });

    expect(target(http.requests[0]!)).toBe('/orcabase/change_instances/?state=APPROVED');
  });

  it('filters by service name after retrieval, keeping server order', async () => {
    const http = createFakeHttpClient(() =>
      page([
        makeChange('c', 'LoadBalancer'),
        makeChange('x', 'Firewall'),
        makeChange('a', 'LoadBalancer'),
        makeChange('y', 'DNS'),
        makeChange('b', 'LoadBalancer'),
      ]),
    );

    const changes = await listChangeInstances(makeContext(http), 'test-token', {
      serviceName: 'LoadBalancer',
    });

    expect(changes.map((c) => c.uuid)).toEqual(['c', 'a', 'b']);
  });

  it('returns empty when the server reports count 0', async () => {
    const http = createFakeHttpClient(() => jsonResponse(200, { count: 0 }));

    const changes = await listChangeInstances(makeContext(http), 'test-token', {
      state: 'APPROVED',
      serviceName: 'LoadBalancer',
    });

    expect(changes).toEqual([]);
  });

  it('keeps fields the client does not model', async () => {
    const http = createFakeHttpClient(() =>
      page([{ ...makeChange('a', 'LoadBalancer'), change_type: 'CREATE', submission: 17 }]),
    );

    const [change] = await listChangeInstances(makeContext(http), 'test-token');

    expect(change).toMatchObject({ uuid: 'a', change_type: 'CREATE', submission: 17 });
  });

  it('propagates a rejected token', async () => {
    const http = createFakeHttpClient(() => jsonResponse(401, { detail: 'Invalid token.' }));

    await expect(listChangeInstances(makeContext(http), 'stale')).rejects.toBeInstanceOf(
      AuthenticationError,
    );
  });
});

// ---------------------------------------------------------------------------
// filterByService
// ---------------------------------------------------------------------------

describe('filterByService', () => {
  const changes = [
    makeChange('1', 'LoadBalancer'),
    makeChange('2', 'Firewall'),
    makeChange('3', 'LoadBalancer'),
  ];

  it('keeps matches in order', () => {
    expect(filterByService(changes, 'LoadBalancer').map((c) => c.uuid)).toEqual(['1', '3']);
  });

  it('returns empty when nothing matches', () => {
    expect(filterByService(changes, 'Storage')).toEqual([]);
  });

  it('matches the service name exactly', () => {
    expect(filterByService(changes, 'loadbalancer')).toEqual([]);
    expect(filterByService(changes, 'LoadBalancer ')).toEqual([]);
  });

  it('does not mutate its input', () => {
    const before = changes.map((c) => c.uuid);
    filterByService(changes, 'Firewall');
    expect(changes.map((c) => c.uuid)).toEqual(before);
  });
});
