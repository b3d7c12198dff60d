/**
 * Tests for the REST call wrapper
 *
 * undici's MockAgent stands in for the Pulp server.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { Restlib, type RestlibOptions } from './restlib.js';
import { TransportError } from './errors.js';
import { MetricsCollector } from './metrics.js';
import type { Logger } from './logger.js';

const ORIGIN = 'https://pulp.example.com:8443';

describe('Restlib', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  function createRestlib(options: Partial<RestlibOptions> = {}): Restlib {
    return new Restlib({
      host: 'pulp.example.com',
      port: 8443,
      apiHandler: '/pulp/api',
      locale: 'en-us',
      dispatcher: mockAgent,
      ...options,
    });
  }

  describe('resolvePath', () => {
    it('should prefix the API handler', () => {
      expect(createRestlib().resolvePath('/repositories/')).toBe('/pulp/api/repositories/');
    });

    it('should not double the slash between handler and path', () => {
      expect(createRestlib({ apiHandler: '/pulp/api/' }).resolvePath('/users/')).toBe('/pulp/api/users/');
    });

    it('should keep paths that already carry the handler', () => {
      expect(createRestlib().resolvePath('/pulp/api/tasks/42/')).toBe('/pulp/api/tasks/42/');
    });
  });

  describe('request', () => {
    it('should decode a JSON response', async () => {
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/repositories/', method: 'GET' })
        .reply(200, [{ id: 'el9', name: 'EL 9', arch: 'x86_64' }]);

      const result = await createRestlib().requestGet('/repositories/');

      expect(result).toEqual([{ id: 'el9', name: 'EL 9', arch: 'x86_64' }]);
    });

    it('should send JSON headers and the locale', async () => {
      mockAgent.get(ORIGIN)
        .intercept({
          path: '/pulp/api/users/',
          method: 'GET',
          headers: {
            'content-type': 'application/json',
            accept: 'application/json',
            'accept-language': 'cs-cz',
          },
        })
        .reply(200, []);

      await expect(createRestlib({ locale: 'cs-cz' }).requestGet('/users/')).resolves.toEqual([]);
    });

    it('should send basic auth credentials', async () => {
      const encoded = Buffer.from('test-user:test-secret').toString('base64');
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/users/', method: 'GET', headers: { authorization: `Basic ${encoded}` } })
        .reply(200, []);

      const restlib = createRestlib({ username: 'test-user', password: 'test-secret' });

      await expect(restlib.requestGet('/users/')).resolves.toEqual([]);
    });

    it('should send the body as JSON', async () => {
      mockAgent.get(ORIGIN)
        .intercept({
          path: '/pulp/api/repositories/el9/add_package/',
          method: 'POST',
          body: JSON.stringify({ repoid: 'el9', packageid: 'pkg-1' }),
        })
        .reply(202, { accepted: true });

      const result = await createRestlib().requestPost('/repositories/el9/add_package/', {
        repoid: 'el9',
        packageid: 'pkg-1',
      });

      expect(result).toEqual({ accepted: true });
    });

    it('should resolve to null for 404', async () => {
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/consumers/missing/', method: 'GET' })
        .reply(404, 'Not found');

      await expect(createRestlib().requestGet('/consumers/missing/')).resolves.toBeNull();
    });

    it('should resolve to null for an empty body', async () => {
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/consumers/c1/', method: 'DELETE' })
        .reply(204, '');

      await expect(createRestlib().requestDelete('/consumers/c1/')).resolves.toBeNull();
    });

    it('should reject other statuses with a TransportError', async () => {
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/repositories/', method: 'PUT' })
        .reply(409, 'Repository already exists');

      const error = await createRestlib().requestPut('/repositories/', { id: 'el9' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        statusCode: 409,
        body: 'Repository already exists',
        message: '409: Repository already exists',
      });
    });
  });

  describe('observability', () => {
    it('should record API call metrics', async () => {
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/packages/', method: 'GET' })
        .reply(200, []);
      const metrics = new MetricsCollector({ enabled: true });

      await createRestlib({ metrics }).requestGet('/packages/');

      const output = await metrics.getMetrics();
      expect(output).toContain('pulp_api_calls_total{method="GET",status="2xx"} 1');
    });

    it('should log request and response at debug level', async () => {
      mockAgent.get(ORIGIN)
        .intercept({ path: '/pulp/api/packages/', method: 'GET' })
        .reply(200, []);
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

      await createRestlib({ logger }).requestGet('/packages/');

      expect(logger.debug).toHaveBeenCalledWith('Pulp API response', {
        method: 'GET',
        url: `${ORIGIN}/pulp/api/packages/`,
        status: 200,
      });
    });
  });

  describe('close', () => {
    it('should leave an injected dispatcher open', async () => {
      const close = vi.spyOn(mockAgent, 'close');

      await createRestlib().close();

      expect(close).not.toHaveBeenCalled();
    });
  });
});
