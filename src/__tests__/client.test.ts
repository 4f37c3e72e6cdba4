import { describe, expect, it } from 'vitest';
import { TickClient } from '../tick/client.js';
import { NotFoundError, RemoteError } from '../errors.js';
import { FakeTick, entry, project, rejectionOf, testConfig } from './helpers/fake-tick.js';

function clientFor(fake: FakeTick, overrides: Record<string, string> = {}): TickClient {
  return new TickClient(testConfig(overrides).tick, { fetch: fake.fetch });
}

describe('TickClient', () => {
  describe('requests', () => {
    it('sends the token, user agent and query parameters', async () => {
      const fake = new FakeTick().onPages('/entries.json', [[]]);

      await clientFor(fake).listEntries({ start_date: '2024-01-01', end_date: '2024-01-31' });

      expect(fake.calls).toHaveLength(1);
      const [call] = fake.calls;
      expect(call.method).toBe('GET');
      expect(call.path).toBe('/entries.json');
      expect(call.query).toEqual({ start_date: '2024-01-01', end_date: '2024-01-31', page: '1' });
      expect(call.headers['authorization']).toBe('Token token=test-token');
      expect(call.headers['user-agent']).toBe('TickMCP/0.1.0');
    });

    it('omits undefined filters', async () => {
      const fake = new FakeTick().onPages('/entries.json', [[]]);

      await clientFor(fake).listEntries({ start_date: '2024-01-01', project_id: undefined });

      expect(fake.calls[0].query).toEqual({ start_date: '2024-01-01', page: '1' });
    });

    it('sends JSON bodies on writes', async () => {
      const fake = new FakeTick().on('POST', '/entries.json', { status: 201, body: entry(5, '2024-01-01', 1) });

      const created = await clientFor(fake).createEntry({ project_id: 1, task_id: 10, hours: 1, date: '2024-01-01' });

      expect(created.id).toBe(5);
      expect(fake.calls[0].headers['content-type']).toBe('application/json');
      expect(fake.calls[0].body).toEqual({ project_id: 1, task_id: 10, hours: 1, date: '2024-01-01' });
    });

    it('turns non-2xx responses into RemoteError with the status', async () => {
      const fake = new FakeTick().on('GET', '/users.json', { status: 401, body: 'HTTP Token: Access denied.' });

      const error = await rejectionOf(clientFor(fake).listUsers(), RemoteError);

      expect(error.statusCode).toBe(401);
      expect(error.errorBody).toBe('HTTP Token: Access denied.');
      expect(error.isUnauthorized).toBe(true);
    });

    it('turns timeouts into RemoteError without retrying', async () => {
      let attempts = 0;
      const client = new TickClient(testConfig({ TICK_REQUEST_TIMEOUT_MS: '250' }).tick, {
        fetch: async () => {
          attempts++;
          throw new DOMException('The operation was aborted due to timeout', 'TimeoutError');
        },
      });

      await expect(client.listUsers()).rejects.toThrow(
        'Tick API request timed out after 250ms: GET /users.json'
      );
      expect(attempts).toBe(1);
    });

    it('turns network failures into RemoteError', async () => {
      const client = new TickClient(testConfig().tick, {
        fetch: async () => {
          throw new TypeError('fetch failed');
        },
      });

      const error = await rejectionOf(client.listUsers(), RemoteError);

      expect(error.message).toBe('Tick API request failed: GET /users.json: fetch failed');
      expect(error.statusCode).toBeUndefined();
    });
  });

  describe('collectPages', () => {
    it('concatenates full pages until a short page, in order', async () => {
      const pages = [
        [project(1, 'A'), project(2, 'B'), project(3, 'C')],
        [project(4, 'D'), project(5, 'E'), project(6, 'F')],
        [project(7, 'G')],
      ];
      const fake = new FakeTick().onPages('/projects.json', pages);

      const projects = await clientFor(fake, { TICK_PAGE_SIZE: '3' }).listAllProjects();

      expect(projects.map((p) => p.id)).toEqual([1, 2, 3, 4, 5, 6, 7]);
      expect(fake.calls.map((c) => c.query.page)).toEqual(['1', '2', '3']);
    });

    it('fetches once when the first page is short', async () => {
      const fake = new FakeTick().onPages('/projects.json', [[project(1, 'A')]]);

      const projects = await clientFor(fake, { TICK_PAGE_SIZE: '3' }).listAllProjects();

      expect(projects).toHaveLength(1);
      expect(fake.calls).toHaveLength(1);
    });

    it('stops on an empty page after exactly full pages', async () => {
      const fake = new FakeTick().onPages('/projects.json', [[project(1, 'A'), project(2, 'B')]]);

      const projects = await clientFor(fake, { TICK_PAGE_SIZE: '2' }).listAllProjects();

      expect(projects).toHaveLength(2);
      expect(fake.calls).toHaveLength(2);
    });

    it('fails the whole collection when a later page fails', async () => {
      const fake = new FakeTick().on('GET', '/projects.json', (call) =>
        call.query.page === '1'
          ? { body: [project(1, 'A'), project(2, 'B')] }
          : { status: 503, body: 'Service Unavailable' }
      );

      await expect(clientFor(fake, { TICK_PAGE_SIZE: '2' }).listAllProjects()).rejects.toBeInstanceOf(RemoteError);
    });
  });

  describe('entry writes', () => {
    it('deletes an entry', async () => {
      const fake = new FakeTick().on('DELETE', '/entries/42.json', { status: 204 });

      await expect(clientFor(fake).deleteEntry(42)).resolves.toBeUndefined();
      expect(fake.calls).toHaveLength(1);
    });

    it('reports a missing entry on delete as NotFoundError', async () => {
      const fake = new FakeTick().on('DELETE', '/entries/42.json', { status: 404, body: 'Not Found' });

      const error = await rejectionOf(clientFor(fake).deleteEntry(42), NotFoundError);

      expect(error).not.toBeInstanceOf(RemoteError);
      expect(error.message).toBe('Time entry 42 does not exist');
    });

    it('reports a missing entry on update as NotFoundError', async () => {
      const fake = new FakeTick().on('PUT', '/entries/7.json', { status: 404, body: 'Not Found' });

      await expect(clientFor(fake).updateEntry(7, { hours: 2 })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('keeps other update failures as RemoteError', async () => {
      const fake = new FakeTick().on('PUT', '/entries/7.json', { status: 422, body: '{"hours":["is invalid"]}' });

      const error = await rejectionOf(clientFor(fake).updateEntry(7, { hours: 2 }), RemoteError);

      expect(error.statusCode).toBe(422);
    });
  });
});
