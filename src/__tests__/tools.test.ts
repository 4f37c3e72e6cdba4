import { afterEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer } from '../server.js';
import { TOOL_NAMES, describeError, runTool } from '../tools/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { NotFoundError, RemoteError, ResolutionError, ValidationError } from '../errors.js';
import { FakeTick, entry, project, testConfig, user } from './helpers/fake-tick.js';

async function connect(fake: FakeTick): Promise<Client> {
  const server = createMcpServer(testConfig(), { fetch: fake.fetch, logger: silentLogger });
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);
  return client;
}

describe('MCP tools', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  it('registers every tool', async () => {
    client = await connect(new FakeTick());

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it('returns results as JSON text', async () => {
    const fake = new FakeTick().on('DELETE', '/entries/7.json', { status: 204 });
    client = await connect(fake);

    const result = await client.callTool({ name: 'delete_time_entry', arguments: { entry_id: 7 } });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([
      { type: 'text', text: JSON.stringify({ success: true, message: 'Deleted time entry 7' }, null, 2) },
    ]);
  });

  it('returns validation failures as error results without calling Tick', async () => {
    const fake = new FakeTick();
    client = await connect(fake);

    const result = await client.callTool({
      name: 'create_time_entry',
      arguments: { project: 'web', task: 'dev', hours: 'abc', date: '2024-01-01' },
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: 'text', text: "Invalid arguments: hours must be a positive number, got 'abc'" },
    ]);
    expect(fake.calls).toHaveLength(0);
  });

  it('lists the candidates when a project name does not match', async () => {
    const fake = new FakeTick().onPages('/projects.json', [[project(1, 'Website'), project(2, 'Mobile App')]]);
    client = await connect(fake);

    const result = await client.callTool({ name: 'get_project_tasks', arguments: { project: 'payroll' } });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: 'text',
        text:
          "No project matching 'payroll' was found. Run list_projects to see the available projects." +
          '\n\nAvailable projects: Website, Mobile App',
      },
    ]);
  });

  it('passes entries through get_time_entries', async () => {
    const fake = new FakeTick()
      .onPages('/entries.json', [[entry(1, '2024-01-02', 3)]])
      .on('GET', '/users.json', { body: [user(1, 'Ada', 'Lovelace')] });
    client = await connect(fake);

    const result = await client.callTool({
      name: 'get_time_entries',
      arguments: { start_date: '2024-01-01', end_date: '2024-01-31' },
    });

    expect(result.isError).toBeFalsy();
    expect(fake.callsTo('GET', '/entries.json')).toHaveLength(1);
  });

  it('reports an unknown period in its own words', async () => {
    const fake = new FakeTick();
    client = await connect(fake);

    const result = await client.callTool({ name: 'get_time_summary_by_period', arguments: { period: 'year' } });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: 'text', text: "Invalid arguments: period must be one of day, week, month, got 'year'" },
    ]);
    expect(fake.calls).toHaveLength(0);
  });

  it('refuses an entry id beyond exact integer range', async () => {
    const fake = new FakeTick().on('DELETE', '/entries/9007199254740992.json', { status: 204 });
    client = await connect(fake);

    const result = await client.callTool({ name: 'delete_time_entry', arguments: { entry_id: '9007199254740993' } });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      { type: 'text', text: "Invalid arguments: entry_id must be a positive integer, got '9007199254740993'" },
    ]);
    expect(fake.calls).toHaveLength(0);
  });
});

describe('describeError', () => {
  it('prefixes validation failures', () => {
    expect(describeError(new ValidationError('hours is required', 'hours'))).toBe('Invalid arguments: hours is required');
  });

  it('caps the list of candidates', () => {
    const names = Array.from({ length: 53 }, (_, i) => `Project ${i + 1}`);
    const text = describeError(new ResolutionError('project', 'zzz', names));

    expect(text.endsWith('Project 49, Project 50 (and 3 more)')).toBe(true);
  });

  it('leaves the candidate list out when there are none', () => {
    expect(describeError(new ResolutionError('client', 'acme', []))).toBe(
      "No client matching 'acme' was found. Run list_clients to see the available clients."
    );
  });

  it('prefixes missing resources', () => {
    expect(describeError(new NotFoundError('Time entry', 5))).toBe('Not found: Time entry 5 does not exist');
  });

  it('hints at credentials on 401', () => {
    expect(describeError(new RemoteError('Tick API error: 401 Unauthorized', 401))).toBe(
      'Tick API error: 401 Unauthorized. Check TICK_API_TOKEN and TICK_SUBDOMAIN.'
    );
  });

  it('passes other remote failures through', () => {
    expect(describeError(new RemoteError('Tick API error: 500 Internal Server Error', 500))).toBe(
      'Tick API error: 500 Internal Server Error'
    );
  });

  it('marks anything else as unexpected', () => {
    expect(describeError(new TypeError('boom'))).toBe('Unexpected error: boom');
    expect(describeError('plain string')).toBe('Unexpected error: plain string');
  });
});

describe('runTool', () => {
  it('logs expected failures as warnings', async () => {
    const warn = vi.fn();
    const error = vi.fn();
    const logger: Logger = { ...silentLogger, warn, error };

    const result = await runTool('delete_time_entry', logger, async () => {
      throw new NotFoundError('Time entry', 5);
    });

    expect(result.isError).toBe(true);
    expect(warn).toHaveBeenCalledWith('delete_time_entry failed: Not found: Time entry 5 does not exist');
    expect(error).not.toHaveBeenCalled();
  });

  it('logs unexpected failures as errors', async () => {
    const error = vi.fn();
    const logger: Logger = { ...silentLogger, error };
    const failure = new Error('kaboom');

    const result = await runTool('list_projects', logger, async () => {
      throw failure;
    });

    expect(result.content).toEqual([{ type: 'text', text: 'Unexpected error: kaboom' }]);
    expect(error).toHaveBeenCalledWith('list_projects failed unexpectedly:', failure);
  });
});
