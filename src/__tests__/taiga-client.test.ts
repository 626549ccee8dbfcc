import type { Server } from 'node:http';
import express, { type Express } from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TaigaApiError, TaigaClient, withTaigaClient, type TaigaClientSettings } from '../taiga-client.js';

interface SeenRequest {
  method: string;
  url: string;
  authorization?: string;
  body: unknown;
}

/** Minimal Taiga stand-in on an ephemeral local port. */
class TaigaStub {
  readonly seen: SeenRequest[] = [];
  readonly app: Express = express();
  private server?: Server;

  constructor() {
    this.app.use(express.json());
    this.app.use((req, _res, next) => {
      this.seen.push({
        method: req.method,
        url: req.originalUrl,
        authorization: req.headers.authorization,
        body: req.body,
      });
      next();
    });
  }

  async start(): Promise<string> {
    const server = await new Promise<Server>((resolve) => {
      const listening = this.app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    this.server = server;
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Stub server has no TCP address');
    }
    return `http://127.0.0.1:${address.port}/api/v1/`;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }

  after(method: string): SeenRequest[] {
    return this.seen.filter((request) => request.method === method && !request.url.endsWith('/auth'));
  }
}

describe('TaigaClient', () => {
  let stub: TaigaStub;
  let settings: TaigaClientSettings;

  beforeEach(async () => {
    stub = new TaigaStub();
    stub.app.post('/api/v1/auth', (_req, res) => {
      res.json({ auth_token: 'test-token', id: 42 });
    });
    settings = { baseUrl: '', username: 'bot', password: 'test-secret', timeoutMs: 2_000 };
  });

  afterEach(async () => {
    await stub.stop();
  });

  async function connect(overrides: Partial<TaigaClientSettings> = {}): Promise<TaigaClient> {
    const client = new TaigaClient({ ...settings, baseUrl: await stub.start(), ...overrides });
    await client.authenticate();
    return client;
  }

  it('logs in with the configured credentials and sends the token afterwards', async () => {
    stub.app.get('/api/v1/projects/3', (_req, res) => {
      res.json({ id: 3, name: 'Home Renovation' });
    });

    const client = await connect();
    const project = await client.getProject(3);

    expect(stub.seen[0]).toEqual({
      method: 'POST',
      url: '/api/v1/auth',
      authorization: undefined,
      body: { type: 'normal', username: 'bot', password: 'test-secret' },
    });
    expect(stub.after('GET')[0]?.authorization).toBe('Bearer test-token');
    expect(project).toEqual({ id: 3, name: 'Home Renovation' });
  });

  it('takes the user id from the login response', async () => {
    const client = await connect();

    await expect(client.getCurrentUserId()).resolves.toBe(42);
    expect(stub.seen).toHaveLength(1);
  });

  it('asks for the current user when the login response has no id', async () => {
    stub = new TaigaStub();
    stub.app.post('/api/v1/auth', (_req, res) => {
      res.json({ auth_token: 'test-token' });
    });
    stub.app.get('/api/v1/users/me', (_req, res) => {
      res.json({ id: 7, username: 'bot' });
    });

    const client = await connect();

    await expect(client.getCurrentUserId()).resolves.toBe(7);
    await expect(client.getCurrentUserId()).resolves.toBe(7);
    expect(stub.after('GET').map((request) => request.url)).toEqual(['/api/v1/users/me']);
  });

  it('reports a rejected login with its status and body', async () => {
    stub = new TaigaStub();
    stub.app.post('/api/v1/auth', (_req, res) => {
      res.status(401).json({ _error_message: 'bad credentials' });
    });

    const error = await connect().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TaigaApiError);
    expect(error).toMatchObject({
      message: 'Taiga authentication failed with status 401: {"_error_message":"bad credentials"}',
      statusCode: 401,
    });
  });

  it('rejects a login response without a token', async () => {
    stub = new TaigaStub();
    stub.app.post('/api/v1/auth', (_req, res) => {
      res.json({ id: 42 });
    });

    await expect(connect()).rejects.toThrow('Taiga authentication response did not contain auth_token');
  });

  it('wraps error responses with status and body text', async () => {
    stub.app.get('/api/v1/tasks/99', (_req, res) => {
      res.status(404).type('text/plain').send('missing');
    });

    const client = await connect();
    const error = await client.getTask(99).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TaigaApiError);
    expect(error).toMatchObject({ message: 'Taiga API request failed with status 404: missing', statusCode: 404 });
  });

  it('reports a timeout with the configured budget', async () => {
    stub.app.get('/api/v1/tasks/1', (_req, res) => {
      setTimeout(() => {
        if (!res.socket?.destroyed) res.json({ id: 1 });
      }, 500);
    });

    const client = await connect({ timeoutMs: 50 });

    await expect(client.getTask(1)).rejects.toThrow('Taiga API request timed out after 50ms');
  });

  it('reads task pagination from response headers', async () => {
    stub.app.get('/api/v1/tasks', (_req, res) => {
      res
        .set({
          'x-pagination-page': '2',
          'x-pagination-page-size': '30',
          'x-pagination-total': '45',
          'x-pagination-pages': 'n/a',
        })
        .json([{ id: 7, subject: 'Existing' }]);
    });

    const client = await connect();
    const page = await client.listTasks({ projectId: 3, status: 21, page: 2, search: '' });

    expect(stub.after('GET').map((request) => request.url)).toEqual(['/api/v1/tasks?project=3&status=21&page=2']);
    expect(page).toEqual({
      tasks: [{ id: 7, subject: 'Existing' }],
      pagination: { page: 2, page_size: 30, total: 45, total_pages: 'n/a' },
    });
  });

  it('leaves pagination empty without headers', async () => {
    stub.app.get('/api/v1/tasks', (_req, res) => {
      res.json([]);
    });

    const client = await connect();

    await expect(client.listTasks()).resolves.toEqual({ tasks: [], pagination: {} });
  });

  it('repeats the tags parameter for story filters', async () => {
    stub.app.get('/api/v1/userstories', (_req, res) => {
      res.json([]);
    });

    const client = await connect();
    await client.listUserStories(3, { q: 'mirror', tags: ['hall', 'paint'], epic: 2 });

    expect(stub.after('GET').map((request) => request.url)).toEqual([
      '/api/v1/userstories?project=3&epic=2&q=mirror&tags=hall&tags=paint',
    ]);
  });

  it('posts the epic link with both ids', async () => {
    stub.app.post('/api/v1/epics/1/related_userstories', (_req, res) => {
      res.status(201).json({ epic: 1, user_story: 5, order: 100 });
    });

    const client = await connect();

    await expect(client.linkEpicUserStory(1, 5)).resolves.toEqual({ epic: 1, user_story: 5, order: 100 });
    expect(stub.after('POST')[0]?.body).toEqual({ epic: 1, user_story: 5 });
  });

  it('sends partial updates as PATCH', async () => {
    stub.app.patch('/api/v1/tasks/7', (req, res) => {
      res.json({ id: 7, version: 3, ...req.body });
    });

    const client = await connect();
    const task = await client.updateTask(7, { subject: 'Revised', version: 2 });

    expect(stub.after('PATCH')[0]?.body).toEqual({ subject: 'Revised', version: 2 });
    expect(task).toEqual({ id: 7, version: 2, subject: 'Revised' });
  });

  it('names the first missing setting', () => {
    expect(() => new TaigaClient({ timeoutMs: 1_000 })).toThrow(
      'Environment variable TAIGA_BASE_URL must be configured'
    );
    expect(() => new TaigaClient({ baseUrl: 'http://taiga.test/api/v1', timeoutMs: 1_000 })).toThrow(
      'Environment variable TAIGA_USERNAME must be configured'
    );
    expect(
      () => new TaigaClient({ baseUrl: 'http://taiga.test/api/v1', username: 'bot', password: '', timeoutMs: 1_000 })
    ).toThrow('Environment variable TAIGA_PASSWORD must be configured');
  });
});

describe('withTaigaClient', () => {
  let stub: TaigaStub;

  beforeEach(() => {
    stub = new TaigaStub();
    stub.app.post('/api/v1/auth', (_req, res) => {
      res.json({ auth_token: 'test-token', id: 42 });
    });
    stub.app.get('/api/v1/milestones', (_req, res) => {
      res.json([{ id: 30, name: 'Milestone 4' }]);
    });
  });

  afterEach(async () => {
    await stub.stop();
  });

  it('logs in once per call', async () => {
    const baseUrl = await stub.start();
    const settings = { baseUrl, username: 'bot', password: 'test-secret', timeoutMs: 2_000 };

    await withTaigaClient(settings, (client) => client.listMilestones(9));
    const milestones = await withTaigaClient(settings, (client) => client.listMilestones(9));

    expect(milestones).toEqual([{ id: 30, name: 'Milestone 4' }]);
    expect(stub.seen.map((request) => `${request.method} ${request.url}`)).toEqual([
      'POST /api/v1/auth',
      'GET /api/v1/milestones?project=9',
      'POST /api/v1/auth',
      'GET /api/v1/milestones?project=9',
    ]);
  });
});
