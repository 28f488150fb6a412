import { z } from 'zod';
import { WebSocket } from 'ws';
import { ChatService } from '../src/application/services/ChatService.js';
import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { SqliteDocumentStore } from '../src/infrastructure/database/SqliteDocumentStore.js';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import type { StoreHandle } from '../src/core/interfaces/IDocumentStore.js';

const EnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  code: z.string().optional(),
  details: z.array(z.object({ path: z.string(), message: z.string() })).optional(),
});

const IdSchema = z.object({ id: z.string() });

async function startServer(handle: StoreHandle): Promise<{ server: WebServer; baseUrl: string }> {
  const server = new WebServer(new ChatService(handle), {
    host: '127.0.0.1',
    port: 0,
    corsOrigins: ['*'],
  });
  await server.start();
  return { server, baseUrl: `http://127.0.0.1:${server.getPort()}` };
}

describe('WebServer', () => {
  let store: SqliteDocumentStore;
  let server: WebServer;
  let baseUrl: string;

  const request = async (method: string, path: string, body?: unknown) => {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, body: EnvelopeSchema.parse(await res.json()) };
  };

  const createConversation = async (title: string): Promise<string> => {
    const { body } = await request('POST', '/api/conversations', { title });
    return IdSchema.parse(body.data).id;
  };

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    store = new SqliteDocumentStore(new DatabaseConnection(':memory:'));
    ({ server, baseUrl } = await startServer({ status: 'available', store }));
  });

  afterEach(async () => {
    await server.stop();
    store.close();
    jest.restoreAllMocks();
  });

  test('should answer the root and hello routes', async () => {
    const root = await fetch(`${baseUrl}/`);
    expect(await root.json()).toEqual({ message: 'Chat backend is running' });

    const hello = await fetch(`${baseUrl}/api/hello`);
    expect(await hello.json()).toEqual({ message: 'Hello from the backend API!' });
  });

  test('should create and list conversations newest first', async () => {
    const created = await request('POST', '/api/conversations', { title: 'First', createdBy: 'sam' });
    expect(created).toEqual({
      status: 200,
      body: { success: true, data: { id: '1', title: 'First', createdBy: 'sam' } },
    });
    await createConversation('Second');

    const listed = await request('GET', '/api/conversations');
    expect(listed.body.data).toEqual([
      { id: '2', title: 'Second' },
      { id: '1', title: 'First', createdBy: 'sam' },
    ]);
  });

  test('should accept a null author and omit it from the conversation', async () => {
    const created = await request('POST', '/api/conversations', { title: 'Anonymous', createdBy: null });
    expect(created).toEqual({
      status: 200,
      body: { success: true, data: { id: '1', title: 'Anonymous' } },
    });
  });

  test('should send a message and return the assistant reply', async () => {
    const id = await createConversation('Chat');

    const sent = await request('POST', `/api/conversations/${id}/send`, { content: 'HELLO' });
    expect(sent).toEqual({
      status: 200,
      body: {
        success: true,
        data: {
          id: '2',
          conversationId: id,
          role: 'assistant',
          content: 'Hey there! How can I help you today?',
        },
      },
    });

    const messages = await request('GET', `/api/conversations/${id}/messages`);
    expect(messages.body.data).toEqual([
      { id: '1', conversationId: id, role: 'user', content: 'HELLO' },
      { id: '2', conversationId: id, role: 'assistant', content: 'Hey there! How can I help you today?' },
    ]);
  });

  test('should add a message without generating a reply', async () => {
    const id = await createConversation('Manual');

    const added = await request('POST', `/api/conversations/${id}/messages`, {
      role: 'assistant',
      content: 'Welcome back.',
    });
    expect(added.body.data).toEqual({
      id: '1',
      conversationId: id,
      role: 'assistant',
      content: 'Welcome back.',
    });

    const messages = await request('GET', `/api/conversations/${id}/messages`);
    expect(messages.body.data).toEqual([added.body.data]);
  });

  test('should answer 400 for a malformed conversation id', async () => {
    const res = await request('POST', '/api/conversations/not-an-id/send', { content: 'hello' });
    expect(res).toEqual({
      status: 400,
      body: { success: false, error: 'Invalid conversation id', code: 'INVALID_IDENTIFIER' },
    });
  });

  test('should answer 404 for an unknown conversation and store nothing', async () => {
    const res = await request('POST', '/api/conversations/42/send', { content: 'hello' });
    expect(res).toEqual({
      status: 404,
      body: { success: false, error: 'Conversation not found', code: 'CONVERSATION_NOT_FOUND' },
    });

    const messages = await request('GET', '/api/conversations/42/messages');
    expect(messages.body.data).toEqual([]);
  });

  test('should answer 422 for an invalid role', async () => {
    const id = await createConversation('Roles');
    const res = await request('POST', `/api/conversations/${id}/messages`, {
      role: 'system',
      content: 'x',
    });

    expect(res).toEqual({
      status: 422,
      body: {
        success: false,
        error: 'Request validation failed',
        code: 'VALIDATION_ERROR',
        details: [{ path: 'role', message: "Role must be 'user' or 'assistant'" }],
      },
    });
  });

  test('should answer 422 for a missing title', async () => {
    const res = await request('POST', '/api/conversations', {});
    expect(res.status).toBe(422);
    expect(res.body.details).toEqual([{ path: 'title', message: 'Conversation title is required' }]);
  });

  test('should answer 422 for a malformed JSON body', async () => {
    const res = await fetch(`${baseUrl}/api/conversations`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"title": ',
    });
    expect(res.status).toBe(422);
    expect(EnvelopeSchema.parse(await res.json()).details).toEqual([
      { path: 'body', message: 'Malformed JSON body' },
    ]);
  });

  test('should answer 413 for an oversized body without logging a server fault', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const id = await createConversation('Big');

    const res = await request('POST', `/api/conversations/${id}/send`, { content: 'x'.repeat(200_000) });
    expect(res).toEqual({
      status: 413,
      body: { success: false, error: 'request entity too large', code: 'PAYLOAD_TOO_LARGE' },
    });
    expect(errorSpy).not.toHaveBeenCalled();

    const messages = await request('GET', `/api/conversations/${id}/messages`);
    expect(messages.body.data).toEqual([]);
  });

  test('should answer 415 for an unsupported charset', async () => {
    const res = await fetch(`${baseUrl}/api/conversations`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json; charset=latin1' },
      body: JSON.stringify({ title: 'x' }),
    });
    expect(res.status).toBe(415);
    expect(EnvelopeSchema.parse(await res.json())).toMatchObject({
      success: false,
      code: 'INVALID_REQUEST_BODY',
    });
  });

  test('should answer 404 for unknown routes', async () => {
    const res = await request('GET', '/api/unknown');
    expect(res).toEqual({
      status: 404,
      body: { success: false, error: 'Route not found', code: 'NOT_FOUND' },
    });
  });

  test('should report store diagnostics', async () => {
    const res = await request('GET', '/api/health');
    const data = z
      .object({ backend: z.string(), database: z.object({ status: z.string(), collections: z.array(z.string()) }) })
      .parse(res.body.data);

    expect(data.backend).toBe('running');
    expect(data.database).toEqual({ status: 'connected', collections: ['conversations', 'messages'] });
  });

  test('should broadcast conversation updates over WebSocket', async () => {
    const id = await createConversation('Live');
    const ws = new WebSocket(baseUrl.replace('http', 'ws'));
    const events: unknown[] = [];

    const received = new Promise<void>((resolve, reject) => {
      ws.on('message', (data) => {
        events.push(JSON.parse(data.toString()));
        if (events.length === 2) resolve();
      });
      ws.on('error', reject);
    });

    await new Promise<void>((resolve, reject) => {
      ws.on('open', () => resolve());
      ws.on('error', reject);
    });
    await request('POST', `/api/conversations/${id}/send`, { content: '/todo one' });
    await received;
    ws.close();

    expect(events).toEqual([
      { type: 'connected', timestamp: expect.any(String) },
      { type: 'conversation_updated', conversationId: id, timestamp: expect.any(String) },
    ]);
  });
});

describe('WebServer without a store', () => {
  let server: WebServer;
  let baseUrl: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
    ({ server, baseUrl } = await startServer({ status: 'unavailable', reason: 'unable to open database file' }));
  });

  afterEach(async () => {
    await server.stop();
    jest.restoreAllMocks();
  });

  test('should answer 500 on every data route', async () => {
    const routes: Array<[string, string, unknown]> = [
      ['GET', '/api/conversations', undefined],
      ['POST', '/api/conversations', { title: 'x' }],
      ['GET', '/api/conversations/1/messages', undefined],
      ['POST', '/api/conversations/1/messages', { role: 'user', content: 'x' }],
      ['POST', '/api/conversations/1/send', { content: 'x' }],
    ];

    for (const [method, path, body] of routes) {
      const res = await fetch(`${baseUrl}${path}`, {
        method,
        headers: body === undefined ? {} : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Database not available',
        code: 'STORE_UNAVAILABLE',
      });
    }
    expect(console.error).toHaveBeenCalledWith('[WebServer] Request failed:', {
      name: 'StoreUnavailableError',
      message: 'Database not available',
      code: 'STORE_UNAVAILABLE',
      statusCode: 500,
      context: { reason: 'unable to open database file' },
    });
  });

  test('should still report health', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
  });
});
