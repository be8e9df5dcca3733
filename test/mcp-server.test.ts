// This test suite verifies method dispatch, negotiation, error mapping, subscriptions, and shutdown of the MCP server.

import { describe, expect, it } from 'vitest';
import { CancellationToken } from '../src/mcp/cancellation.js';
import { McpServer, toRpcError } from '../src/mcp/mcp-server.js';
import type { DispatchOutcome } from '../src/types/mcp.js';
import { CancellationError, InternalError, ProtocolError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';
import { LATEST_PROTOCOL_VERSION } from '../src/version.js';

const logger = createLogger('silent');

function makeServer(): McpServer {
  const server = new McpServer({ logger });
  server.tools.register(
    'add',
    { properties: { a: { type: 'number' }, b: { type: 'number' } }, required: ['a', 'b'] },
    (args) => String(Number(args.a) + Number(args.b)),
    { description: 'Adds two numbers' }
  );
  server.tools.register('explode', {}, () => {
    throw new Error('secret stack detail');
  });
  server.resources.register('motd', 'text://motd', () => 'Welcome', { mimeType: 'text/plain' });
  server.prompts.register('greet', { properties: { name: { type: 'string' } }, required: ['name'] }, (args) => {
    return `Greet ${String(args.name)}`;
  });
  server.notifications.drain();
  return server;
}

function resultOf(outcome: DispatchOutcome): Record<string, unknown> {
  if (!outcome.ok) {
    throw new Error(`Expected success, received ${outcome.error.code} ${outcome.error.message}`);
  }
  return outcome.result;
}

describe('mcp server dispatch', () => {
  it('negotiates the latest version for any supported requested version', async () => {
    const server = makeServer();

    const outcome = await server.handle('initialize', {
      protocolVersion: '2024-11-05',
      capabilities: { roots: { listChanged: true } },
      clientInfo: { name: 'test-client', version: '1.0.0' }
    });

    expect(resultOf(outcome)).toEqual({
      protocolVersion: LATEST_PROTOCOL_VERSION,
      capabilities: {
        logging: {},
        prompts: { listChanged: true },
        resources: { listChanged: true, subscribe: true },
        tools: { listChanged: true }
      },
      serverInfo: { name: 'mcp-capability-server', version: '0.1.0' }
    });
    expect(server.getClientState()?.clientInfo).toEqual({ name: 'test-client', version: '1.0.0' });
    expect(server.sessions.getSessionId()).toMatch(/^[0-9a-f]{32}$/);
  });

  it('rejects unsupported or missing protocol versions', async () => {
    const server = makeServer();

    expect(await server.handle('initialize', { protocolVersion: '1999-01-01' })).toEqual({
      ok: false,
      error: {
        code: -32602,
        message: 'Unsupported protocol version',
        data: { supported: ['2025-03-26', '2024-11-05', '2024-10-07'], requested: '1999-01-01' }
      }
    });

    const missing = await server.handle('initialize', {});
    expect(missing.ok ? null : missing.error.data).toEqual({
      supported: ['2025-03-26', '2024-11-05', '2024-10-07'],
      requested: null
    });
  });

  it('returns the same negotiated body when initialized twice', async () => {
    const server = makeServer();
    const params = { protocolVersion: LATEST_PROTOCOL_VERSION };

    const first = resultOf(await server.handle('initialize', params));
    const second = resultOf(await server.handle('initialize', params));

    expect(second).toEqual(first);
  });

  it('merges host capabilities into the declared set', async () => {
    const server = new McpServer({ logger, capabilities: { tools: { custom: 1 }, experimental: { beta: true } } });
    server.registerCapabilities({ completions: {} });

    const result = resultOf(await server.handle('initialize', { protocolVersion: LATEST_PROTOCOL_VERSION }));

    expect(result.capabilities).toEqual({
      experimental: { beta: true },
      logging: {},
      completions: {},
      prompts: { listChanged: true },
      resources: { listChanged: true, subscribe: true },
      tools: { listChanged: true, custom: 1 }
    });
  });

  it('answers ping and rejects unknown methods', async () => {
    const server = makeServer();

    expect(await server.handle('ping')).toEqual({ ok: true, result: {} });
    expect(await server.handle('tools/destroy')).toEqual({
      ok: false,
      error: { code: -32601, message: 'Method not found', data: { method: 'tools/destroy' } }
    });
  });

  it('lists registry contents', async () => {
    const server = makeServer();

    expect(resultOf(await server.handle('tools/list')).tools).toEqual([
      {
        name: 'add',
        description: 'Adds two numbers',
        inputSchema: {
          type: 'object',
          properties: { a: { type: 'number' }, b: { type: 'number' } },
          required: ['a', 'b']
        }
      },
      { name: 'explode', inputSchema: { type: 'object', properties: {} } }
    ]);
    expect(resultOf(await server.handle('resources/list')).resources).toEqual([
      { name: 'motd', uri: 'text://motd', mimeType: 'text/plain' }
    ]);
    expect(resultOf(await server.handle('resources/templates/list')).resourceTemplates).toEqual([]);
    expect(resultOf(await server.handle('prompts/list')).prompts).toEqual([
      { name: 'greet', arguments: [{ name: 'name', required: true }] }
    ]);
  });

  it('calls tools and shapes the result envelope', async () => {
    const server = makeServer();

    expect(await server.handle('tools/call', { name: 'add', arguments: { a: 2, b: 3 } })).toEqual({
      ok: true,
      result: { content: [{ type: 'text', text: '5' }] }
    });
  });

  it('maps unknown tools and invalid arguments to invalid params', async () => {
    const server = makeServer();

    expect(await server.handle('tools/call', { name: 'nope' })).toEqual({
      ok: false,
      error: { code: -32602, message: 'Unknown tool', data: { kind: 'tool', target: 'nope' } }
    });
    expect(await server.handle('tools/call', { name: 'add', arguments: { a: 2 } })).toEqual({
      ok: false,
      error: {
        code: -32602,
        message: 'Invalid params',
        data: { path: 'b', constraint: 'required', message: 'Missing required parameter: b' }
      }
    });
  });

  it('reports malformed method params as invalid params', async () => {
    const server = makeServer();

    const outcome = await server.handle('tools/call', { arguments: {} });

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.code).toBe(-32602);
      expect(outcome.error.data).toMatchObject({ path: 'name', constraint: 'params' });
    }
  });

  it('hides handler fault text from the peer', async () => {
    const server = makeServer();

    expect(await server.handle('tools/call', { name: 'explode' })).toEqual({
      ok: false,
      error: { code: -32603, message: 'Internal error' }
    });
  });

  it('reads resources and renders prompts', async () => {
    const server = makeServer();

    expect(resultOf(await server.handle('resources/read', { uri: 'text://motd' }))).toEqual({
      contents: [{ uri: 'text://motd', mimeType: 'text/plain', text: 'Welcome' }]
    });
    expect(resultOf(await server.handle('prompts/get', { name: 'greet', arguments: { name: 'Ada' } }))).toEqual({
      messages: [{ role: 'user', content: { type: 'text', text: 'Greet Ada' } }]
    });
    expect(await server.handle('resources/read', { uri: 'text://none' })).toEqual({
      ok: false,
      error: { code: -32602, message: 'Unknown resource', data: { kind: 'resource', target: 'text://none' } }
    });
  });

  it('enqueues resource updates only for subscribed URIs', async () => {
    const server = makeServer();

    expect(server.notifyResourceUpdated('text://motd')).toBe(false);
    await server.handle('resources/subscribe', { uri: 'text://motd' });
    expect(server.notifyResourceUpdated('text://motd', { reason: 'edited' })).toBe(true);
    await server.handle('resources/unsubscribe', { uri: 'text://motd' });
    expect(server.notifyResourceUpdated('text://motd')).toBe(false);

    expect(server.notifications.drain()).toEqual([
      { kind: 'notifications/resources/updated', payload: { reason: 'edited', uri: 'text://motd' }, sequence: 5 }
    ]);
  });

  it('filters log messages below the selected level', async () => {
    const server = makeServer();

    expect(server.sendLogMessage('debug', 'noise')).toBe(false);
    expect(resultOf(await server.handle('logging/setLevel', { level: 'error' }))).toEqual({});
    expect(server.getLogLevel()).toBe('error');
    expect(server.sendLogMessage('warning', 'disk low')).toBe(false);
    expect(server.sendLogMessage('critical', 'disk full', { free: 0 })).toBe(true);

    expect(server.notifications.drain().map((notification) => notification.payload)).toEqual([
      { level: 'critical', logger: 'mcp-capability-server', data: { message: 'disk full', data: { free: 0 } } }
    ]);
    expect((await server.handle('logging/setLevel', { level: 'loud' })).ok).toBe(false);
  });

  it('cancels an in-flight request from a cancelled notification', async () => {
    const server = makeServer();
    let release: () => void = () => undefined;
    server.tools.register('wait', {}, async (_args, context) => {
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      context.token.throwIfCancelled();
      return 'finished';
    });

    const pending = server.handle('tools/call', { name: 'wait' }, { requestId: 'req-9' });
    expect(server.cancellations.has('req-9')).toBe(true);

    server.handleNotification('notifications/cancelled', { requestId: 'req-9', reason: 'user abort' });
    release();

    expect(await pending).toEqual({
      ok: false,
      error: { code: -32001, message: 'Request cancelled', data: { reason: 'user abort' } }
    });
    expect(server.cancellations.has('req-9')).toBe(false);
  });

  it('rejects a second request that reuses an in-flight id', async () => {
    const server = makeServer();
    let release: () => void = () => undefined;
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    server.tools.register('wait', {}, async () => {
      const finished = new Promise<void>((resolve) => {
        release = resolve;
      });
      markStarted();
      await finished;
      return 'finished';
    });

    const first = server.handle('tools/call', { name: 'wait' }, { requestId: 'dup' });
    await started;
    const second = await server.handle('ping', {}, { requestId: 'dup' });

    expect(second).toEqual({
      ok: false,
      error: { code: -32600, message: 'Duplicate request id', data: { requestId: 'dup' } }
    });
    expect(server.cancellations.has('dup')).toBe(true);

    release();
    expect((await first).ok).toBe(true);
    expect(server.cancellations.has('dup')).toBe(false);
    expect(await server.handle('ping', {}, { requestId: 'dup' })).toEqual({ ok: true, result: {} });
  });

  it('fails requests whose token is already cancelled', async () => {
    const server = makeServer();

    const outcome = await server.handle(
      'tools/call',
      { name: 'add', arguments: { a: 1, b: 1 } },
      { token: CancellationToken.cancelled('too late') }
    );

    expect(outcome).toEqual({
      ok: false,
      error: { code: -32001, message: 'Request cancelled', data: { reason: 'too late' } }
    });
  });

  it('cancels in-flight work and rejects later requests after close', async () => {
    const server = makeServer();
    const token = CancellationToken.none();
    server.tools.register('hang', {}, () => new Promise<string>(() => undefined));

    const pending = server.handle('tools/call', { name: 'hang' }, { requestId: 1, token });
    server.close();

    expect(token.isCancelled).toBe(true);
    expect((await pending).ok).toBe(false);
    expect(await server.handle('ping', {}, { requestId: 2 })).toEqual({
      ok: false,
      error: { code: -32000, message: 'Connection closed' }
    });
    expect(server.isClosed()).toBe(true);
  });

  it('marks the client ready after the initialized notification', async () => {
    const server = makeServer();
    await server.handle('initialize', { protocolVersion: LATEST_PROTOCOL_VERSION });

    server.handleNotification('notifications/initialized');

    expect(server.getClientState()?.ready).toBe(true);
  });
});

describe('rpc error mapping', () => {
  it('maps each typed failure to its fixed code', () => {
    expect(toRpcError(new ProtocolError('x', ['y'])).code).toBe(-32602);
    expect(toRpcError(new CancellationError(CancellationToken.cancelled())).code).toBe(-32001);
    expect(toRpcError(new InternalError('boom', null))).toEqual({ code: -32603, message: 'Internal error' });
    expect(toRpcError(new Error('raw'))).toEqual({ code: -32603, message: 'Internal error' });
  });
});
