import axios, { AxiosInstance } from 'axios';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { ConversationGateway } from '../src/services/conversation/ConversationGateway';
import { ProcessRegistry } from '../src/services/process/ProcessRegistry';
import { RunDriver } from '../src/services/run/RunDriver';
import { ToolConfigManager } from '../src/services/tool/ToolConfigManager';
import { START_PROCESS_TOOL, ToolDispatcher } from '../src/services/tool/ToolDispatcher';
import { FakeAgentRuntime } from './helpers/FakeAgentRuntime';
import { RunningServer, listen } from './helpers/listen';
import { testLogger } from './helpers/logger';

describe('HTTP API', () => {
  let runtime: FakeAgentRuntime;
  let registry: ProcessRegistry;
  let server: RunningServer;
  let client: AxiosInstance;

  beforeEach(async () => {
    runtime = new FakeAgentRuntime();
    registry = new ProcessRegistry({ logger: testLogger });
    const dispatcher = new ToolDispatcher({
      logger: testLogger,
      registry,
      launcher: { launch: () => undefined },
      toolConfigManager: new ToolConfigManager(),
      generateProcessId: () => 'proc-1',
    });
    const driver = new RunDriver({
      logger: testLogger,
      runtime,
      dispatcher,
      assistantId: 'asst_test',
      pollIntervalMs: 1,
      maxPollIntervalMs: 2,
    });
    const gateway = new ConversationGateway({ logger: testLogger, runtime, driver, registry });
    server = await listen(createApp({ gateway, logger: testLogger }));
    client = axios.create({ baseURL: server.baseUrl, validateStatus: () => true });
  });

  afterEach(async () => {
    await server.close();
  });

  it('reports health', async () => {
    const response = await client.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({ status: 'ok' });
  });

  it('creates a thread and reads it back', async () => {
    const created = await client.post('/threads');

    expect(created.status).toBe(201);
    expect(created.data).toEqual({ thread_id: 'thread_1', messages: [] });
    expect(created.headers['x-request-id']).toEqual(expect.any(String));

    const fetched = await client.get('/threads/thread_1');
    expect(fetched.status).toBe(200);
    expect(fetched.data).toEqual({ thread_id: 'thread_1', messages: [] });
  });

  it('returns 404 with the caller trace id for an unknown thread', async () => {
    const response = await client.get('/threads/nope', { headers: { 'x-request-id': 'req-1' } });

    expect(response.status).toBe(404);
    expect(response.headers['x-request-id']).toBe('req-1');
    expect(response.data).toEqual({ code: 'NOT_FOUND', message: "thread 'nope' not found", trace_id: 'req-1' });
  });

  it('runs a chat turn that starts a long running process', async () => {
    runtime.addThread('t1');
    runtime.scriptNextRun(
      {
        status: 'requires_action',
        toolCalls: [{ id: 'call_1', name: START_PROCESS_TOOL, arguments: JSON.stringify({ feature_spec: '{}' }) }],
      },
      { status: 'completed', reply: 'Your approval request is under way.' },
    );

    const response = await client.post('/chat', { thread_id: 't1', message: 'Submit it' });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ response: 'Your approval request is under way.' });
    expect(runtime.submissions[0].results).toEqual([
      { toolCallId: 'call_1', output: 'Started long running process proc-1 (Status: running)' },
    ]);

    const processes = await client.get('/processes');
    expect(processes.data).toEqual([
      expect.objectContaining({ process_id: 'proc-1', status: 'running', message: {}, thread_id: 't1' }),
    ]);

    const thread = await client.get('/threads/t1');
    expect(thread.data.messages).toEqual([
      { role: 'user', content: 'Submit it' },
      { role: 'assistant', content: 'Your approval request is under way.' },
    ]);
  });

  it('validates the chat body', async () => {
    const response = await client.post('/chat', { thread_id: 't1' });

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({
      code: 'INVALID_REQUEST',
      message: 'thread_id and message are required (invalid: message)',
    });
  });

  it('rejects a body that is not JSON', async () => {
    const response = await client.post('/chat', '{"thread_id":', {
      headers: { 'Content-Type': 'application/json' },
      transformRequest: [(data: string) => data],
    });

    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ code: 'INVALID_REQUEST', message: 'Request body is not valid JSON' });
  });

  it('returns 404 when chatting on an unknown thread', async () => {
    const response = await client.post('/chat', { thread_id: 'ghost', message: 'hello' });

    expect(response.status).toBe(404);
    expect(response.data).toMatchObject({ code: 'NOT_FOUND' });
  });

  it('maps a failed run to 502', async () => {
    runtime.addThread('t1');
    runtime.scriptNextRun({ status: 'failed', lastError: 'server_error' });

    const response = await client.post('/chat', { thread_id: 't1', message: 'hello' });

    expect(response.status).toBe(502);
    expect(response.data).toMatchObject({ code: 'RUN_FAILED' });
  });

  it('reads one process and 404s on unknown ones', async () => {
    registry.update('p1', 'requires_action', { step_name: 'Legal department approval' });

    const found = await client.get('/processes/p1');
    const missing = await client.get('/processes/p2');

    expect(found.status).toBe(200);
    expect(found.data).toMatchObject({
      process_id: 'p1',
      status: 'requires_action',
      message: { step_name: 'Legal department approval' },
      thread_id: null,
    });
    expect(missing.status).toBe(404);
    expect(missing.data).toMatchObject({ code: 'NOT_FOUND', message: "process 'p2' not found" });
  });

  it('answers unknown routes with ROUTE_NOT_FOUND', async () => {
    const response = await client.get('/nowhere');

    expect(response.status).toBe(404);
    expect(response.data).toMatchObject({ code: 'ROUTE_NOT_FOUND', message: 'No route for GET /nowhere' });
  });
});
