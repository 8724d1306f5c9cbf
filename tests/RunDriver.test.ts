import { describe, expect, it } from 'vitest';
import { RunCancelledError, RunFailedError, RunTimeoutError, StalledRunError, ToolExecutionError } from '../src/errors';
import { ThreadMessage, ToolCallRequest, ToolCallResult } from '../src/services/agent/agent.types';
import { RunDriver, ToolCallDispatcher, latestAssistantMessage } from '../src/services/run/RunDriver';
import { FakeAgentRuntime } from './helpers/FakeAgentRuntime';
import { testLogger } from './helpers/logger';

class RecordingDispatcher implements ToolCallDispatcher {
  readonly calls: ToolCallRequest[] = [];

  constructor(private readonly failing: Set<string> = new Set()) {}

  async dispatch(call: ToolCallRequest): Promise<ToolCallResult> {
    this.calls.push(call);
    if (this.failing.has(call.id)) {
      throw new ToolExecutionError(call.name, 'boom');
    }
    return { toolCallId: call.id, output: `out:${call.id}` };
  }
}

function setup(options: { failing?: string[]; turnTimeoutMs?: number } = {}) {
  const runtime = new FakeAgentRuntime();
  runtime.addThread('t1');
  const dispatcher = new RecordingDispatcher(new Set(options.failing));
  const driver = new RunDriver({
    logger: testLogger,
    runtime,
    dispatcher,
    assistantId: 'asst_test',
    pollIntervalMs: 1,
    maxPollIntervalMs: 4,
    turnTimeoutMs: options.turnTimeoutMs ?? 2000,
  });
  return { runtime, dispatcher, driver };
}

const call = (id: string, name = 'check_process_inbox'): ToolCallRequest => ({ id, name, arguments: '{}' });

describe('RunDriver.runTurn', () => {
  it('returns the latest assistant message once the run completes', async () => {
    const { runtime, driver } = setup();
    runtime.scriptNextRun({ status: 'in_progress' }, { status: 'completed', reply: 'What is the feature name?' });

    const result = await driver.runTurn('t1', 'I want a new feature');

    expect(result).toMatchObject({ threadId: 't1', status: 'completed', response: 'What is the feature name?', toolCallCount: 0 });
    expect(runtime.threads.get('t1')?.[0]).toMatchObject({ role: 'user', content: 'I want a new feature' });
  });

  it('returns an empty response when the run completes without an assistant message', async () => {
    const { runtime, driver } = setup();
    runtime.scriptNextRun({ status: 'completed' });

    await expect(driver.runTurn('t1', 'hi')).resolves.toMatchObject({ response: '' });
  });

  it('submits every tool call of a round in one batch', async () => {
    const { runtime, dispatcher, driver } = setup();
    runtime.scriptNextRun(
      { status: 'requires_action', toolCalls: [call('c1'), call('c2')] },
      { status: 'in_progress' },
      { status: 'completed', reply: 'done' },
    );

    const result = await driver.runTurn('t1', 'go');

    expect(dispatcher.calls.map((c) => c.id)).toEqual(['c1', 'c2']);
    expect(runtime.submissions).toEqual([
      {
        runId: result.runId,
        results: [
          { toolCallId: 'c1', output: 'out:c1' },
          { toolCallId: 'c2', output: 'out:c2' },
        ],
      },
    ]);
    expect(result.toolCallCount).toBe(2);
    expect(result.response).toBe('done');
  });

  it('leaves failed tool calls out of the batch', async () => {
    const { runtime, driver } = setup({ failing: ['c2'] });
    runtime.scriptNextRun(
      { status: 'requires_action', toolCalls: [call('c1'), call('c2'), call('c3')] },
      { status: 'completed', reply: 'ok' },
    );

    await driver.runTurn('t1', 'go');

    expect(runtime.submissions[0].results.map((r) => r.toolCallId)).toEqual(['c1', 'c3']);
  });

  it('does not answer the same tool call twice', async () => {
    const { runtime, dispatcher, driver } = setup();
    runtime.scriptNextRun(
      { status: 'requires_action', toolCalls: [call('c1')] },
      { status: 'requires_action', toolCalls: [call('c1')] },
      { status: 'requires_action', toolCalls: [call('c2')] },
      { status: 'completed', reply: 'ok' },
    );

    await driver.runTurn('t1', 'go');

    expect(dispatcher.calls.map((c) => c.id)).toEqual(['c1', 'c2']);
    expect(runtime.submissions).toHaveLength(2);
  });

  it('cancels a run that requires action without tool calls', async () => {
    const { runtime, driver } = setup();
    runtime.scriptNextRun({ status: 'requires_action', toolCalls: [] });

    await expect(driver.runTurn('t1', 'go')).rejects.toBeInstanceOf(StalledRunError);
    expect(runtime.cancelledRuns).toHaveLength(1);
    expect(runtime.submissions).toEqual([]);
  });

  it.each(['failed', 'cancelled', 'expired', 'incomplete'] as const)('raises RunFailedError for a %s run', async (status) => {
    const { runtime, driver } = setup();
    runtime.scriptNextRun({ status: 'in_progress' }, { status, lastError: 'rate limited' });

    const attempt = driver.runTurn('t1', 'go');

    await expect(attempt).rejects.toBeInstanceOf(RunFailedError);
    await expect(attempt).rejects.toThrow(`ended with status '${status}': rate limited`);
  });

  it('cancels the run and times out when it never finishes', async () => {
    const { runtime, driver } = setup({ turnTimeoutMs: 30 });
    runtime.scriptNextRun({ status: 'in_progress' });

    await expect(driver.runTurn('t1', 'go')).rejects.toBeInstanceOf(RunTimeoutError);
    expect(runtime.cancelledRuns).toHaveLength(1);
  });

  it('cancels the run when the caller aborts', async () => {
    const { runtime, driver } = setup();
    runtime.scriptNextRun({ status: 'in_progress' });
    const controller = new AbortController();

    const attempt = driver.runTurn('t1', 'go', { signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(attempt).rejects.toBeInstanceOf(RunCancelledError);
    expect(runtime.cancelledRuns).toHaveLength(1);
  });
});

describe('latestAssistantMessage', () => {
  const message = (id: string, role: ThreadMessage['role'], createdAt: number): ThreadMessage => ({
    id,
    role,
    content: id,
    createdAt,
  });

  it('picks the newest assistant message', () => {
    const latest = latestAssistantMessage([
      message('a1', 'assistant', 1),
      message('a2', 'assistant', 3),
      message('u1', 'user', 4),
    ]);

    expect(latest?.id).toBe('a2');
  });

  it('prefers the later entry when timestamps tie', () => {
    expect(latestAssistantMessage([message('a1', 'assistant', 5), message('a2', 'assistant', 5)])?.id).toBe('a2');
  });

  it('returns undefined without assistant messages', () => {
    expect(latestAssistantMessage([message('u1', 'user', 1)])).toBeUndefined();
  });
});
