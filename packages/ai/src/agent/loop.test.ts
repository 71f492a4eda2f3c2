import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryTaskStore } from '@taskpilot/database/testing';
import { TaskService } from '@taskpilot/tasks';
import { ConflictError, NotFoundError, ProviderError, ValidationError } from '@taskpilot/shared-types';
import type { LLMClient } from '../gemini-client.js';
import { TaskIntelligence } from '../intelligence.js';
import { TaskParser } from '../parser/index.js';
import { ScriptedLLM } from '../testing/scripted-llm.js';
import { ContextManager } from './context.js';
import { AgentLoop, type AgentLoopOptions } from './loop.js';

const USER = '00000000-0000-4000-8000-000000000001';
const MISSING = '11111111-1111-4111-8111-111111111111';
const noSleep = async (): Promise<void> => {};

function reasonReply(intent: string, toolCalls: unknown[], reply: string | null = null): string {
  return JSON.stringify({ intent, tool_calls: toolCalls, reply });
}

describe('AgentLoop', () => {
  let clock: Date;
  let store: MemoryTaskStore;
  let tasks: TaskService;
  let llm: ScriptedLLM;
  let context: ContextManager;

  const createAgent = (client: LLMClient = llm, options: AgentLoopOptions = {}): AgentLoop => {
    const retry = { sleep: noSleep };
    return new AgentLoop(
      {
        llm: client,
        store,
        tasks,
        intelligence: new TaskIntelligence(client, { now: () => clock, retry }),
        parser: new TaskParser(client, { retry }),
        context,
      },
      { now: () => clock, retry, ...options }
    );
  };

  beforeEach(() => {
    clock = new Date('2026-10-19T12:00:00Z');
    store = new MemoryTaskStore({ now: () => clock });
    tasks = new TaskService(store, { now: () => clock });
    llm = new ScriptedLLM();
    context = new ContextManager(store);
  });

  describe('handleChatTurn', () => {
    it('answers small talk without running tools', async () => {
      llm.push(reasonReply('chit-chat', [], 'Hi there!'));

      const result = await createAgent().handleChatTurn(USER, 'hello');

      expect(result).toEqual({
        reply: 'Hi there!',
        intent: 'chit-chat',
        changes: [],
        pendingActions: [],
        degraded: false,
      });
      expect(llm.calls).toHaveLength(1);
      expect(llm.calls[0]?.options.json).toBe(true);
      expect(store.messageRows.map((message) => [message.role, message.content])).toEqual([
        ['user', 'hello'],
        ['assistant', 'Hi there!'],
      ]);
    });

    it('uses plain text reason output as the reply', async () => {
      llm.push('Hello! How can I help?');

      const result = await createAgent().handleChatTurn(USER, 'hey');

      expect(result.reply).toBe('Hello! How can I help?');
      expect(result.intent).toBe('chit-chat');
    });

    it('shows earlier messages to the next turn', async () => {
      llm.push(reasonReply('chit-chat', [], 'Hi there!'), reasonReply('chit-chat', [], 'Sure.'));
      const agent = createAgent();

      await agent.handleChatTurn(USER, 'hello');
      await agent.handleChatTurn(USER, 'can you help?');

      const prompt = llm.calls[1]?.prompt ?? '';
      expect(prompt).toContain('USER: hello\n\nASSISTANT: Hi there!\n\nUSER: can you help?');
    });

    it('creates a task and reports the change', async () => {
      llm.push(
        reasonReply('create', [{ name: 'create_task', arguments: { title: 'Buy milk' } }]),
        'Added "Buy milk" to your list.'
      );

      const result = await createAgent().handleChatTurn(USER, 'add buy milk');

      const [row] = [...store.taskRows.values()];
      expect(row?.title).toBe('Buy milk');
      expect(result.reply).toBe('Added "Buy milk" to your list.');
      expect(result.intent).toBe('create');
      expect(result.changes).toEqual([{ type: 'task_created', taskId: row?.id, title: 'Buy milk' }]);
      expect(llm.calls[1]?.options.json).toBe(false);
      expect(llm.calls[1]?.prompt).toContain('Result: Created "Buy milk"');

      const assistant = store.messageRows[1];
      expect(assistant?.metadata).toEqual({
        intent: 'create',
        changes: result.changes,
        pendingActions: [],
        degraded: false,
      });
    });

    it('reads due dates in the timezone from the user preferences', async () => {
      await context.updateUserContext(USER, { preferences: { timezone: 'America/New_York' } });
      llm.push(
        reasonReply('create', [
          { name: 'create_task', arguments: { title: 'Call Sam', dueDate: '2026-10-20T15:00' } },
        ]),
        'Done.'
      );

      await createAgent().handleChatTurn(USER, 'call Sam tomorrow at 3pm');

      const [row] = [...store.taskRows.values()];
      expect(row?.dueDate).toEqual(new Date('2026-10-20T19:00:00Z'));
    });

    it('keeps going after a failed tool call', async () => {
      llm.push(
        reasonReply('update', [
          { name: 'complete_task', arguments: { taskId: MISSING } },
          { name: 'nope', arguments: {} },
          { name: 'create_task', arguments: { title: 'Call Sam' } },
        ]),
        'I added "Call Sam" but could not find the other task.'
      );

      const result = await createAgent().handleChatTurn(USER, 'finish that and add call Sam');

      expect(result.changes).toEqual([expect.objectContaining({ type: 'task_created', title: 'Call Sam' })]);
      const respondPrompt = llm.calls[1]?.prompt ?? '';
      expect(respondPrompt).toContain('Tool: complete_task\nError (NOT_FOUND)');
      expect(respondPrompt).toContain('Tool: nope\nError (VALIDATION_ERROR): Unknown tool: nope');
    });

    it('runs at most maxToolCalls calls', async () => {
      const calls = ['One', 'Two', 'Three'].map((title) => ({ name: 'create_task', arguments: { title } }));
      llm.push(reasonReply('create', calls), 'Added two.');

      const result = await createAgent(llm, { maxToolCalls: 2 }).handleChatTurn(USER, 'add three');

      expect(result.changes.map((change) => change.title)).toEqual(['One', 'Two']);
      expect(store.taskRows.size).toBe(2);
      expect(llm.calls[1]?.prompt).toContain('1 further tool call(s) were not run (limit per message).');
    });

    it('falls back to a summary when the respond step returns nothing', async () => {
      llm.push(reasonReply('create', [{ name: 'create_task', arguments: { title: 'Buy milk' } }]), '   ');

      const result = await createAgent().handleChatTurn(USER, 'add buy milk');

      expect(result.reply).toBe('Created "Buy milk".');
    });

    it('asks to rephrase when reason output has the wrong shape', async () => {
      llm.push(JSON.stringify({ intent: 'create', tool_calls: 'create_task' }));

      const result = await createAgent().handleChatTurn(USER, 'do the thing');

      expect(result.reply).toBe("I'm not sure what you'd like me to do. Could you rephrase that?");
      expect(result.changes).toEqual([]);
    });

    it('degrades when the provider is unavailable', async () => {
      const outage = (): ProviderError =>
        new ProviderError('Gemini request failed: 503 Service Unavailable', { transient: true, status: 503 });
      llm.push(outage(), outage(), outage());

      const result = await createAgent().handleChatTurn(USER, 'what is due today?');

      expect(llm.calls).toHaveLength(3);
      expect(result.degraded).toBe(true);
      expect(result.error?.code).toBe('PROVIDER_ERROR');
      expect(result.reply).toBe(
        "Sorry, I'm having trouble reaching the assistant right now. Please try again in a moment."
      );
      expect(store.messageRows[1]?.metadata['degraded']).toBe(true);
    });

    it('reports completed work when the respond step fails', async () => {
      llm.push(
        reasonReply('create', [{ name: 'create_task', arguments: { title: 'Buy milk' } }]),
        new ProviderError('Gemini request failed: quota', { transient: false, status: 400 })
      );

      const result = await createAgent().handleChatTurn(USER, 'add buy milk');

      expect(result.degraded).toBe(true);
      expect(result.changes).toHaveLength(1);
      expect(result.reply).toBe(
        'Sorry, I\'m having trouble reaching the assistant right now. Here is what I did: Created "Buy milk".'
      );
    });

    it('stops a turn that runs past its time budget', async () => {
      const hanging: LLMClient = {
        generate: (_prompt, options) =>
          new Promise<string>((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
          }),
      };

      const result = await createAgent(hanging, { turnTimeoutMs: 20 }).handleChatTurn(USER, 'hello');

      expect(result.degraded).toBe(true);
      expect(result.error?.code).toBe('TIMEOUT');
      expect(result.reply).toBe('Sorry, that took too long and I had to stop. Please try again in a moment.');
      expect(store.messageRows.map((message) => message.role)).toEqual(['user', 'assistant']);
    });

    it('retries a timed out provider call within the turn', async () => {
      llm.push(
        new ProviderError('timed out', { transient: true }),
        reasonReply('create', [{ name: 'create_task', arguments: { title: 'Buy milk' } }]),
        'Added "Buy milk" to your list.'
      );

      const result = await createAgent().handleChatTurn(USER, 'add buy milk');

      expect(result.degraded).toBe(false);
      expect(result.reply).toBe('Added "Buy milk" to your list.');
      expect(result.error).toBeUndefined();
      expect(llm.calls).toHaveLength(3);
      expect(store.taskRows.size).toBe(1);
    });

    it('returns the changes when the reply cannot be recorded', async () => {
      const append = store.messages.append;
      let appends = 0;
      vi.spyOn(store.messages, 'append').mockImplementation(async (values) => {
        appends++;
        if (appends === 2) {
          throw new Error('connection terminated');
        }
        return append(values);
      });
      llm.push(
        reasonReply('create', [{ name: 'create_task', arguments: { title: 'Buy milk' } }]),
        'Added "Buy milk" to your list.'
      );

      const result = await createAgent().handleChatTurn(USER, 'add buy milk');

      const [row] = [...store.taskRows.values()];
      expect(result.reply).toBe('Added "Buy milk" to your list.');
      expect(result.changes).toEqual([{ type: 'task_created', taskId: row?.id, title: 'Buy milk' }]);
      expect(store.messageRows.map((message) => message.role)).toEqual(['user']);
    });

    it('degrades instead of throwing when the store fails mid-turn', async () => {
      const append = store.messages.append;
      let appends = 0;
      vi.spyOn(store.messages, 'append').mockImplementation(async (values) => {
        appends++;
        if (appends === 1) {
          throw new Error('connection terminated');
        }
        return append(values);
      });

      const result = await createAgent().handleChatTurn(USER, 'add buy milk');

      expect(result).toEqual({
        reply: 'Sorry, something went wrong on my side. Please try again in a moment.',
        intent: 'chit-chat',
        changes: [],
        pendingActions: [],
        degraded: true,
        error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
      });
      expect(llm.calls).toHaveLength(0);
      expect(store.messageRows.map((message) => [message.role, message.metadata['degraded']])).toEqual([
        ['assistant', true],
      ]);
    });

    it('rejects an empty message', async () => {
      await expect(createAgent().handleChatTurn(USER, '   ')).rejects.toBeInstanceOf(ValidationError);
      expect(store.messageRows).toHaveLength(0);
    });
  });

  describe('pending actions', () => {
    let taskId: string;

    const holdDelete = async (agent: AgentLoop): Promise<string> => {
      llm.push(
        reasonReply('delete', [{ name: 'delete_task', arguments: { taskId, cascade: false } }]),
        'Please confirm the deletion.'
      );
      const result = await agent.handleChatTurn(USER, 'delete the old plan');
      const [action] = result.pendingActions;
      if (!action) {
        throw new Error('expected a pending action');
      }
      return action.id;
    };

    beforeEach(async () => {
      const task = await tasks.createTask(USER, { title: 'Old plan' });
      taskId = task.id;
    });

    it('holds destructive calls for confirmation', async () => {
      llm.push(
        reasonReply('delete', [{ name: 'delete_task', arguments: { taskId, cascade: false } }]),
        'Please confirm the deletion.'
      );

      const result = await createAgent().handleChatTurn(USER, 'delete the old plan');

      expect(store.taskRows.has(taskId)).toBe(true);
      expect(result.changes).toEqual([]);
      expect(result.pendingActions).toEqual([
        {
          id: expect.any(String),
          tool: 'delete_task',
          arguments: { taskId, cascade: false },
          summary: 'delete "Old plan"',
          createdAt: '2026-10-19T12:00:00.000Z',
        },
      ]);
      expect(llm.calls[1]?.prompt).toContain('Pending confirmation (action ');
      expect(store.messageRows[1]?.metadata['pendingActions']).toEqual(result.pendingActions);
    });

    it('runs a confirmed action once', async () => {
      const agent = createAgent();
      const actionId = await holdDelete(agent);

      const resolution = await agent.confirmAction(USER, actionId);

      expect(resolution.status).toBe('confirmed');
      expect(resolution.reply).toBe('Deleted "Old plan".');
      expect(resolution.changes).toEqual([{ type: 'task_deleted', taskId, title: 'Old plan' }]);
      expect(store.taskRows.has(taskId)).toBe(false);
      expect(store.messageRows.at(-1)?.metadata).toEqual({
        resolvedActionId: actionId,
        resolution: 'confirmed',
        changes: resolution.changes,
      });

      await expect(agent.confirmAction(USER, actionId)).rejects.toThrow(
        `Action ${actionId} was already confirmed`
      );
      await expect(agent.rejectAction(USER, actionId)).rejects.toBeInstanceOf(ConflictError);
    });

    it('leaves the task alone when the action is rejected', async () => {
      const agent = createAgent();
      const actionId = await holdDelete(agent);

      const resolution = await agent.rejectAction(USER, actionId);

      expect(resolution).toEqual({
        actionId,
        status: 'rejected',
        reply: 'Okay, I won\'t do that: delete "Old plan".',
        changes: [],
      });
      expect(store.taskRows.has(taskId)).toBe(true);
      await expect(agent.confirmAction(USER, actionId)).rejects.toThrow(
        `Action ${actionId} was already rejected`
      );
    });

    it('rejects unknown action ids', async () => {
      await expect(createAgent().confirmAction(USER, MISSING)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('runTool', () => {
    it('returns the tool result for a direct call', async () => {
      const result = await createAgent().runTool(USER, { name: 'create_task', arguments: { title: 'Buy milk' } });

      expect(result.summary).toBe('Created "Buy milk"');
      expect(store.taskRows.size).toBe(1);
    });

    it('throws the tool error with its status', async () => {
      const call = createAgent().runTool(USER, { name: 'complete_task', arguments: { taskId: MISSING } });

      await expect(call).rejects.toMatchObject({ code: 'NOT_FOUND', statusCode: 404 });
    });

    it('rejects unknown tools', async () => {
      await expect(createAgent().runTool(USER, { name: 'nope' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('parseAndCreateTask', () => {
    it('creates the parsed task with provenance', async () => {
      llm.push(
        JSON.stringify({
          title: 'Buy milk',
          description: null,
          due_date: '2026-10-20T18:00',
          priority: null,
          tags: ['Errands'],
          estimated_duration: null,
        })
      );

      const { task, parsed } = await createAgent().parseAndCreateTask(USER, 'Buy milk tomorrow');

      expect(parsed.source).toBe('llm');
      expect(task.title).toBe('Buy milk');
      expect(task.dueDate).toEqual(new Date('2026-10-20T18:00:00Z'));
      expect(task.priority).toBe('medium');
      expect(task.tags).toEqual(['errands']);
      expect(task.metadata).toMatchObject({ parsedFrom: 'Buy milk tomorrow', parseConfidence: 'high' });
    });

    it('falls back to the local rules when the model is unavailable', async () => {
      llm.push(new ProviderError('Gemini request failed: bad key', { transient: false, status: 403 }));

      const { task, parsed } = await createAgent().parseAndCreateTask(
        USER,
        'Remind me to call Sam tomorrow at 3pm, high priority',
        { timezone: 'America/New_York' }
      );

      expect(parsed.source).toBe('rules');
      expect(task.title).toBe('call Sam');
      expect(task.dueDate).toEqual(new Date('2026-10-20T19:00:00Z'));
      expect(task.priority).toBe('high');
      expect(task.estimatedDuration).toBe(60);
      expect(task.metadata).toMatchObject({ parseConfidence: 'low' });
    });
  });
});
