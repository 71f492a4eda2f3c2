import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryTaskStore } from '@taskpilot/database/testing';
import { ValidationError } from '@taskpilot/shared-types';
import { ContextManager, compactWindow } from './context.js';

const USER = '00000000-0000-4000-8000-000000000001';

describe('ContextManager', () => {
  let store: MemoryTaskStore;

  beforeEach(() => {
    store = new MemoryTaskStore({ now: () => new Date('2026-10-19T12:00:00Z') });
  });

  it('returns the recent window oldest first and creates the user context', async () => {
    const manager = new ContextManager(store);
    for (const content of ['one', 'two', 'three', 'four']) {
      await manager.recordTurn(USER, 'user', content);
    }

    const context = await manager.buildPromptContext(USER, 3);

    expect(context.messages.map((message) => message.content)).toEqual(['two', 'three', 'four']);
    expect(context.summarizedCount).toBe(0);
    expect(context.userContext.preferences).toEqual({});
    expect(store.contextRows.size).toBe(1);
  });

  it('summarizes old messages in the prompt without touching the log', async () => {
    const manager = new ContextManager(store, { contextCharBudget: 50 });
    const contents = ['a'.repeat(30), 'b'.repeat(30), 'c'.repeat(30), 'd'.repeat(30)];
    for (const content of contents) {
      await manager.recordTurn(USER, 'user', content);
    }

    const context = await manager.buildPromptContext(USER, 10);

    expect(context.summarizedCount).toBe(3);
    expect(context.messages).toHaveLength(2);
    expect(context.messages[0]?.role).toBe('summary');
    expect(context.messages[0]?.content).toBe(
      `Earlier in this conversation (3 messages):\nUser: ${contents[0]}\nUser: ${contents[1]}\nUser: ${contents[2]}`
    );
    expect(context.messages[1]?.content).toBe(contents[3]);
    expect(store.messageRows.map((message) => message.content)).toEqual(contents);
  });

  it('merges user context updates section by section', async () => {
    const manager = new ContextManager(store);

    await manager.updateUserContext(USER, { preferences: { timezone: 'Europe/Paris' } });
    const updated = await manager.updateUserContext(USER, {
      preferences: { workHours: { start: '08:00', end: '16:00' } },
      aiContext: { notes: 'Prefers short replies' },
    });

    expect(updated.preferences).toEqual({
      timezone: 'Europe/Paris',
      workHours: { start: '08:00', end: '16:00' },
    });
    expect(updated.aiContext).toEqual({ notes: 'Prefers short replies' });
    expect(updated.productivityPatterns).toEqual({});
  });

  it('keeps an update made while the context is first being created', async () => {
    const manager = new ContextManager(store);
    const find = store.userContexts.find;
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let finds = 0;
    vi.spyOn(store.userContexts, 'find').mockImplementation(async (userId) => {
      finds++;
      const row = await find(userId);
      if (finds === 1) {
        await gate;
      }
      return row;
    });

    const firstRead = manager.getUserContext(USER);
    await manager.updateUserContext(USER, { preferences: { timezone: 'America/New_York' } });
    release();

    expect((await firstRead).preferences).toEqual({ timezone: 'America/New_York' });
    expect(store.contextRows.get(USER)?.preferences).toEqual({ timezone: 'America/New_York' });
  });

  it('rejects malformed context updates', async () => {
    const manager = new ContextManager(store);

    await expect(
      manager.updateUserContext(USER, { preferences: { timezone: 'Mars/Olympus' } })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      manager.updateUserContext(USER, { preferences: { workHours: { start: '9am', end: '17:00' } } })
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('compactWindow', () => {
  it('always keeps the newest message', () => {
    const createdAt = new Date('2026-10-19T12:00:00Z');
    const messages = [
      { id: 'm1', userId: USER, role: 'user' as const, content: 'x'.repeat(100), metadata: {}, createdAt },
    ];

    const result = compactWindow(messages, 10);

    expect(result.summarizedCount).toBe(0);
    expect(result.messages).toEqual([{ role: 'user', content: 'x'.repeat(100), createdAt }]);
  });
});
