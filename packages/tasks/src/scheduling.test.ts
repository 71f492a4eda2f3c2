import { describe, expect, it } from 'vitest';
import type { TaskWithTags } from '@taskpilot/database';
import { planSchedule, scoreTask, urgencyScore } from './scheduling.js';

let counter = 0;

function makeTask(overrides: Partial<TaskWithTags>): TaskWithTags {
  counter++;
  const createdAt = new Date(Date.UTC(2026, 9, 1, 0, counter));
  return {
    id: `task-${counter}`,
    userId: 'user-1',
    title: `Task ${counter}`,
    description: null,
    status: 'todo',
    priority: 'medium',
    dueDate: null,
    estimatedDuration: null,
    actualDuration: null,
    parentTaskId: null,
    metadata: {},
    createdAt,
    updatedAt: createdAt,
    completedAt: null,
    tags: [],
    ...overrides,
  };
}

describe('urgencyScore', () => {
  const now = new Date('2026-10-19T12:00:00Z');

  it('is 1 when overdue and 0 without a due date', () => {
    expect(urgencyScore(new Date('2026-10-19T11:00:00Z'), now, 72)).toBe(1);
    expect(urgencyScore(null, now, 72)).toBe(0);
  });

  it('falls linearly across the horizon', () => {
    expect(urgencyScore(new Date('2026-10-20T12:00:00Z'), now, 48)).toBe(0.5);
    expect(urgencyScore(new Date('2026-11-19T12:00:00Z'), now, 48)).toBe(0);
  });
});

describe('scoreTask', () => {
  it('weights priority 0.7 and urgency 0.3', () => {
    const now = new Date('2026-10-19T12:00:00Z');
    expect(scoreTask({ priority: 'high', dueDate: new Date('2026-10-18T00:00:00Z') }, now, 72)).toBe(1);
    expect(scoreTask({ priority: 'low', dueDate: null }, now, 72)).toBe(0.21);
  });
});

describe('planSchedule', () => {
  it('packs tasks into working hours by score', () => {
    const urgent = makeTask({
      title: 'Send invoice',
      priority: 'high',
      dueDate: new Date('2026-10-19T20:00:00Z'),
      estimatedDuration: 60,
    });
    const someday = makeTask({ title: 'Tidy desk', priority: 'low', estimatedDuration: 30 });
    const long = makeTask({
      title: 'Write proposal',
      priority: 'medium',
      dueDate: new Date('2026-10-21T16:00:00Z'),
      estimatedDuration: 240,
    });
    const done = makeTask({ title: 'Already done', priority: 'high', status: 'completed' });

    const proposal = planSchedule([someday, long, urgent, done], {
      // Monday 09:05 in New York
      now: new Date('2026-10-19T13:05:00Z'),
      timezone: 'America/New_York',
      days: 3,
    });

    expect(proposal.requiresConfirmation).toBe(true);
    expect(proposal.unscheduled).toEqual([]);
    expect(
      proposal.suggestions.map((s) => [s.title, s.score, s.start.toISOString(), s.end.toISOString()])
    ).toEqual([
      ['Send invoice', 0.97, '2026-10-19T13:15:00.000Z', '2026-10-19T14:15:00.000Z'],
      ['Write proposal', 0.51, '2026-10-19T14:15:00.000Z', '2026-10-19T16:15:00.000Z'],
      ['Tidy desk', 0.21, '2026-10-19T16:15:00.000Z', '2026-10-19T16:45:00.000Z'],
    ]);
    expect(proposal.suggestions[1]?.durationMinutes).toBe(120);
    expect(proposal.suggestions[2]?.reason).toBe('low priority, no due date');
    expect(proposal.rationale).toContain('Planned 3 of 3 open task(s)');
  });

  it('honours working days and reports tasks that do not fit', () => {
    const first = makeTask({ title: 'Review notes', priority: 'high', estimatedDuration: 45 });
    const second = makeTask({ title: 'Water plants', priority: 'medium', estimatedDuration: 30 });

    const proposal = planSchedule([second, first], {
      // Saturday afternoon, past the 10:00-11:00 window
      now: new Date('2026-10-24T14:00:00Z'),
      timezone: 'UTC',
      days: 2,
      preferences: {
        workHours: { start: '10:00', end: '11:00' },
        workingDays: ['saturday', 'sunday'],
      },
    });

    expect(proposal.suggestions).toHaveLength(1);
    expect(proposal.suggestions[0]?.title).toBe('Review notes');
    expect(proposal.suggestions[0]?.start.toISOString()).toBe('2026-10-25T10:00:00.000Z');
    expect(proposal.suggestions[0]?.end.toISOString()).toBe('2026-10-25T10:45:00.000Z');
    expect(proposal.unscheduled).toEqual([
      {
        taskId: second.id,
        title: 'Water plants',
        reason: 'No free 30-minute block in working hours over the next 2 day(s)',
      },
    ]);
  });

  it('has nothing to propose without open tasks', () => {
    const proposal = planSchedule([makeTask({ status: 'completed' })], {
      now: new Date('2026-10-19T13:05:00Z'),
      timezone: 'UTC',
      days: 7,
    });

    expect(proposal).toEqual({
      suggestions: [],
      unscheduled: [],
      rationale: 'No open tasks to schedule.',
      requiresConfirmation: true,
    });
  });
});
