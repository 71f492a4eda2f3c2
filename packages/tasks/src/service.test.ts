import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryTaskStore } from '@taskpilot/database/testing';
import { ConflictError, NotFoundError, ValidationError } from '@taskpilot/shared-types';
import { TaskService, calculateEstimationAccuracy } from './service.js';

const USER = '00000000-0000-4000-8000-000000000001';
const OTHER_USER = '00000000-0000-4000-8000-000000000002';

describe('TaskService', () => {
  let clock: Date;
  let store: MemoryTaskStore;
  let service: TaskService;

  const advance = (minutes: number) => {
    clock = new Date(clock.getTime() + minutes * 60_000);
  };

  beforeEach(() => {
    clock = new Date('2026-10-19T12:00:00Z');
    store = new MemoryTaskStore({ now: () => clock });
    service = new TaskService(store, { now: () => clock });
  });

  describe('createTask', () => {
    it('takes due dates only with an explicit offset', async () => {
      const task = await service.createTask(USER, { title: 'Ship it', dueDate: '2026-10-20T18:00:00+02:00' });

      expect(task.dueDate).toEqual(new Date('2026-10-20T16:00:00Z'));
      await expect(service.createTask(USER, { title: 'Ship it', dueDate: '2026-10-20T18:00' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('applies defaults and normalizes tags', async () => {
      const task = await service.createTask(USER, {
        title: '  Write report  ',
        tags: [' Work ', 'work', 'Email'],
      });

      expect(task.title).toBe('Write report');
      expect(task.status).toBe('todo');
      expect(task.priority).toBe('medium');
      expect(task.dueDate).toBeNull();
      expect(task.tags).toEqual(['email', 'work']);
      expect(store.taskRows.size).toBe(1);
    });

    it('rejects blank titles', async () => {
      await expect(service.createTask(USER, { title: '   ' })).rejects.toBeInstanceOf(ValidationError);
      expect(store.taskRows.size).toBe(0);
    });

    it('rejects a parent that does not exist', async () => {
      await expect(
        service.createTask(USER, {
          title: 'Child',
          parentTaskId: '11111111-1111-4111-8111-111111111111',
        })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('stamps completedAt when created completed', async () => {
      const task = await service.createTask(USER, { title: 'Done already', status: 'completed' });
      expect(task.completedAt).toEqual(clock);
    });
  });

  describe('getTask', () => {
    it('hides other users tasks', async () => {
      const task = await service.createTask(USER, { title: 'Mine' });
      await expect(service.getTask(OTHER_USER, task.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('treats malformed ids as not found', async () => {
      await expect(service.getTask(USER, 'not-a-uuid')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('updateTask', () => {
    it('leaves the task unchanged for an empty field set', async () => {
      const created = await service.createTask(USER, {
        title: 'Plan offsite',
        priority: 'high',
        dueDate: new Date('2026-10-25T17:00:00Z'),
        tags: ['work'],
      });
      advance(30);

      const result = await service.updateTask(USER, created.id, {});

      expect(result).toEqual(created);
      expect(await service.getTask(USER, created.id)).toEqual(created);
    });

    it('changes only the supplied fields', async () => {
      const dueDate = new Date('2026-10-25T17:00:00Z');
      const created = await service.createTask(USER, {
        title: 'Plan offsite',
        description: 'Venue and agenda',
        priority: 'high',
        dueDate,
      });
      advance(30);

      const updated = await service.updateTask(USER, created.id, { status: 'in_progress' });

      expect(updated.status).toBe('in_progress');
      expect(updated.title).toBe('Plan offsite');
      expect(updated.description).toBe('Venue and agenda');
      expect(updated.priority).toBe('high');
      expect(updated.dueDate).toEqual(dueDate);
      expect(updated.updatedAt).toEqual(new Date('2026-10-19T12:30:00Z'));
    });

    it('clears nullable fields only when null is given', async () => {
      const created = await service.createTask(USER, {
        title: 'Call bank',
        description: 'About the card',
        estimatedDuration: 20,
      });

      const updated = await service.updateTask(USER, created.id, { description: null });

      expect(updated.description).toBeNull();
      expect(updated.estimatedDuration).toBe(20);
    });

    it('sets and clears completedAt with status changes', async () => {
      const created = await service.createTask(USER, { title: 'Pay rent' });
      advance(5);

      const completed = await service.updateTask(USER, created.id, { status: 'completed' });
      expect(completed.completedAt).toEqual(new Date('2026-10-19T12:05:00Z'));

      const reopened = await service.updateTask(USER, created.id, { status: 'todo' });
      expect(reopened.completedAt).toBeNull();
    });

    it('replaces tags when given', async () => {
      const created = await service.createTask(USER, { title: 'Gym', tags: ['health'] });
      const updated = await service.updateTask(USER, created.id, { tags: ['Personal'] });
      expect(updated.tags).toEqual(['personal']);
    });

    it('refuses to make a task its own parent', async () => {
      const task = await service.createTask(USER, { title: 'Loop' });
      await expect(
        service.updateTask(USER, task.id, { parentTaskId: task.id })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it('refuses re-parenting under a descendant', async () => {
      const root = await service.createTask(USER, { title: 'Root' });
      const child = await service.createTask(USER, { title: 'Child', parentTaskId: root.id });
      const grandchild = await service.createTask(USER, { title: 'Grandchild', parentTaskId: child.id });

      await expect(
        service.updateTask(USER, root.id, { parentTaskId: grandchild.id })
      ).rejects.toBeInstanceOf(ConflictError);
      expect((await service.getTask(USER, root.id)).parentTaskId).toBeNull();
    });

    it('allows moving a task under a sibling', async () => {
      const first = await service.createTask(USER, { title: 'First' });
      const second = await service.createTask(USER, { title: 'Second' });

      const moved = await service.updateTask(USER, second.id, { parentTaskId: first.id });

      expect(moved.parentTaskId).toBe(first.id);
    });
  });

  describe('deleteTask', () => {
    it('refuses to delete a task with children unless cascading', async () => {
      const parent = await service.createTask(USER, { title: 'Parent' });
      await service.createTask(USER, { title: 'Child', parentTaskId: parent.id });

      await expect(service.deleteTask(USER, parent.id)).rejects.toBeInstanceOf(ConflictError);
      expect(store.taskRows.size).toBe(2);

      const result = await service.deleteTask(USER, parent.id, { cascade: true });
      expect(result.deletedIds).toHaveLength(2);
      expect(result.deletedIds[0]).toBe(parent.id);
      expect(store.taskRows.size).toBe(0);
    });

    it('removes every descendant on cascade', async () => {
      const root = await service.createTask(USER, { title: 'Root' });
      const child = await service.createTask(USER, { title: 'Child', parentTaskId: root.id });
      await service.createTask(USER, { title: 'Grandchild', parentTaskId: child.id });
      const unrelated = await service.createTask(USER, { title: 'Unrelated' });

      const result = await service.deleteTask(USER, root.id, { cascade: true });

      expect(result.deletedIds).toHaveLength(3);
      expect([...store.taskRows.keys()]).toEqual([unrelated.id]);
    });

    it('deletes a leaf task without cascade', async () => {
      const task = await service.createTask(USER, { title: 'Leaf', tags: ['errands'] });
      const result = await service.deleteTask(USER, task.id);
      expect(result.deletedIds).toEqual([task.id]);
      expect(store.taskTagLinks).toHaveLength(0);
    });
  });

  describe('completeTask', () => {
    it('records actual duration and estimation accuracy', async () => {
      const task = await service.createTask(USER, { title: 'Draft memo', estimatedDuration: 60 });
      advance(90);

      const done = await service.completeTask(USER, task.id, { actualDuration: 90 });

      expect(done.status).toBe('completed');
      expect(done.actualDuration).toBe(90);
      expect(done.completedAt).toEqual(new Date('2026-10-19T13:30:00Z'));
      expect(done.metadata.estimationAccuracy).toBe(50);
    });

    it('records a zero actual duration', async () => {
      const task = await service.createTask(USER, { title: 'Quick check', estimatedDuration: 10 });

      const done = await service.completeTask(USER, task.id, { actualDuration: 0 });

      expect(done.actualDuration).toBe(0);
      expect(done.metadata.estimationAccuracy).toBe(0);
    });

    it('keeps the first completion time', async () => {
      const task = await service.createTask(USER, { title: 'Once' });
      await service.completeTask(USER, task.id);
      advance(10);

      const again = await service.completeTask(USER, task.id);

      expect(again.completedAt).toEqual(new Date('2026-10-19T12:00:00Z'));
    });
  });

  describe('createSubtasks', () => {
    it('creates one child per title and leaves the parent alone', async () => {
      const dueDate = new Date('2026-10-30T17:00:00Z');
      const parent = await service.createTask(USER, {
        title: 'Launch newsletter',
        priority: 'high',
        dueDate,
      });
      advance(1);

      const children = await service.createSubtasks(USER, parent.id, ['Research', 'Draft', 'Review']);

      expect(children.map((child) => child.title)).toEqual(['Research', 'Draft', 'Review']);
      for (const child of children) {
        expect(child.parentTaskId).toBe(parent.id);
        expect(child.priority).toBe('high');
        expect(child.dueDate).toEqual(dueDate);
      }
      expect(store.taskRows.size).toBe(4);
      expect(await service.getTask(USER, parent.id)).toEqual(parent);
    });

    it('rejects an empty list', async () => {
      const parent = await service.createTask(USER, { title: 'Parent' });
      await expect(service.createSubtasks(USER, parent.id, [])).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('queries', () => {
    it('computes statistics with completion rate and overdue count', async () => {
      await service.createTask(USER, { title: 'Late', dueDate: new Date('2026-10-18T09:00:00Z') });
      await service.createTask(USER, { title: 'Later', dueDate: new Date('2026-10-21T09:00:00Z') });
      await service.createTask(USER, {
        title: 'Finished late',
        status: 'completed',
        dueDate: new Date('2026-10-17T09:00:00Z'),
      });

      expect(await service.getStatistics(USER)).toEqual({
        total: 3,
        todo: 2,
        in_progress: 0,
        completed: 1,
        overdue: 1,
        completionRate: 33.33,
      });
    });

    it('reports a zero completion rate without tasks', async () => {
      expect((await service.getStatistics(USER)).completionRate).toBe(0);
    });

    it('lists upcoming open tasks within the window, soonest first', async () => {
      await service.createTask(USER, { title: 'In ten days', dueDate: new Date('2026-10-29T12:00:00Z') });
      await service.createTask(USER, { title: 'In two days', dueDate: new Date('2026-10-21T12:00:00Z') });
      await service.createTask(USER, { title: 'Tomorrow', dueDate: new Date('2026-10-20T12:00:00Z') });
      await service.createTask(USER, {
        title: 'Done tomorrow',
        status: 'completed',
        dueDate: new Date('2026-10-20T08:00:00Z'),
      });

      const upcoming = await service.getUpcomingTasks(USER, 7);

      expect(upcoming.map((task) => task.title)).toEqual(['Tomorrow', 'In two days']);
    });

    it('lists overdue tasks', async () => {
      await service.createTask(USER, { title: 'Missed', dueDate: new Date('2026-10-18T12:00:00Z') });
      await service.createTask(USER, { title: 'Fine', dueDate: new Date('2026-10-22T12:00:00Z') });

      const overdue = await service.getOverdueTasks(USER);

      expect(overdue.map((task) => task.title)).toEqual(['Missed']);
    });

    it('searches title and description case-insensitively', async () => {
      await service.createTask(USER, { title: 'Quarterly Report' });
      await service.createTask(USER, { title: 'Email Sam', description: 'about the REPORT draft' });
      await service.createTask(USER, { title: 'Groceries' });

      const found = await service.searchTasks(USER, 'report');

      expect(found.map((task) => task.title).sort()).toEqual(['Email Sam', 'Quarterly Report']);
    });

    it('rejects search queries shorter than two characters', async () => {
      await expect(service.searchTasks(USER, ' a ')).rejects.toBeInstanceOf(ValidationError);
    });

    it('filters by tag and status', async () => {
      await service.createTask(USER, { title: 'Standup', tags: ['work'] });
      await service.createTask(USER, { title: 'Retro', tags: ['work'], status: 'completed' });
      await service.createTask(USER, { title: 'Dentist', tags: ['health'] });

      const open = await service.listTasks(USER, { tag: 'Work', status: 'todo' });

      expect(open.map((task) => task.title)).toEqual(['Standup']);
    });
  });

  describe('tags', () => {
    it('creates lower-cased tags and lists them by name', async () => {
      await service.createTag(USER, { name: ' Work ', color: '#1E90FF' });
      await service.createTask(USER, { title: 'Dentist', tags: ['health'] });

      const tags = await service.listTags(USER);

      expect(tags.map((tag) => [tag.name, tag.color])).toEqual([
        ['health', null],
        ['work', '#1E90FF'],
      ]);
    });

    it('rejects a duplicate tag name', async () => {
      await service.createTag(USER, { name: 'work' });

      await expect(service.createTag(USER, { name: 'WORK' })).rejects.toBeInstanceOf(ConflictError);
    });

    it('rejects a malformed color', async () => {
      await expect(service.createTag(USER, { name: 'work', color: 'blue' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });
});

describe('calculateEstimationAccuracy', () => {
  it('scores how close the estimate was', () => {
    expect(calculateEstimationAccuracy(60, 60)).toBe(100);
    expect(calculateEstimationAccuracy(60, 45)).toBe(75);
    expect(calculateEstimationAccuracy(30, 100)).toBe(0);
    expect(calculateEstimationAccuracy(90, 100)).toBe(88.89);
    expect(calculateEstimationAccuracy(0, 10)).toBe(0);
  });
});
