import { describe, expect, it } from 'vitest';
import { NotFoundError } from '../errors.js';
import { resolveStatusId } from '../status-resolver.js';
import { seededTaiga } from './fake-taiga.js';

describe('resolveStatusId', () => {
  it('returns integers unchanged without calling Taiga', async () => {
    const fake = seededTaiga();

    await expect(resolveStatusId(fake, 'task', 3, 21)).resolves.toBe(21);
    expect(fake.calls).toEqual([]);
  });

  it('returns null for null and undefined without calling Taiga', async () => {
    const fake = seededTaiga();

    await expect(resolveStatusId(fake, 'userstory', 3, null)).resolves.toBeNull();
    await expect(resolveStatusId(fake, 'userstory', 3, undefined)).resolves.toBeNull();
    expect(fake.calls).toEqual([]);
  });

  it('matches by name', async () => {
    const fake = seededTaiga();

    await expect(resolveStatusId(fake, 'task', 3, 'Doing')).resolves.toBe(21);
    expect(fake.callsTo('listStatuses')).toEqual([['task', 3]]);
  });

  it('matches by slug', async () => {
    const fake = seededTaiga();

    await expect(resolveStatusId(fake, 'userstory', 3, 'in-progress')).resolves.toBe(11);
  });

  it('takes the first entry matching either name or slug', async () => {
    const fake = seededTaiga();
    fake.statuses.task.set(4, [
      { id: 40, name: 'Review', slug: 'ready' },
      { id: 41, name: 'ready', slug: 'ready-2' },
    ]);

    await expect(resolveStatusId(fake, 'task', 4, 'ready')).resolves.toBe(40);
  });

  it('stops at the first match even when its id is unusable', async () => {
    const fake = seededTaiga();
    fake.statuses.task.set(4, [
      { id: 'none', name: 'Review', slug: 'review' },
      { id: 41, name: 'Review', slug: 'review-2' },
    ]);

    await expect(resolveStatusId(fake, 'task', 4, 'Review')).rejects.toThrow(
      new NotFoundError("Task status 'Review' has no usable id in project 4")
    );
  });

  it('fetches the list on every resolution', async () => {
    const fake = seededTaiga();

    await resolveStatusId(fake, 'task', 3, 'New');
    await resolveStatusId(fake, 'task', 3, 'New');

    expect(fake.count('listStatuses')).toBe(2);
  });

  it('fails with NotFoundError naming the status and project', async () => {
    const fake = seededTaiga();

    await expect(resolveStatusId(fake, 'task', 3, 'Blocked')).rejects.toThrow(
      new NotFoundError("Task status 'Blocked' not found for project 3")
    );
    await expect(resolveStatusId(fake, 'userstory', 3, 'Done')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('is case-sensitive', async () => {
    const fake = seededTaiga();

    await expect(resolveStatusId(fake, 'task', 3, 'doing ')).rejects.toThrow(
      "Task status 'doing ' not found for project 3"
    );
  });
});
