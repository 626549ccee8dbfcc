import { describe, expect, it } from 'vitest';
import { ConflictError, ValidationError } from '../errors.js';
import { resolveStatusId } from '../status-resolver.js';
import { TaigaApiError } from '../taiga-client.js';
import { updateWithVersion, type VersionedEntity } from '../update-orchestrator.js';
import { FakeTaiga, seededTaiga } from './fake-taiga.js';

function taskEntity(fake: FakeTaiga): VersionedEntity {
  return {
    label: 'task',
    fetch: (id) => fake.getTask(id),
    submit: (id, payload) => fake.updateTask(id, payload),
    statusFields: ['status'],
    resolveStatus: (projectId, status) => resolveStatusId(fake, 'task', projectId, status),
  };
}

function conflict(): TaigaApiError {
  return new TaigaApiError('Taiga API request failed with status 409: version mismatch', 409);
}

describe('updateWithVersion', () => {
  it('rejects a request without any set field before calling Taiga', async () => {
    const fake = seededTaiga();

    await expect(
      updateWithVersion(taskEntity(fake), { id: 7, fields: { subject: undefined, status: undefined } })
    ).rejects.toThrow(new ValidationError('At least one field must be provided to update the task'));
    expect(fake.calls).toEqual([]);
  });

  it('does not count the version as a field', async () => {
    const fake = seededTaiga();

    await expect(updateWithVersion(taskEntity(fake), { id: 7, fields: {}, version: 2 })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('submits only the set field plus the fetched version', async () => {
    const fake = seededTaiga();

    await updateWithVersion(taskEntity(fake), { id: 7, fields: { subject: 'Revised', description: undefined } });

    expect(fake.callsTo('updateTask')).toEqual([[7, { subject: 'Revised', version: 2 }]]);
  });

  it('sends an explicit null to clear a field', async () => {
    const fake = seededTaiga();

    await updateWithVersion(taskEntity(fake), { id: 7, fields: { assigned_to: null } });

    expect(fake.callsTo('updateTask')).toEqual([[7, { assigned_to: null, version: 2 }]]);
  });

  it('submits an explicit version instead of the fetched one', async () => {
    const fake = seededTaiga();

    await updateWithVersion(taskEntity(fake), { id: 7, fields: { subject: 'Revised' }, version: 9 });

    expect(fake.callsTo('updateTask')).toEqual([[7, { subject: 'Revised', version: 9 }]]);
  });

  it('falls back to the fetched version when the explicit one is null', async () => {
    const fake = seededTaiga();

    await updateWithVersion(taskEntity(fake), { id: 7, fields: { subject: 'Revised' }, version: null });

    expect(fake.callsTo('updateTask')).toEqual([[7, { subject: 'Revised', version: 2 }]]);
  });

  it('resolves status names in the record project', async () => {
    const fake = seededTaiga();

    const updated = await updateWithVersion(taskEntity(fake), { id: 7, fields: { status: 'Doing' } });

    expect(fake.callsTo('listStatuses')).toEqual([['task', 3]]);
    expect(fake.callsTo('updateTask')).toEqual([[7, { status: 21, version: 2 }]]);
    expect(updated.version).toBe(3);
  });

  it('prefers the project from the request for status lookups', async () => {
    const fake = seededTaiga();
    fake.statuses.task.set(9, [{ id: 90, name: 'Doing', slug: 'doing' }]);

    await updateWithVersion(taskEntity(fake), { id: 7, fields: { project: 9, status: 'Doing' } });

    expect(fake.callsTo('updateTask')).toEqual([[7, { project: 9, status: 90, version: 2 }]]);
  });

  it('fails when the record has no usable project for a status name', async () => {
    const fake = seededTaiga();
    fake.tasks.set(8, { id: 8, version: 1 });

    await expect(updateWithVersion(taskEntity(fake), { id: 8, fields: { status: 'Doing' } })).rejects.toThrow(
      new TaigaApiError('Unable to resolve project for task status lookup')
    );
    expect(fake.count('updateTask')).toBe(0);
  });

  it('fails when the fetched record carries no version', async () => {
    const fake = seededTaiga();
    fake.tasks.set(8, { id: 8, project: 3 });

    await expect(updateWithVersion(taskEntity(fake), { id: 8, fields: { subject: 'x' } })).rejects.toThrow(
      'Unable to resolve version for task update'
    );
    expect(fake.count('updateTask')).toBe(0);
  });

  it('rewrites a 409 into a conflict naming the latest version', async () => {
    const fake = seededTaiga();
    fake.failNext('updateTask', conflict());

    const failure = updateWithVersion(taskEntity(fake), { id: 7, fields: { subject: 'Revised' } });

    await expect(failure).rejects.toThrow(new ConflictError('Conflict updating task 7: latest version is 2', 2));
    expect(fake.count('updateTask')).toBe(1);
    expect(fake.count('getTask')).toBe(2);
  });

  it('reports the version seen by the follow-up read', async () => {
    const fake = seededTaiga();
    fake.failNext('updateTask', conflict());
    const entity = taskEntity(fake);
    const fetch = entity.fetch;
    let reads = 0;
    entity.fetch = async (id) => {
      reads++;
      const record = await fetch(id);
      return reads === 1 ? record : { ...record, version: 6 };
    };

    const error = await updateWithVersion(entity, { id: 7, fields: { subject: 'Revised' } }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ message: 'Conflict updating task 7: latest version is 6', latestVersion: 6 });
  });

  it('uses the display name in conflict messages', async () => {
    const fake = seededTaiga();
    fake.failNext('updateUserStory', conflict());

    await expect(
      updateWithVersion(
        {
          label: 'story',
          displayName: 'user story',
          fetch: (id) => fake.getUserStory(id),
          submit: (id, payload) => fake.updateUserStory(id, payload),
        },
        { id: 5, fields: { subject: 'Hallway mirror' } }
      )
    ).rejects.toThrow('Conflict updating user story 5: latest version is 4');
  });

  it('propagates other remote errors unchanged', async () => {
    const fake = seededTaiga();
    const remote = new TaigaApiError('Taiga API request failed with status 400: {"subject":["too long"]}', 400);
    fake.failNext('updateTask', remote);

    await expect(updateWithVersion(taskEntity(fake), { id: 7, fields: { subject: 'x' } })).rejects.toBe(remote);
    expect(fake.count('getTask')).toBe(1);
  });
});
