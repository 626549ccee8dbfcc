import { NotFoundError } from './errors.js';
import type { StatusKind, StatusRef, TaigaApi } from './taiga-client.js';
import { toInteger } from './utils.js';

const KIND_LABELS: Record<StatusKind, string> = {
  userstory: 'User story',
  task: 'Task',
};

/**
 * Maps a status given by name or slug to its numeric id within a project.
 * Integers and null/undefined never touch the network. The status list is
 * fetched fresh on every call.
 */
export async function resolveStatusId(
  client: TaigaApi,
  kind: StatusKind,
  projectId: number,
  status: StatusRef | null | undefined
): Promise<number | null> {
  if (status === null || status === undefined) {
    return null;
  }
  if (typeof status === 'number') {
    return status;
  }

  const statuses = await client.listStatuses(kind, projectId);
  const match = statuses.find((entry) => entry.name === status || entry.slug === status);
  if (match !== undefined) {
    const id = toInteger(match.id);
    if (id === undefined) {
      throw new NotFoundError(`${KIND_LABELS[kind]} status '${status}' has no usable id in project ${projectId}`);
    }
    return id;
  }

  throw new NotFoundError(`${KIND_LABELS[kind]} status '${status}' not found for project ${projectId}`);
}
