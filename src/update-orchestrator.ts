import { ConflictError, ValidationError } from './errors.js';
import { TaigaApiError, type TaigaRecord } from './taiga-client.js';
import { toInteger } from './utils.js';

/** Field values keyed by their Taiga name. `undefined` means "leave unchanged"; `null` clears. */
export type FieldChanges = Readonly<Record<string, unknown>>;

export interface VersionedEntity {
  /** Short noun used in validation and version messages, e.g. "story". */
  label: string;
  /** Noun used in conflict messages; defaults to `label`. */
  displayName?: string;
  fetch(id: number): Promise<TaigaRecord>;
  submit(id: number, payload: TaigaRecord): Promise<TaigaRecord>;
  /** Field names whose string values are status names to resolve. */
  statusFields?: readonly string[];
  resolveStatus?(projectId: number, status: string): Promise<number | null>;
}

export interface VersionedUpdate {
  id: number;
  fields: FieldChanges;
  /** Explicit version to submit; `null` or `undefined` falls back to the fetched one. */
  version?: number | null;
}

export function setFields(fields: FieldChanges): Array<[string, unknown]> {
  return Object.entries(fields).filter(([, value]) => value !== undefined);
}

export function assertHasChanges(fields: FieldChanges, label: string): void {
  if (setFields(fields).length === 0) {
    throw new ValidationError(`At least one field must be provided to update the ${label}`);
  }
}

/**
 * Partial update under optimistic concurrency: read the current record, build the payload
 * from the set fields, attach a version, submit once. A 409 from the submit is rewritten
 * into a {@link ConflictError} carrying the version from a follow-up read.
 */
export async function updateWithVersion(
  entity: VersionedEntity,
  request: VersionedUpdate
): Promise<TaigaRecord> {
  const { label } = entity;
  assertHasChanges(request.fields, label);

  const existing = await entity.fetch(request.id);

  const payload: TaigaRecord = {};
  for (const [field, value] of setFields(request.fields)) {
    if (typeof value === 'string' && entity.statusFields?.includes(field) && entity.resolveStatus) {
      const projectId = toInteger(request.fields.project) ?? toInteger(existing.project);
      if (projectId === undefined) {
        throw new TaigaApiError(`Unable to resolve project for ${label} status lookup`);
      }
      payload[field] = await entity.resolveStatus(projectId, value);
    } else {
      payload[field] = value;
    }
  }

  if (request.version !== undefined && request.version !== null) {
    payload.version = request.version;
  } else {
    const fetched = toInteger(existing.version);
    if (fetched === undefined) {
      throw new TaigaApiError(`Unable to resolve version for ${label} update`);
    }
    payload.version = fetched;
  }

  try {
    return await entity.submit(request.id, payload);
  } catch (error) {
    if (error instanceof TaigaApiError && error.statusCode === 409) {
      const latest = await entity.fetch(request.id);
      const latestVersion = latest.version;
      throw new ConflictError(
        `Conflict updating ${entity.displayName ?? label} ${request.id}: latest version is ${String(latestVersion)}`,
        latestVersion
      );
    }
    throw error;
  }
}
