import type { TaigaRecord } from './taiga-client.js';

// ============================================
// TYPE GUARDS & COERCION
// ============================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Integer value of a number or a decimal string; `undefined` for anything else. */
export function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10);
  }
  return undefined;
}

// ============================================
// FIELD PROJECTION
// ============================================

/**
 * Copy of `record` restricted to `fields`. Keys missing from the record stay missing.
 */
export function pick(record: TaigaRecord, fields: readonly string[]): TaigaRecord {
  const result: TaigaRecord = {};
  for (const field of fields) {
    if (Object.prototype.hasOwnProperty.call(record, field)) {
      result[field] = record[field];
    }
  }
  return result;
}

export function pickAll(records: TaigaRecord[], fields: readonly string[]): TaigaRecord[] {
  return records.map((record) => pick(record, fields));
}

export const PROJECT_FIELDS = ['id', 'name', 'slug', 'description', 'is_private'] as const;

export const PROJECT_DETAIL_FIELDS = [
  ...PROJECT_FIELDS,
  'created_date',
  'modified_date',
  'owner',
  'members',
  'is_backlog_activated',
  'is_kanban_activated',
  'total_milestones',
] as const;

export const EPIC_LIST_FIELDS = ['id', 'ref', 'subject', 'created_date', 'modified_date', 'status'] as const;

export const EPIC_FIELDS = [
  'id',
  'ref',
  'subject',
  'project',
  'description',
  'status',
  'assigned_to',
  'tags',
  'color',
  'version',
  'created_date',
  'modified_date',
] as const;

export const EPIC_LINK_FIELDS = ['epic', 'user_story', 'order'] as const;

export const STORY_LIST_FIELDS = [
  'id',
  'ref',
  'subject',
  'description',
  'project',
  'epic',
  'epics',
  'tags',
  'status',
  'status_extra_info',
  'assigned_to',
  'created_date',
  'modified_date',
] as const;

export const STORY_FIELDS = [
  'id',
  'ref',
  'subject',
  'project',
  'status',
  'description',
  'assigned_to',
  'tags',
  'milestone',
  'version',
  'created_date',
  'modified_date',
] as const;

export const STATUS_FIELDS = ['id', 'name', 'slug', 'is_closed', 'order'] as const;

export const TASK_FIELDS = [
  'id',
  'ref',
  'subject',
  'project',
  'user_story',
  'status',
  'description',
  'assigned_to',
  'tags',
  'due_date',
  'version',
  'created_date',
  'modified_date',
] as const;

export const ISSUE_FIELDS = [
  'id',
  'ref',
  'subject',
  'project',
  'status',
  'description',
  'assigned_to',
  'tags',
  'priority',
  'severity',
  'issue_type',
  'version',
  'created_date',
  'modified_date',
] as const;

export const USER_FIELDS = ['id', 'full_name', 'username', 'email'] as const;

export const MILESTONE_FIELDS = [
  'id',
  'name',
  'slug',
  'estimated_start',
  'estimated_finish',
  'closed',
  'project',
] as const;

// ============================================
// CLIENT-SIDE SEARCH
// ============================================

/**
 * Case-insensitive substring match of `search` against any of `fields`.
 * An empty search matches everything.
 */
export function matchesSearch(
  record: TaigaRecord,
  search: string | undefined,
  fields: readonly string[]
): boolean {
  const needle = search?.trim().toLowerCase();
  if (!needle) return true;

  return fields.some((field) => {
    const value = record[field];
    return typeof value === 'string' && value.toLowerCase().includes(needle);
  });
}
