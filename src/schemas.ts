import { z } from 'zod';

// ============================================
// COMMON SCHEMAS
// ============================================

const Id = z.number().int().positive();

export const StatusRefSchema = z
  .union([z.number().int(), z.string().min(1)])
  .describe('Status id, or its name/slug to resolve within the project');

const TagsSchema = z.array(z.string());

export const VersionSchema = z
  .number()
  .int()
  .nullable()
  .optional()
  .describe('Version to submit; defaults to the current version read before the update');

export const IdempotencyKeySchema = z.string().nullable().optional().describe(
  'Client-generated token; repeating a create with the same token, parent and subject returns the first result.'
);

export const EchoSchema = z.object({
  message: z.string(),
});

// ============================================
// PROJECT SCHEMAS
// ============================================

export const ListProjectsSchema = z.object({
  search: z.string().nullable().optional().describe('Case-insensitive substring of the project name'),
});

export const GetProjectSchema = z.object({
  project_id: Id.nullable().optional(),
  slug: z.string().min(1).nullable().optional(),
});

// ============================================
// EPIC SCHEMAS
// ============================================

export const ListEpicsSchema = z.object({
  project_id: Id,
});

export const CreateEpicSchema = z.object({
  project_id: Id,
  subject: z.string().min(1),
  description: z.string().nullable().optional(),
  status: z.number().int().optional(),
  assigned_to: z.number().int().nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  color: z.string().nullable().optional(),
});

export const UpdateEpicSchema = z.object({
  epic_id: Id,
  subject: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  status: z.number().int().nullable().optional(),
  assigned_to: z.number().int().nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  color: z.string().nullable().optional(),
  version: VersionSchema,
});

export const DeleteEpicSchema = z.object({
  epic_id: Id,
});

export const AddStoryToEpicSchema = z.object({
  epic_id: Id,
  user_story_id: Id,
});

// ============================================
// USER STORY SCHEMAS
// ============================================

export const ListStoriesSchema = z.object({
  project_id: Id,
  search: z.string().nullable().optional(),
  epic_id: Id.nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  page: Id.nullable().optional(),
  page_size: Id.nullable().optional(),
});

export const CreateStorySchema = z.object({
  project_id: Id,
  subject: z.string().min(1),
  description: z.string().nullable().optional(),
  status: StatusRefSchema.nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  assigned_to: z.number().int().nullable().optional(),
});

export const UpdateStorySchema = z.object({
  user_story_id: Id,
  project_id: Id.optional().describe('Move the story, and resolve status names in this project'),
  subject: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  status: StatusRefSchema.nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  assigned_to: z.number().int().nullable().optional(),
  epic_id: z.number().int().nullable().optional(),
  milestone_id: z.number().int().nullable().optional(),
  custom_attributes: z.record(z.unknown()).nullable().optional(),
  version: VersionSchema,
});

// ============================================
// TASK SCHEMAS
// ============================================

export const CreateTaskSchema = z.object({
  user_story_id: Id.nullable().optional(),
  project_id: Id.nullable().optional(),
  subject: z.string().min(1),
  description: z.string().nullable().optional(),
  assigned_to: z.number().int().nullable().optional(),
  status: StatusRefSchema.nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  due_date: z.string().nullable().optional().describe('Due date as YYYY-MM-DD'),
  idempotency_key: IdempotencyKeySchema,
});

export const UpdateTaskSchema = z.object({
  task_id: Id,
  subject: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
  assigned_to: z.number().int().nullable().optional(),
  status: StatusRefSchema.nullable().optional(),
  tags: TagsSchema.nullable().optional(),
  due_date: z.string().nullable().optional(),
  version: VersionSchema,
});

export const ListTasksSchema = z.object({
  project_id: Id.nullable().optional(),
  user_story_id: Id.nullable().optional(),
  assigned_to: z.number().int().nullable().optional(),
  search: z.string().nullable().optional(),
  status: StatusRefSchema.nullable().optional(),
  page: Id.nullable().optional(),
  page_size: Id.nullable().optional(),
});

// ============================================
// USER & MILESTONE SCHEMAS
// ============================================

export const ListUsersSchema = z.object({
  project_id: Id.nullable().optional(),
  search: z.string().nullable().optional(),
});

export const ListMilestonesSchema = z.object({
  project_id: Id,
  search: z.string().nullable().optional(),
});
