import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ConflictError, GatewayError, GatewayErrorType, ValidationError, describeError } from './errors.js';
import type { TaigaGateway } from './gateway.js';
import { logger } from './logging/index.js';
import {
  AddStoryToEpicSchema,
  CreateEpicSchema,
  CreateStorySchema,
  CreateTaskSchema,
  DeleteEpicSchema,
  EchoSchema,
  GetProjectSchema,
  ListEpicsSchema,
  ListMilestonesSchema,
  ListProjectsSchema,
  ListStoriesSchema,
  ListTasksSchema,
  ListUsersSchema,
  UpdateEpicSchema,
  UpdateStorySchema,
  UpdateTaskSchema,
} from './schemas.js';
import { TaigaApiError } from './taiga-client.js';

export const SERVER_NAME = 'taiga-mcp-gateway';
export const SERVER_VERSION = '1.0.0';

// ============================================
// TOOL DEFINITIONS
// ============================================

const READ_ONLY = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

const WRITE = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

const DESTRUCTIVE = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const statusProperty = {
  type: ['integer', 'string', 'null'],
  description: 'Status id, or a status name/slug resolved within the project',
};

const tagsProperty = {
  type: ['array', 'null'],
  items: { type: 'string' },
  description: 'Tag names; null clears the tags',
};

const versionProperty = {
  type: ['integer', 'null'],
  description: 'Version to submit. Defaults to the current version, read just before the update',
};

export const tools: Tool[] = [
  {
    name: 'echo',
    description: 'Return the given message unchanged. Useful as a connectivity check.',
    annotations: { ...READ_ONLY, openWorldHint: false },
    inputSchema: {
      type: 'object',
      properties: {
        message: { type: 'string', description: 'Text to echo back' },
      },
      required: ['message'],
    },
  },
  {
    name: 'taiga.projects.list',
    description: `List the Taiga projects the service account is a member of.

RETURNS: Array of {id, name, slug, description, is_private}.`,
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        search: { type: 'string', description: 'Case-insensitive substring of the project name' },
      },
    },
  },
  {
    name: 'taiga.projects.get',
    description: 'Fetch a project by numeric id or by slug. Exactly one of project_id and slug must be given.',
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'integer', description: 'Project id' },
        slug: { type: 'string', description: 'Project slug, e.g. "jdoe-website"' },
      },
    },
  },
  {
    name: 'taiga.epics.list',
    description: 'List epics of a project.',
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'integer', description: 'Project id' },
      },
      required: ['project_id'],
    },
  },
  {
    name: 'taiga.epics.create',
    description: 'Create an epic in a project. Status must be a numeric id.',
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'integer' },
        subject: { type: 'string' },
        description: { type: ['string', 'null'] },
        status: { type: 'integer', description: 'Epic status id' },
        assigned_to: { type: ['integer', 'null'], description: 'User id' },
        tags: tagsProperty,
        color: { type: ['string', 'null'], description: 'Hex colour, e.g. "#A5694F"' },
      },
      required: ['project_id', 'subject'],
    },
  },
  {
    name: 'taiga.epics.update',
    description: `Partially update an epic. Omitted fields are left unchanged; null clears a field.
At least one field besides epic_id and version is required.

ERRORS:
- CONFLICT: the epic changed since the version submitted. The message names the latest version.`,
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        epic_id: { type: 'integer' },
        subject: { type: ['string', 'null'] },
        description: { type: ['string', 'null'] },
        status: { type: ['integer', 'null'] },
        assigned_to: { type: ['integer', 'null'] },
        tags: tagsProperty,
        color: { type: ['string', 'null'] },
        version: versionProperty,
      },
      required: ['epic_id'],
    },
  },
  {
    name: 'taiga.epics.delete',
    description: 'Delete an epic.',
    annotations: DESTRUCTIVE,
    inputSchema: {
      type: 'object',
      properties: {
        epic_id: { type: 'integer' },
      },
      required: ['epic_id'],
    },
  },
  {
    name: 'taiga.epics.add_user_story',
    description: 'Attach a user story to an epic.',
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        epic_id: { type: 'integer' },
        user_story_id: { type: 'integer' },
      },
      required: ['epic_id', 'user_story_id'],
    },
  },
  {
    name: 'taiga.stories.list',
    description: 'List user stories of a project, optionally filtered by epic, text or tags.',
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'integer' },
        search: { type: 'string', description: 'Full-text query passed to Taiga' },
        epic_id: { type: 'integer' },
        tags: { type: 'array', items: { type: 'string' } },
        page: { type: 'integer' },
        page_size: { type: 'integer' },
      },
      required: ['project_id'],
    },
  },
  {
    name: 'taiga.stories.create',
    description: 'Create a user story. The status may be given by id, name or slug.',
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'integer' },
        subject: { type: 'string' },
        description: { type: ['string', 'null'] },
        status: statusProperty,
        tags: tagsProperty,
        assigned_to: { type: ['integer', 'null'] },
      },
      required: ['project_id', 'subject'],
    },
  },
  {
    name: 'taiga.stories.update',
    description: `Partially update a user story. Omitted fields are left unchanged; null clears a field.
Status names are resolved in project_id when given, otherwise in the story's own project.

ERRORS:
- CONFLICT: the story changed since the version submitted. The message names the latest version.
- NOT_FOUND: no status with that name or slug exists in the project.`,
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        user_story_id: { type: 'integer' },
        project_id: { type: 'integer' },
        subject: { type: ['string', 'null'] },
        description: { type: ['string', 'null'] },
        status: statusProperty,
        tags: tagsProperty,
        assigned_to: { type: ['integer', 'null'] },
        epic_id: { type: ['integer', 'null'] },
        milestone_id: { type: ['integer', 'null'] },
        custom_attributes: { type: ['object', 'null'] },
        version: versionProperty,
      },
      required: ['user_story_id'],
    },
  },
  {
    name: 'taiga.tasks.create',
    description: `Create a task under a user story, or directly in a project.

IDEMPOTENCY:
- With idempotency_key, repeating the call with the same key, parent and subject within 24 hours
  returns the first result without creating a second task.`,
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        user_story_id: { type: ['integer', 'null'], description: 'Parent story; its project is used' },
        project_id: { type: ['integer', 'null'], description: 'Required when no user_story_id is given' },
        subject: { type: 'string' },
        description: { type: ['string', 'null'] },
        assigned_to: { type: ['integer', 'null'] },
        status: statusProperty,
        tags: tagsProperty,
        due_date: { type: ['string', 'null'], description: 'YYYY-MM-DD' },
        idempotency_key: { type: ['string', 'null'] },
      },
      required: ['subject'],
    },
  },
  {
    name: 'taiga.tasks.update',
    description: `Partially update a task. Omitted fields are left unchanged; null clears a field.

ERRORS:
- CONFLICT: the task changed since the version submitted. The message names the latest version.`,
    annotations: WRITE,
    inputSchema: {
      type: 'object',
      properties: {
        task_id: { type: 'integer' },
        subject: { type: ['string', 'null'] },
        description: { type: ['string', 'null'] },
        assigned_to: { type: ['integer', 'null'] },
        status: statusProperty,
        tags: tagsProperty,
        due_date: { type: ['string', 'null'], description: 'YYYY-MM-DD' },
        version: versionProperty,
      },
      required: ['task_id'],
    },
  },
  {
    name: 'taiga.tasks.list',
    description: `List tasks with optional filters.

RETURNS: {tasks, pagination} where pagination carries page, page_size, total and total_pages
when Taiga reports them. Filtering by status name requires project_id.`,
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: ['integer', 'null'] },
        user_story_id: { type: ['integer', 'null'] },
        assigned_to: { type: ['integer', 'null'] },
        search: { type: ['string', 'null'] },
        status: statusProperty,
        page: { type: ['integer', 'null'] },
        page_size: { type: ['integer', 'null'] },
      },
    },
  },
  {
    name: 'taiga.users.list',
    description:
      'List users, e.g. to find an assignee id. Falls back to project members when the global list is not accessible.',
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: ['integer', 'null'] },
        search: { type: ['string', 'null'], description: 'Matches full name, username or email' },
      },
    },
  },
  {
    name: 'taiga.milestones.list',
    description: 'List milestones (sprints) of a project.',
    annotations: READ_ONLY,
    inputSchema: {
      type: 'object',
      properties: {
        project_id: { type: 'integer' },
        search: { type: ['string', 'null'], description: 'Matches name or slug' },
      },
      required: ['project_id'],
    },
  },
];

// ============================================
// RESULT HELPERS
// ============================================

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function jsonResult(value: unknown): CallToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

function errorResult(error: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error }, null, 2) }],
    isError: true,
  };
}

export function toolErrorResult(error: unknown, toolName: string): CallToolResult {
  if (error instanceof z.ZodError) {
    return errorResult({
      type: GatewayErrorType.VALIDATION_ERROR,
      message: 'Invalid request parameters',
      details: error.errors.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      })),
    });
  }

  if (error instanceof TaigaApiError) {
    return errorResult({
      ...error.toJSON(),
      ...(error.payload !== undefined ? { details: error.payload } : {}),
    });
  }

  if (error instanceof ConflictError) {
    return errorResult({ ...error.toJSON(), latest_version: error.latestVersion });
  }

  if (error instanceof GatewayError) {
    return errorResult(error.toJSON());
  }

  logger.error('Unexpected tool failure', { tool: toolName, error: describeError(error) }, 'tools');
  return errorResult({
    type: GatewayErrorType.INTERNAL_ERROR,
    message: 'Internal server error',
  });
}

// ============================================
// DISPATCH
// ============================================

export async function callTool(
  gateway: TaigaGateway,
  name: string,
  args: Record<string, unknown> = {}
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'echo': {
        const { message } = EchoSchema.parse(args);
        return textResult(message);
      }

      case 'taiga.projects.list': {
        const input = ListProjectsSchema.parse(args);
        return jsonResult(await gateway.listProjects({ search: input.search ?? undefined }));
      }

      case 'taiga.projects.get': {
        const input = GetProjectSchema.parse(args);
        return jsonResult(await gateway.getProject({ projectId: input.project_id, slug: input.slug }));
      }

      case 'taiga.epics.list': {
        const input = ListEpicsSchema.parse(args);
        return jsonResult(await gateway.listEpics(input.project_id));
      }

      case 'taiga.epics.create': {
        const input = CreateEpicSchema.parse(args);
        const epic = await gateway.createEpic({
          projectId: input.project_id,
          subject: input.subject,
          description: input.description,
          status: input.status,
          assignedTo: input.assigned_to,
          tags: input.tags,
          color: input.color,
        });
        return jsonResult(epic);
      }

      case 'taiga.epics.update': {
        const { epic_id, version, ...changes } = UpdateEpicSchema.parse(args);
        return jsonResult(await gateway.updateEpic({ id: epic_id, changes, version }));
      }

      case 'taiga.epics.delete': {
        const input = DeleteEpicSchema.parse(args);
        await gateway.deleteEpic(input.epic_id);
        return jsonResult({ deleted: { epic_id: input.epic_id } });
      }

      case 'taiga.epics.add_user_story': {
        const input = AddStoryToEpicSchema.parse(args);
        return jsonResult(await gateway.addStoryToEpic(input.epic_id, input.user_story_id));
      }

      case 'taiga.stories.list': {
        const input = ListStoriesSchema.parse(args);
        const stories = await gateway.listStories({
          projectId: input.project_id,
          epicId: input.epic_id ?? undefined,
          search: input.search ?? undefined,
          tags: input.tags ?? undefined,
          page: input.page ?? undefined,
          pageSize: input.page_size ?? undefined,
        });
        return jsonResult(stories);
      }

      case 'taiga.stories.create': {
        const input = CreateStorySchema.parse(args);
        const story = await gateway.createStory({
          projectId: input.project_id,
          subject: input.subject,
          description: input.description,
          status: input.status,
          tags: input.tags,
          assignedTo: input.assigned_to,
        });
        return jsonResult(story);
      }

      case 'taiga.stories.update': {
        const input = UpdateStorySchema.parse(args);
        const story = await gateway.updateStory({
          id: input.user_story_id,
          version: input.version,
          changes: {
            project: input.project_id,
            subject: input.subject,
            description: input.description,
            status: input.status,
            tags: input.tags,
            assigned_to: input.assigned_to,
            epic: input.epic_id,
            milestone: input.milestone_id,
            custom_attributes: input.custom_attributes,
          },
        });
        return jsonResult(story);
      }

      case 'taiga.tasks.create': {
        const input = CreateTaskSchema.parse(args);
        const task = await gateway.createTask({
          userStoryId: input.user_story_id,
          projectId: input.project_id,
          subject: input.subject,
          description: input.description,
          assignedTo: input.assigned_to,
          status: input.status,
          tags: input.tags,
          dueDate: input.due_date,
          idempotencyKey: input.idempotency_key,
        });
        return jsonResult(task);
      }

      case 'taiga.tasks.update': {
        const { task_id, version, ...changes } = UpdateTaskSchema.parse(args);
        return jsonResult(await gateway.updateTask({ id: task_id, changes, version }));
      }

      case 'taiga.tasks.list': {
        const input = ListTasksSchema.parse(args);
        const result = await gateway.listTasks({
          projectId: input.project_id,
          userStoryId: input.user_story_id,
          assignedTo: input.assigned_to,
          search: input.search,
          status: input.status,
          page: input.page,
          pageSize: input.page_size,
        });
        return jsonResult(result);
      }

      case 'taiga.users.list': {
        const input = ListUsersSchema.parse(args);
        return jsonResult(await gateway.listUsers({ projectId: input.project_id, search: input.search }));
      }

      case 'taiga.milestones.list': {
        const input = ListMilestonesSchema.parse(args);
        return jsonResult(await gateway.listMilestones(input.project_id, input.search));
      }

      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return toolErrorResult(error, name);
  }
}

// ============================================
// SERVER SETUP
// ============================================

/** A fresh low-level MCP server exposing the tools above, bound to `gateway`. */
export function createMcpServer(gateway: TaigaGateway): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug('Tool call', { tool: name }, 'tools');
    return callTool(gateway, name, args);
  });

  return server;
}
