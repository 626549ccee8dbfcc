import { ValidationError } from './errors.js';
import { makeIdempotencyCacheKey, type IdempotencyStore } from './idempotency.js';
import { logger } from './logging/index.js';
import { resolveStatusId } from './status-resolver.js';
import {
  TaigaApiError,
  type Pagination,
  type StatusKind,
  type StatusRef,
  type TaigaApi,
  type TaigaRecord,
} from './taiga-client.js';
import { assertHasChanges, updateWithVersion, type VersionedEntity } from './update-orchestrator.js';
import {
  EPIC_FIELDS,
  EPIC_LINK_FIELDS,
  EPIC_LIST_FIELDS,
  ISSUE_FIELDS,
  MILESTONE_FIELDS,
  PROJECT_DETAIL_FIELDS,
  PROJECT_FIELDS,
  STATUS_FIELDS,
  STORY_FIELDS,
  STORY_LIST_FIELDS,
  TASK_FIELDS,
  USER_FIELDS,
  isRecord,
  matchesSearch,
  pick,
  pickAll,
  toInteger,
} from './utils.js';
import { validateDueDate } from './validation.js';

/** Runs an action against a ready-to-use client. */
export type ClientRunner = <T>(action: (client: TaigaApi) => Promise<T>) => Promise<T>;

export interface GatewayDeps {
  withClient: ClientRunner;
  idempotency: IdempotencyStore;
}

// ============================================
// INPUT TYPES
// ============================================
// Optional keys follow update semantics: absent leaves the field alone, null clears it.

export type StoryChanges = {
  project?: number;
  subject?: string | null;
  description?: string | null;
  status?: StatusRef | null;
  tags?: string[] | null;
  assigned_to?: number | null;
  epic?: number | null;
  milestone?: number | null;
  custom_attributes?: Record<string, unknown> | null;
};

export type EpicChanges = {
  subject?: string | null;
  description?: string | null;
  status?: number | null;
  assigned_to?: number | null;
  tags?: string[] | null;
  color?: string | null;
};

export type TaskChanges = {
  subject?: string | null;
  description?: string | null;
  status?: StatusRef | null;
  assigned_to?: number | null;
  tags?: string[] | null;
  due_date?: string | null;
  user_story?: number | null;
};

export type IssueChanges = {
  subject?: string | null;
  description?: string | null;
  status?: number | null;
  priority?: number | null;
  severity?: number | null;
  issue_type?: number | null;
  assigned_to?: number | null;
  tags?: string[] | null;
};

export interface UpdateRequest<C> {
  id: number;
  changes: C;
  version?: number | null;
}

export interface ProjectListInput {
  search?: string;
  filters?: Record<string, string>;
}

export interface ProjectLookup {
  projectId?: number | null;
  slug?: string | null;
}

export interface StoryListInput {
  projectId: number;
  epicId?: number;
  search?: string;
  tags?: string[];
  page?: number;
  pageSize?: number;
}

export interface StoryCreateInput {
  projectId: number;
  subject: string;
  description?: string | null;
  status?: StatusRef | null;
  tags?: string[] | null;
  assignedTo?: number | null;
}

export interface EpicCreateInput {
  projectId: number;
  subject: string;
  description?: string | null;
  status?: number;
  assignedTo?: number | null;
  tags?: string[] | null;
  color?: string | null;
}

export interface TaskCreateInput {
  userStoryId?: number | null;
  projectId?: number | null;
  subject: string;
  description?: string | null;
  status?: StatusRef | null;
  assignedTo?: number | null;
  tags?: string[] | null;
  dueDate?: string | null;
  idempotencyKey?: string | null;
}

export interface TaskListInput {
  projectId?: number | null;
  userStoryId?: number | null;
  assignedTo?: number | null;
  search?: string | null;
  status?: StatusRef | null;
  page?: number | null;
  pageSize?: number | null;
}

export interface IssueCreateInput {
  projectId: number;
  subject: string;
  description?: string | null;
  status?: number;
  priority?: number;
  severity?: number;
  issueType?: number;
  assignedTo?: number | null;
  tags?: string[] | null;
}

export interface TaskListResult {
  tasks: TaigaRecord[];
  pagination: Pagination;
}

function definedOnly(fields: Record<string, unknown>): TaigaRecord {
  const payload: TaigaRecord = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) payload[key] = value;
  }
  return payload;
}

function normalizeUser(entry: TaigaRecord): TaigaRecord {
  return isRecord(entry.user) ? entry.user : entry;
}

// ============================================
// GATEWAY
// ============================================

/**
 * One method per tool/action. Input checks run before the client is created, so invalid
 * requests never reach Taiga. Every outbound record goes through an allow-list.
 */
export class TaigaGateway {
  constructor(private readonly deps: GatewayDeps) {}

  private run<T>(action: (client: TaigaApi) => Promise<T>): Promise<T> {
    return this.deps.withClient(action);
  }

  // ---------- Projects ----------

  async listProjects(input: ProjectListInput = {}): Promise<TaigaRecord[]> {
    const projects = await this.run(async (client) => {
      const filters = { ...input.filters };
      if (filters.member === undefined) {
        filters.member = String(await client.getCurrentUserId());
      }
      return client.listProjects(filters);
    });

    return projects
      .filter((project) => matchesSearch(project, input.search, ['name']))
      .map((project) => pick(project, PROJECT_FIELDS));
  }

  async getProject(lookup: ProjectLookup): Promise<TaigaRecord> {
    const { projectId, slug } = lookup;
    const hasId = projectId !== undefined && projectId !== null;
    const hasSlug = slug !== undefined && slug !== null;
    if (hasId === hasSlug) {
      throw new ValidationError('Provide either project_id or slug, but not both');
    }

    const project = await this.run((client) =>
      projectId !== undefined && projectId !== null
        ? client.getProject(projectId)
        : client.getProjectBySlug(slug ?? '')
    );
    return pick(project, PROJECT_DETAIL_FIELDS);
  }

  // ---------- Epics ----------

  async listEpics(projectId: number): Promise<TaigaRecord[]> {
    const epics = await this.run((client) => client.listEpics(projectId));
    return pickAll(epics, EPIC_LIST_FIELDS);
  }

  /** Epics across several projects, each tagged with the `project_id` it was listed under. */
  async listEpicsForProjects(projectIds: number[]): Promise<TaigaRecord[]> {
    if (projectIds.length === 0) {
      throw new ValidationError('At least one project_id is required');
    }

    return this.run(async (client) => {
      const tagged: TaigaRecord[] = [];
      for (const projectId of projectIds) {
        const epics = await client.listEpics(projectId);
        for (const epic of epics) {
          tagged.push({ ...pick(epic, EPIC_LIST_FIELDS), project_id: projectId });
        }
      }
      return tagged;
    });
  }

  async createEpic(input: EpicCreateInput): Promise<TaigaRecord> {
    const payload = definedOnly({
      project: input.projectId,
      subject: input.subject,
      description: input.description,
      status: input.status,
      assigned_to: input.assignedTo,
      tags: input.tags,
      color: input.color,
    });

    const epic = await this.run((client) => client.createEpic(payload));
    return pick(epic, EPIC_FIELDS);
  }

  async updateEpic(request: UpdateRequest<EpicChanges>): Promise<TaigaRecord> {
    assertHasChanges(request.changes, 'epic');

    const epic = await this.run((client) =>
      updateWithVersion(
        {
          label: 'epic',
          fetch: (id) => client.getEpic(id),
          submit: (id, payload) => client.updateEpic(id, payload),
        },
        { id: request.id, fields: request.changes, version: request.version }
      )
    );
    return pick(epic, EPIC_FIELDS);
  }

  async deleteEpic(epicId: number): Promise<void> {
    await this.run((client) => client.deleteEpic(epicId));
  }

  async addStoryToEpic(epicId: number, userStoryId: number): Promise<TaigaRecord | null> {
    const link = await this.run((client) => client.linkEpicUserStory(epicId, userStoryId));
    return link ? pick(link, EPIC_LINK_FIELDS) : null;
  }

  // ---------- User stories ----------

  async listStories(input: StoryListInput): Promise<TaigaRecord[]> {
    const stories = await this.run((client) =>
      client.listUserStories(input.projectId, {
        epic: input.epicId,
        q: input.search,
        tags: input.tags,
        page: input.page,
        pageSize: input.pageSize,
      })
    );
    return pickAll(stories, STORY_LIST_FIELDS);
  }

  async createStory(input: StoryCreateInput): Promise<TaigaRecord> {
    const story = await this.run(async (client) => {
      const statusId = await resolveStatusId(client, 'userstory', input.projectId, input.status);

      const payload: TaigaRecord = {
        project: input.projectId,
        subject: input.subject,
      };
      if (input.description) payload.description = input.description;
      if (statusId !== null) payload.status = statusId;
      if (input.tags && input.tags.length > 0) payload.tags = input.tags;
      if (input.assignedTo !== undefined && input.assignedTo !== null) {
        payload.assigned_to = input.assignedTo;
      }

      return client.createUserStory(payload);
    });
    return pick(story, STORY_FIELDS);
  }

  async updateStory(request: UpdateRequest<StoryChanges>): Promise<TaigaRecord> {
    assertHasChanges(request.changes, 'story');

    const story = await this.run((client) =>
      updateWithVersion(this.storyEntity(client), {
        id: request.id,
        fields: request.changes,
        version: request.version,
      })
    );
    return pick(story, STORY_FIELDS);
  }

  async deleteStory(storyId: number): Promise<void> {
    await this.run((client) => client.deleteUserStory(storyId));
  }

  async listStatuses(kind: StatusKind, projectId: number, search?: string): Promise<TaigaRecord[]> {
    const statuses = await this.run((client) => client.listStatuses(kind, projectId));
    return statuses
      .filter((status) => matchesSearch(status, search, ['name', 'slug']))
      .map((status) => pick(status, STATUS_FIELDS));
  }

  private storyEntity(client: TaigaApi): VersionedEntity {
    return {
      label: 'story',
      displayName: 'user story',
      fetch: (id) => client.getUserStory(id),
      submit: (id, payload) => client.updateUserStory(id, payload),
      statusFields: ['status'],
      resolveStatus: (projectId, status) => resolveStatusId(client, 'userstory', projectId, status),
    };
  }

  // ---------- Tasks ----------

  /**
   * Creates a task under a story or directly in a project. With an idempotency key, a repeat
   * of the same (key, parent, subject) within the TTL returns the first result and makes no
   * remote call at all.
   */
  async createTask(input: TaskCreateInput): Promise<TaigaRecord> {
    const userStoryId = input.userStoryId ?? undefined;
    const explicitProject = input.projectId ?? undefined;
    if (userStoryId === undefined && explicitProject === undefined) {
      throw new ValidationError('Either user_story_id or project_id is required');
    }
    const dueDate = input.dueDate === undefined ? undefined : validateDueDate(input.dueDate);

    let cacheKey: string | null = null;
    if (input.idempotencyKey) {
      const entityId = userStoryId ?? `project-${explicitProject}`;
      cacheKey = makeIdempotencyCacheKey(input.idempotencyKey, entityId, input.subject);
      const cached = await this.deps.idempotency.get(cacheKey);
      if (cached) {
        logger.info('Replaying task creation', { idempotency_key: input.idempotencyKey }, 'gateway');
        return pick(cached, TASK_FIELDS);
      }
    }

    const task = await this.run(async (client) => {
      let projectId = explicitProject;
      if (projectId === undefined && userStoryId !== undefined) {
        const story = await client.getUserStory(userStoryId);
        projectId = toInteger(story.project);
        if (projectId === undefined) {
          throw new TaigaApiError('Unable to resolve project for task creation');
        }
      }
      if (projectId === undefined) {
        throw new ValidationError('Either user_story_id or project_id is required');
      }

      const payload: TaigaRecord = { project: projectId };
      if (userStoryId !== undefined) payload.user_story = userStoryId;
      payload.subject = input.subject;
      Object.assign(
        payload,
        definedOnly({
          description: input.description,
          assigned_to: input.assignedTo,
          tags: input.tags,
          due_date: dueDate,
        })
      );
      if (input.status !== undefined) {
        payload.status = await resolveStatusId(client, 'task', projectId, input.status);
      }

      return client.createTask(payload);
    });

    if (cacheKey) {
      await this.deps.idempotency.store(cacheKey, task);
    }
    return pick(task, TASK_FIELDS);
  }

  async updateTask(request: UpdateRequest<TaskChanges>): Promise<TaigaRecord> {
    const changes: TaskChanges = {
      ...request.changes,
      due_date:
        request.changes.due_date === undefined ? undefined : validateDueDate(request.changes.due_date),
    };
    assertHasChanges(changes, 'task');

    const task = await this.run((client) =>
      updateWithVersion(
        {
          label: 'task',
          fetch: (id) => client.getTask(id),
          submit: (id, payload) => client.updateTask(id, payload),
          statusFields: ['status'],
          resolveStatus: (projectId, status) => resolveStatusId(client, 'task', projectId, status),
        },
        { id: request.id, fields: changes, version: request.version }
      )
    );
    return pick(task, TASK_FIELDS);
  }

  async deleteTask(taskId: number): Promise<void> {
    await this.run((client) => client.deleteTask(taskId));
  }

  async listTasks(input: TaskListInput = {}): Promise<TaskListResult> {
    const projectId = input.projectId ?? undefined;
    if (typeof input.status === 'string' && projectId === undefined) {
      throw new ValidationError('project_id is required when filtering by status name');
    }

    const page = await this.run(async (client) => {
      let status: number | null = null;
      if (typeof input.status === 'number') {
        status = input.status;
      } else if (typeof input.status === 'string' && projectId !== undefined) {
        status = await resolveStatusId(client, 'task', projectId, input.status);
      }

      return client.listTasks({
        projectId,
        userStoryId: input.userStoryId ?? undefined,
        assignedTo: input.assignedTo ?? undefined,
        search: input.search ?? undefined,
        status: status ?? undefined,
        page: input.page ?? undefined,
        pageSize: input.pageSize ?? undefined,
      });
    });

    return { tasks: pickAll(page.tasks, TASK_FIELDS), pagination: page.pagination };
  }

  // ---------- Issues ----------

  async createIssue(input: IssueCreateInput): Promise<TaigaRecord> {
    const payload = definedOnly({
      project: input.projectId,
      subject: input.subject,
      description: input.description,
      status: input.status,
      priority: input.priority,
      severity: input.severity,
      issue_type: input.issueType,
      assigned_to: input.assignedTo,
      tags: input.tags,
    });

    const issue = await this.run((client) => client.createIssue(payload));
    return pick(issue, ISSUE_FIELDS);
  }

  async updateIssue(request: UpdateRequest<IssueChanges>): Promise<TaigaRecord> {
    assertHasChanges(request.changes, 'issue');

    const issue = await this.run((client) =>
      updateWithVersion(
        {
          label: 'issue',
          fetch: (id) => client.getIssue(id),
          submit: (id, payload) => client.updateIssue(id, payload),
        },
        { id: request.id, fields: request.changes, version: request.version }
      )
    );
    return pick(issue, ISSUE_FIELDS);
  }

  async deleteIssue(issueId: number): Promise<void> {
    await this.run((client) => client.deleteIssue(issueId));
  }

  // ---------- Users & milestones ----------

  /**
   * Users visible to the service account. Accounts without access to the global list
   * (401/403) fall back to the project's member list when a project is given.
   * Search is applied locally on name, username and email.
   */
  async listUsers(input: { projectId?: number | null; search?: string | null } = {}): Promise<TaigaRecord[]> {
    const projectId = input.projectId ?? undefined;

    const users = await this.run(async (client) => {
      try {
        return await client.listUsers({ projectId });
      } catch (error) {
        if (
          projectId !== undefined &&
          error instanceof TaigaApiError &&
          (error.statusCode === 401 || error.statusCode === 403)
        ) {
          logger.info('Global user list denied, using project members', { project_id: projectId }, 'gateway');
          return client.listProjectUsers(projectId);
        }
        throw error;
      }
    });

    return users
      .map((entry) => pick(normalizeUser(entry), USER_FIELDS))
      .filter((user) => matchesSearch(user, input.search ?? undefined, ['full_name', 'username', 'email']));
  }

  async listMilestones(projectId: number, search?: string | null): Promise<TaigaRecord[]> {
    const milestones = await this.run((client) => client.listMilestones(projectId));
    return milestones
      .map((milestone) => pick(milestone, MILESTONE_FIELDS))
      .filter((milestone) => matchesSearch(milestone, search ?? undefined, ['name', 'slug']));
  }
}
