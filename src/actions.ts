import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Router } from 'express';
import { GatewayError, ValidationError, describeError } from './errors.js';
import type { TaigaGateway } from './gateway.js';
import { logger } from './logging/index.js';
import { requireApiKey } from './middleware/api-key.js';
import type { StatusKind } from './taiga-client.js';
import { isRecord, toInteger } from './utils.js';
import {
  ensureJsonObject,
  ensureList,
  ensureObject,
  ensureStatusRef,
  ensureText,
  optionalField,
  optionalInteger,
  optionalQueryInteger,
  parseInteger,
  queryValue,
  queryValues,
  requireField,
  requireQueryValue,
} from './validation.js';

type ActionResult = Record<string, unknown>;

export interface ActionsOptions {
  apiKey?: string;
}

// ============================================
// RESPONSE HELPERS
// ============================================

function sendError(res: express.Response, error: unknown, action: string): void {
  if (error instanceof GatewayError) {
    logger.info('Action rejected', { action, type: error.type, message: error.message }, 'actions');
    res.status(error.status).json({ error: error.message });
    return;
  }

  logger.error('Unexpected error while handling action', { action, error: describeError(error) }, 'actions');
  res.status(500).json({ error: 'Internal server error' });
}

function action(name: string, handler: (req: Request) => Promise<ActionResult>): RequestHandler {
  return async (req, res) => {
    try {
      const result = await handler(req);
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, name);
    }
  };
}

// ============================================
// INPUT HELPERS
// ============================================

// express.json reports an absent body as {}
function hasBody(req: Request): boolean {
  if (req.headers['transfer-encoding'] !== undefined) return true;
  const length = req.headers['content-length'];
  return length !== undefined && length !== '0';
}

function body(req: Request): Record<string, unknown> {
  if (!hasBody(req)) {
    throw new ValidationError('Request body must be valid JSON');
  }
  return ensureJsonObject(req.body);
}

function requiredInteger(data: Record<string, unknown>, field: string): number {
  return parseInteger(requireField(data, field), field);
}

function requiredText(data: Record<string, unknown>, field: string): string {
  const value = ensureText(requireField(data, field), field);
  if (value === null) {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

function queryProjectId(req: Request): number {
  return parseInteger(requireQueryValue(req.query, 'project_id'), 'project_id');
}

// Numeric strings are ids; anything else is a status name or slug
function queryStatus(value: string | undefined): number | string | undefined {
  if (value === undefined) return undefined;
  return toInteger(value) ?? value;
}

// ============================================
// ROUTER
// ============================================

/**
 * `/actions/*`: thin HTTP wrappers over the gateway for clients that cannot speak MCP.
 * Every route requires the shared `X-Api-Key` secret; POST routes take a JSON object body.
 */
export function createActionsRouter(gateway: TaigaGateway, options: ActionsOptions): Router {
  const router = express.Router();

  router.use(requireApiKey(options.apiKey));
  router.use(express.json({ strict: false, type: () => true }));

  // ---------- GET ----------

  router.get(
    '/list_projects',
    action('list_projects', async (req) => {
      const filters: Record<string, string> = {};
      let search: string | undefined;
      for (const key of Object.keys(req.query)) {
        const values = queryValues(req.query, key);
        const last = values[values.length - 1];
        if (last === undefined) continue;
        if (key === 'search') {
          search = last;
        } else {
          filters[key] = last;
        }
      }
      return { projects: await gateway.listProjects({ search, filters }) };
    })
  );

  router.get(
    '/get_project',
    action('get_project', async (req) => ({
      project: await gateway.getProject({ projectId: queryProjectId(req) }),
    }))
  );

  router.get(
    '/get_project_by_slug',
    action('get_project_by_slug', async (req) => ({
      project: await gateway.getProject({ slug: requireQueryValue(req.query, 'slug') }),
    }))
  );

  router.get(
    '/list_epics',
    action('list_epics', async (req) => {
      const projectIds = queryValues(req.query, 'project_id').map((value) => parseInteger(value, 'project_id'));
      return { epics: await gateway.listEpicsForProjects(projectIds) };
    })
  );

  router.get(
    '/list_stories',
    action('list_stories', async (req) => {
      const projectId = queryProjectId(req);
      const epicParam = queryValue(req.query, 'epic_id') ?? queryValue(req.query, 'epic');
      const tags = queryValues(req.query, 'tag');
      const stories = await gateway.listStories({
        projectId,
        epicId: epicParam === undefined ? undefined : parseInteger(epicParam, 'epic_id'),
        search: queryValue(req.query, 'search') ?? queryValue(req.query, 'q'),
        tags: tags.length > 0 ? tags : queryValues(req.query, 'tags'),
        page: optionalQueryInteger(req.query, 'page'),
        pageSize: optionalQueryInteger(req.query, 'page_size'),
      });
      return { stories };
    })
  );

  const statusesAction = (name: string, kind: StatusKind) =>
    action(name, async (req) => ({
      statuses: await gateway.listStatuses(kind, queryProjectId(req), queryValue(req.query, 'search')),
    }));

  router.get('/statuses', statusesAction('statuses', 'userstory'));
  router.get('/task_statuses', statusesAction('task_statuses', 'task'));

  router.get(
    '/list_tasks',
    action('list_tasks', async (req) => {
      const { tasks, pagination } = await gateway.listTasks({
        projectId: optionalQueryInteger(req.query, 'project_id'),
        userStoryId: optionalQueryInteger(req.query, 'user_story_id'),
        assignedTo: optionalQueryInteger(req.query, 'assigned_to'),
        search: queryValue(req.query, 'search') ?? queryValue(req.query, 'q'),
        status: queryStatus(queryValue(req.query, 'status')),
        page: optionalQueryInteger(req.query, 'page'),
        pageSize: optionalQueryInteger(req.query, 'page_size'),
      });
      return { tasks, pagination };
    })
  );

  router.get(
    '/list_users',
    action('list_users', async (req) => ({
      users: await gateway.listUsers({
        projectId: optionalQueryInteger(req.query, 'project_id'),
        search: queryValue(req.query, 'search'),
      }),
    }))
  );

  router.get(
    '/list_milestones',
    action('list_milestones', async (req) => ({
      milestones: await gateway.listMilestones(queryProjectId(req), queryValue(req.query, 'search')),
    }))
  );

  // ---------- Stories ----------

  router.post(
    '/create_story',
    action('create_story', async (req) => {
      const data = body(req);
      const projectId = requiredInteger(data, 'project_id');
      const subject = requiredText(data, 'subject');
      const story = await gateway.createStory({
        projectId,
        subject,
        description: optionalField(data, 'description', ensureText),
        status: optionalField(data, 'status', ensureStatusRef),
        tags: optionalField(data, 'tags', ensureList),
        assignedTo: optionalField(data, 'assigned_to', optionalInteger),
      });
      return { story };
    })
  );

  router.post(
    '/add_story_to_epic',
    action('add_story_to_epic', async (req) => {
      const data = body(req);
      const epicId = requiredInteger(data, 'epic_id');
      const userStoryId = requiredInteger(data, 'user_story_id');
      return { link: await gateway.addStoryToEpic(epicId, userStoryId) };
    })
  );

  router.post(
    '/update_story',
    action('update_story', async (req) => {
      const data = body(req);
      const storyId = requiredInteger(data, 'story_id');
      const story = await gateway.updateStory({
        id: storyId,
        version: optionalField(data, 'version', optionalInteger),
        changes: {
          project: optionalField(data, 'project_id', parseInteger),
          subject: optionalField(data, 'subject', ensureText),
          description: optionalField(data, 'description', ensureText),
          status: optionalField(data, 'status', ensureStatusRef),
          tags: optionalField(data, 'tags', ensureList),
          assigned_to: optionalField(data, 'assigned_to', optionalInteger),
          epic: optionalField(data, 'epic_id', optionalInteger),
          milestone: optionalField(data, 'milestone_id', optionalInteger),
          custom_attributes: optionalField(data, 'custom_attributes', ensureObject),
        },
      });
      return { story };
    })
  );

  router.post(
    '/delete_story',
    action('delete_story', async (req) => {
      const storyId = requiredInteger(body(req), 'story_id');
      await gateway.deleteStory(storyId);
      return { deleted: { story_id: storyId } };
    })
  );

  // ---------- Epics ----------

  router.post(
    '/create_epic',
    action('create_epic', async (req) => {
      const data = body(req);
      const projectId = requiredInteger(data, 'project_id');
      const subject = requiredText(data, 'subject');
      const epic = await gateway.createEpic({
        projectId,
        subject,
        description: optionalField(data, 'description', ensureText),
        status: optionalField(data, 'status', parseInteger),
        assignedTo: optionalField(data, 'assigned_to', optionalInteger),
        tags: optionalField(data, 'tags', ensureList),
        color: optionalField(data, 'color', ensureText),
      });
      return { epic };
    })
  );

  router.post(
    '/update_epic',
    action('update_epic', async (req) => {
      const data = body(req);
      const epicId = requiredInteger(data, 'epic_id');
      const epic = await gateway.updateEpic({
        id: epicId,
        version: optionalField(data, 'version', optionalInteger),
        changes: {
          subject: optionalField(data, 'subject', ensureText),
          description: optionalField(data, 'description', ensureText),
          status: optionalField(data, 'status', parseInteger),
          assigned_to: optionalField(data, 'assigned_to', optionalInteger),
          tags: optionalField(data, 'tags', ensureList),
          color: optionalField(data, 'color', ensureText),
        },
      });
      return { epic };
    })
  );

  router.post(
    '/delete_epic',
    action('delete_epic', async (req) => {
      const epicId = requiredInteger(body(req), 'epic_id');
      await gateway.deleteEpic(epicId);
      return { deleted: { epic_id: epicId } };
    })
  );

  // ---------- Tasks ----------

  router.post(
    '/create_task',
    action('create_task', async (req) => {
      const data = body(req);
      const subject = requiredText(data, 'subject');
      const task = await gateway.createTask({
        projectId: optionalField(data, 'project_id', optionalInteger),
        userStoryId: optionalField(data, 'user_story_id', optionalInteger),
        subject,
        description: optionalField(data, 'description', ensureText),
        status: optionalField(data, 'status', ensureStatusRef),
        assignedTo: optionalField(data, 'assigned_to', optionalInteger),
        tags: optionalField(data, 'tags', ensureList),
        dueDate: optionalField(data, 'due_date', ensureText),
        idempotencyKey: optionalField(data, 'idempotency_key', ensureText),
      });
      return { task };
    })
  );

  router.post(
    '/update_task',
    action('update_task', async (req) => {
      const data = body(req);
      const taskId = requiredInteger(data, 'task_id');
      const task = await gateway.updateTask({
        id: taskId,
        version: optionalField(data, 'version', optionalInteger),
        changes: {
          subject: optionalField(data, 'subject', ensureText),
          description: optionalField(data, 'description', ensureText),
          status: optionalField(data, 'status', ensureStatusRef),
          assigned_to: optionalField(data, 'assigned_to', optionalInteger),
          tags: optionalField(data, 'tags', ensureList),
          due_date: optionalField(data, 'due_date', ensureText),
          user_story: optionalField(data, 'user_story_id', optionalInteger),
        },
      });
      return { task };
    })
  );

  router.post(
    '/delete_task',
    action('delete_task', async (req) => {
      const taskId = requiredInteger(body(req), 'task_id');
      await gateway.deleteTask(taskId);
      return { deleted: { task_id: taskId } };
    })
  );

  // ---------- Issues ----------

  router.post(
    '/create_issue',
    action('create_issue', async (req) => {
      const data = body(req);
      const projectId = requiredInteger(data, 'project_id');
      const subject = requiredText(data, 'subject');
      const issue = await gateway.createIssue({
        projectId,
        subject,
        description: optionalField(data, 'description', ensureText),
        status: optionalField(data, 'status', parseInteger),
        priority: optionalField(data, 'priority', parseInteger),
        severity: optionalField(data, 'severity', parseInteger),
        issueType: optionalField(data, 'type', parseInteger),
        assignedTo: optionalField(data, 'assigned_to', optionalInteger),
        tags: optionalField(data, 'tags', ensureList),
      });
      return { issue };
    })
  );

  router.post(
    '/update_issue',
    action('update_issue', async (req) => {
      const data = body(req);
      const issueId = requiredInteger(data, 'issue_id');
      const issue = await gateway.updateIssue({
        id: issueId,
        version: optionalField(data, 'version', optionalInteger),
        changes: {
          subject: optionalField(data, 'subject', ensureText),
          description: optionalField(data, 'description', ensureText),
          status: optionalField(data, 'status', parseInteger),
          priority: optionalField(data, 'priority', parseInteger),
          severity: optionalField(data, 'severity', parseInteger),
          issue_type: optionalField(data, 'type', parseInteger),
          assigned_to: optionalField(data, 'assigned_to', optionalInteger),
          tags: optionalField(data, 'tags', ensureList),
        },
      });
      return { issue };
    })
  );

  router.post(
    '/delete_issue',
    action('delete_issue', async (req) => {
      const issueId = requiredInteger(body(req), 'issue_id');
      await gateway.deleteIssue(issueId);
      return { deleted: { issue_id: issueId } };
    })
  );

  router.use((_req, res) => {
    res.status(404).json({ error: 'Unknown action' });
  });
  router.use(jsonErrorHandler);

  return router;
}

function clientErrorStatus(err: Record<string, unknown>): number | undefined {
  const status = typeof err.status === 'number' ? err.status : err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Maps body-parser and other middleware failures to the action error envelope. */
export const jsonErrorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isRecord(err)) {
    if (err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'Request body must be valid JSON' });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== undefined && typeof err.message === 'string') {
      res.status(status).json({ error: err.message });
      return;
    }
  }
  logger.error('Unexpected error while reading action request', { path: req.path, error: describeError(err) }, 'actions');
  res.status(500).json({ error: 'Internal server error' });
};
