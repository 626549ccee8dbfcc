import axios, { type AxiosInstance, type AxiosError, type AxiosResponse, type Method } from 'axios';
import { GatewayError, GatewayErrorType } from './errors.js';
import { logger } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import { isRecord, toInteger } from './utils.js';

// ============================================
// TYPES
// ============================================

/**
 * A project, epic, story, task, issue, user or milestone as returned by Taiga.
 * The shape varies per entity kind and per Taiga release, so it stays an open mapping.
 */
export type TaigaRecord = Record<string, unknown>;

/** A status given either as its numeric id or as a name/slug to resolve. */
export type StatusRef = number | string;

export type StatusKind = 'userstory' | 'task';

export type Pagination = Partial<Record<'page' | 'page_size' | 'total' | 'total_pages', number | string>>;

export interface TaskPage {
  tasks: TaigaRecord[];
  pagination: Pagination;
}

export interface UserStoryFilters {
  epic?: number;
  q?: string;
  tags?: string[];
  page?: number;
  pageSize?: number;
}

export interface TaskFilters {
  projectId?: number;
  userStoryId?: number;
  assignedTo?: number;
  search?: string;
  status?: number;
  page?: number;
  pageSize?: number;
}

export interface TaigaClientSettings {
  baseUrl?: string;
  username?: string;
  password?: string;
  timeoutMs: number;
}

export class TaigaApiError extends GatewayError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly payload?: unknown,
    public readonly detail?: string
  ) {
    super(GatewayErrorType.API_ERROR, message, 400);
    this.name = 'TaigaApiError';
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      status: this.statusCode,
    };
  }
}

/**
 * The operations handlers rely on. `TaigaClient` is the real implementation;
 * tests substitute an in-memory one.
 */
export interface TaigaApi {
  getCurrentUserId(): Promise<number>;

  listProjects(filters: Record<string, string>): Promise<TaigaRecord[]>;
  getProject(projectId: number): Promise<TaigaRecord>;
  getProjectBySlug(slug: string): Promise<TaigaRecord>;

  listEpics(projectId: number): Promise<TaigaRecord[]>;
  getEpic(epicId: number): Promise<TaigaRecord>;
  createEpic(payload: TaigaRecord): Promise<TaigaRecord>;
  updateEpic(epicId: number, payload: TaigaRecord): Promise<TaigaRecord>;
  deleteEpic(epicId: number): Promise<void>;
  linkEpicUserStory(epicId: number, userStoryId: number): Promise<TaigaRecord | null>;

  listUserStories(projectId: number, filters?: UserStoryFilters): Promise<TaigaRecord[]>;
  getUserStory(storyId: number): Promise<TaigaRecord>;
  createUserStory(payload: TaigaRecord): Promise<TaigaRecord>;
  updateUserStory(storyId: number, payload: TaigaRecord): Promise<TaigaRecord>;
  deleteUserStory(storyId: number): Promise<void>;

  listStatuses(kind: StatusKind, projectId: number): Promise<TaigaRecord[]>;

  listTasks(filters?: TaskFilters): Promise<TaskPage>;
  getTask(taskId: number): Promise<TaigaRecord>;
  createTask(payload: TaigaRecord): Promise<TaigaRecord>;
  updateTask(taskId: number, payload: TaigaRecord): Promise<TaigaRecord>;
  deleteTask(taskId: number): Promise<void>;

  getIssue(issueId: number): Promise<TaigaRecord>;
  createIssue(payload: TaigaRecord): Promise<TaigaRecord>;
  updateIssue(issueId: number, payload: TaigaRecord): Promise<TaigaRecord>;
  deleteIssue(issueId: number): Promise<void>;

  listUsers(filters?: { projectId?: number }): Promise<TaigaRecord[]>;
  listProjectUsers(projectId: number): Promise<TaigaRecord[]>;
  listMilestones(projectId: number): Promise<TaigaRecord[]>;
}

const STATUS_ENDPOINTS: Record<StatusKind, string> = {
  userstory: 'userstory-statuses',
  task: 'task-statuses',
};

const PAGINATION_HEADERS: Array<[string, keyof Pagination]> = [
  ['x-pagination-page', 'page'],
  ['x-pagination-page-size', 'page_size'],
  ['x-pagination-total', 'total'],
  ['x-pagination-pages', 'total_pages'],
];

function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new TaigaApiError(`Environment variable ${name} must be configured`);
  }
  return value;
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

function asRecord(data: unknown, context: string): TaigaRecord {
  if (!isRecord(data)) {
    throw new TaigaApiError(`Taiga API returned an unexpected response for ${context}`);
  }
  return data;
}

function asRecordList(data: unknown, context: string): TaigaRecord[] {
  if (!Array.isArray(data)) {
    throw new TaigaApiError(`Taiga API returned an unexpected response for ${context}`);
  }
  return data.filter(isRecord);
}

// ============================================
// TAIGA CLIENT
// ============================================

/**
 * Thin wrapper around Taiga's REST API. One instance per inbound request: it logs in
 * once and keeps the bearer token and user id for its own lifetime only.
 * Every call is a single attempt; failures surface as {@link TaigaApiError}.
 */
export class TaigaClient implements TaigaApi {
  private http: AxiosInstance;
  private username: string;
  private password: string;
  private authToken: string | null = null;
  private userId: number | null = null;

  constructor(private readonly settings: TaigaClientSettings) {
    const baseUrl = requireSetting(settings.baseUrl, 'TAIGA_BASE_URL').replace(/\/+$/, '');
    this.username = requireSetting(settings.username, 'TAIGA_USERNAME');
    this.password = requireSetting(settings.password, 'TAIGA_PASSWORD');

    this.http = axios.create({
      baseURL: baseUrl,
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      timeout: settings.timeoutMs,
    });

    setupLoggingMiddleware(this.http);

    this.http.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        throw this.handleAxiosError(error);
      }
    );
  }

  private handleAxiosError(error: unknown): TaigaApiError {
    if (error instanceof TaigaApiError) {
      return error;
    }
    if (!axios.isAxiosError(error)) {
      return new TaigaApiError(error instanceof Error ? error.message : String(error));
    }

    const axiosError: AxiosError = error;

    if (axiosError.code === 'ECONNABORTED' || axiosError.code === 'ETIMEDOUT') {
      return new TaigaApiError(`Taiga API request timed out after ${this.settings.timeoutMs}ms`);
    }

    if (!axiosError.response) {
      return new TaigaApiError(
        `Taiga API request failed: ${axiosError.message || 'network error'}`
      );
    }

    const status = axiosError.response.status;
    const detail = describeBody(axiosError.response.data);
    return new TaigaApiError(
      `Taiga API request failed with status ${status}: ${detail}`,
      status,
      axiosError.response.data,
      detail
    );
  }

  private async send(
    method: Method,
    path: string,
    options: { params?: URLSearchParams; data?: TaigaRecord } = {}
  ): Promise<AxiosResponse<unknown>> {
    return this.http.request<unknown>({
      method,
      url: path,
      params: options.params,
      data: options.data,
    });
  }

  private async getRecord(path: string, params?: URLSearchParams): Promise<TaigaRecord> {
    const response = await this.send('GET', path, { params });
    return asRecord(response.data, path);
  }

  private async getList(path: string, params?: URLSearchParams): Promise<TaigaRecord[]> {
    const response = await this.send('GET', path, { params });
    return asRecordList(response.data, path);
  }

  private async write(method: 'POST' | 'PATCH', path: string, payload: TaigaRecord): Promise<TaigaRecord> {
    const response = await this.send(method, path, { data: payload });
    return asRecord(response.data, path);
  }

  private async remove(path: string): Promise<void> {
    await this.send('DELETE', path);
  }

  // ============================================
  // AUTHENTICATION
  // ============================================

  async authenticate(): Promise<void> {
    if (this.authToken) return;

    let response: AxiosResponse<unknown>;
    try {
      response = await this.send('POST', 'auth', {
        data: { type: 'normal', username: this.username, password: this.password },
      });
    } catch (error) {
      if (error instanceof TaigaApiError && error.statusCode !== undefined) {
        throw new TaigaApiError(
          `Taiga authentication failed with status ${error.statusCode}: ${error.detail ?? ''}`,
          error.statusCode,
          error.payload,
          error.detail
        );
      }
      throw error;
    }

    const data = response.data;
    const token = isRecord(data) ? data.auth_token : undefined;
    if (typeof token !== 'string' || token === '') {
      throw new TaigaApiError('Taiga authentication response did not contain auth_token');
    }

    this.authToken = token;
    this.http.defaults.headers.common['Authorization'] = `Bearer ${token}`;
    this.userId = isRecord(data) ? toInteger(data.id) ?? null : null;

    logger.debug('Authenticated against Taiga', { user_id: this.userId }, 'taiga-client');
  }

  async getCurrentUserId(): Promise<number> {
    if (this.userId !== null) {
      return this.userId;
    }

    const me = await this.getRecord('users/me');
    const userId = toInteger(me.id);
    if (userId === undefined) {
      throw new TaigaApiError('Taiga API did not provide the authenticated user id');
    }
    this.userId = userId;
    return userId;
  }

  // ============================================
  // PROJECTS
  // ============================================

  async listProjects(filters: Record<string, string>): Promise<TaigaRecord[]> {
    return this.getList('projects', new URLSearchParams(filters));
  }

  async getProject(projectId: number): Promise<TaigaRecord> {
    return this.getRecord(`projects/${projectId}`);
  }

  async getProjectBySlug(slug: string): Promise<TaigaRecord> {
    return this.getRecord('projects/by_slug', new URLSearchParams({ slug }));
  }

  // ============================================
  // EPICS
  // ============================================

  async listEpics(projectId: number): Promise<TaigaRecord[]> {
    return this.getList('epics', new URLSearchParams({ project: String(projectId) }));
  }

  async getEpic(epicId: number): Promise<TaigaRecord> {
    return this.getRecord(`epics/${epicId}`);
  }

  async createEpic(payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('POST', 'epics', payload);
  }

  async updateEpic(epicId: number, payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('PATCH', `epics/${epicId}`, payload);
  }

  async deleteEpic(epicId: number): Promise<void> {
    await this.remove(`epics/${epicId}`);
  }

  async linkEpicUserStory(epicId: number, userStoryId: number): Promise<TaigaRecord | null> {
    const response = await this.send('POST', `epics/${epicId}/related_userstories`, {
      data: { epic: epicId, user_story: userStoryId },
    });
    return isRecord(response.data) ? response.data : null;
  }

  // ============================================
  // USER STORIES
  // ============================================

  async listUserStories(projectId: number, filters: UserStoryFilters = {}): Promise<TaigaRecord[]> {
    const params = new URLSearchParams({ project: String(projectId) });
    if (filters.epic !== undefined) params.append('epic', String(filters.epic));
    if (filters.q) params.append('q', filters.q);
    for (const tag of filters.tags ?? []) {
      params.append('tags', tag);
    }
    if (filters.page !== undefined) params.append('page', String(filters.page));
    if (filters.pageSize !== undefined) params.append('page_size', String(filters.pageSize));

    return this.getList('userstories', params);
  }

  async getUserStory(storyId: number): Promise<TaigaRecord> {
    return this.getRecord(`userstories/${storyId}`);
  }

  async createUserStory(payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('POST', 'userstories', payload);
  }

  async updateUserStory(storyId: number, payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('PATCH', `userstories/${storyId}`, payload);
  }

  async deleteUserStory(storyId: number): Promise<void> {
    await this.remove(`userstories/${storyId}`);
  }

  async listStatuses(kind: StatusKind, projectId: number): Promise<TaigaRecord[]> {
    return this.getList(STATUS_ENDPOINTS[kind], new URLSearchParams({ project: String(projectId) }));
  }

  // ============================================
  // TASKS
  // ============================================

  async listTasks(filters: TaskFilters = {}): Promise<TaskPage> {
    const params = new URLSearchParams();
    if (filters.projectId !== undefined) params.append('project', String(filters.projectId));
    if (filters.userStoryId !== undefined) params.append('user_story', String(filters.userStoryId));
    if (filters.assignedTo !== undefined) params.append('assigned_to', String(filters.assignedTo));
    if (filters.search) params.append('q', filters.search);
    if (filters.status !== undefined) params.append('status', String(filters.status));
    if (filters.page !== undefined) params.append('page', String(filters.page));
    if (filters.pageSize !== undefined) params.append('page_size', String(filters.pageSize));

    const response = await this.send('GET', 'tasks', { params });

    const pagination: Pagination = {};
    for (const [header, field] of PAGINATION_HEADERS) {
      const raw = response.headers[header];
      if (raw === undefined || raw === null) continue;
      const text = String(raw);
      const value = toInteger(text);
      // Leave unparseable values as-is for diagnostics
      pagination[field] = value ?? text;
    }

    const tasks = response.data === '' ? [] : asRecordList(response.data, 'tasks');
    return { tasks, pagination };
  }

  async getTask(taskId: number): Promise<TaigaRecord> {
    return this.getRecord(`tasks/${taskId}`);
  }

  async createTask(payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('POST', 'tasks', payload);
  }

  async updateTask(taskId: number, payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('PATCH', `tasks/${taskId}`, payload);
  }

  async deleteTask(taskId: number): Promise<void> {
    await this.remove(`tasks/${taskId}`);
  }

  // ============================================
  // ISSUES
  // ============================================

  async getIssue(issueId: number): Promise<TaigaRecord> {
    return this.getRecord(`issues/${issueId}`);
  }

  async createIssue(payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('POST', 'issues', payload);
  }

  async updateIssue(issueId: number, payload: TaigaRecord): Promise<TaigaRecord> {
    return this.write('PATCH', `issues/${issueId}`, payload);
  }

  async deleteIssue(issueId: number): Promise<void> {
    await this.remove(`issues/${issueId}`);
  }

  // ============================================
  // USERS & MILESTONES
  // ============================================

  async listUsers(filters: { projectId?: number } = {}): Promise<TaigaRecord[]> {
    const params = new URLSearchParams();
    if (filters.projectId !== undefined) params.append('project', String(filters.projectId));
    return this.getList('users', params);
  }

  async listProjectUsers(projectId: number): Promise<TaigaRecord[]> {
    return this.getList(`projects/${projectId}/users`);
  }

  async listMilestones(projectId: number): Promise<TaigaRecord[]> {
    return this.getList('milestones', new URLSearchParams({ project: String(projectId) }));
  }
}

/**
 * Runs `action` against a freshly authenticated client. A new client (and login) per call
 * keeps tokens out of shared state.
 */
export async function withTaigaClient<T>(
  settings: TaigaClientSettings,
  action: (client: TaigaApi) => Promise<T>
): Promise<T> {
  const client = new TaigaClient(settings);
  await client.authenticate();
  return action(client);
}
