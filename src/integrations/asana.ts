import { request, type Dispatcher } from 'undici';
import { z } from 'zod';

import { incExternalApiError } from '../metrics/metrics';

const ASANA_API_BASE = 'https://app.asana.com/api/1.0';

// Fields requested whenever a task is fetched for classification.
export const TASK_OPT_FIELDS = [
  'gid',
  'name',
  'notes',
  'permalink_url',
  'projects.gid',
  'custom_fields.gid',
  'custom_fields.name',
  'custom_fields.type',
  'custom_fields.resource_subtype',
  'custom_fields.text_value',
  'custom_fields.number_value',
  'custom_fields.enum_value.name',
  'custom_fields.multi_enum_values.name',
] as const;

const namedValueSchema = z.object({ name: z.string().nullish() });

// Asana sends many custom field shapes (date, people, ...); only the
// value holders we read are validated.
const rawCustomFieldSchema = z.object({
  gid: z.string().optional(),
  name: z.string().nullish(),
  type: z.string().nullish(),
  resource_subtype: z.string().nullish(),
  text_value: z.string().nullish(),
  number_value: z.number().nullish(),
  enum_value: namedValueSchema.nullish(),
  multi_enum_values: z.array(namedValueSchema).nullish(),
  enum_values: z.array(namedValueSchema).nullish(),
});

type RawCustomField = z.infer<typeof rawCustomFieldSchema>;

export type AsanaCustomField =
  | { type: 'text'; name: string; text_value: string | null }
  | { type: 'enum'; name: string; enum_value: string | null }
  | { type: 'multi_enum'; name: string; multi_enum_values: string[] }
  | { type: 'number'; name: string; number_value: number | null }
  | { type: 'unsupported'; name: string };

function optionNames(values: Array<z.infer<typeof namedValueSchema>> | null | undefined): string[] {
  return (values ?? []).map((v) => (v.name ?? '').trim()).filter((n) => n.length > 0);
}

function toCustomField(raw: RawCustomField): AsanaCustomField {
  const name = raw.name ?? '';
  switch (raw.type ?? raw.resource_subtype) {
    case 'text':
      return { type: 'text', name, text_value: raw.text_value ?? null };
    case 'enum':
      return { type: 'enum', name, enum_value: raw.enum_value?.name?.trim() || null };
    case 'multi_enum':
      return { type: 'multi_enum', name, multi_enum_values: optionNames(raw.multi_enum_values ?? raw.enum_values) };
    case 'number':
      return { type: 'number', name, number_value: raw.number_value ?? null };
    default:
      return { type: 'unsupported', name };
  }
}

const rawTaskSchema = z.object({
  gid: z.string(),
  name: z.string().nullish(),
  notes: z.string().nullish(),
  permalink_url: z.string().nullish(),
  projects: z.array(z.object({ gid: z.string() })).nullish(),
  custom_fields: z.array(rawCustomFieldSchema).nullish(),
});

export type AsanaTask = {
  gid: string;
  name: string;
  notes: string | null;
  permalink_url: string | null;
  projects: string[];
  custom_fields: AsanaCustomField[];
};

export function parseAsanaTask(raw: unknown): AsanaTask {
  const t = rawTaskSchema.parse(raw);
  return {
    gid: t.gid,
    name: t.name ?? '',
    notes: t.notes ?? null,
    permalink_url: t.permalink_url ?? null,
    projects: (t.projects ?? []).map((p) => p.gid),
    custom_fields: (t.custom_fields ?? []).map(toCustomField),
  };
}

export type AsanaComment = {
  gid: string;
  text: string;
};

export type AsanaSubtask = {
  gid: string;
  name: string;
};

/**
 * Upstream task operations the repair pipeline depends on.
 * `AsanaClient` is the production implementation; tests supply in-memory fakes.
 */
export interface AsanaTaskApi {
  getTask(taskGid: string, fields?: readonly string[]): Promise<AsanaTask>;
  createSubtask(parentGid: string, params: { name: string; projects?: string[] }): Promise<AsanaSubtask>;
  updateTask(taskGid: string, params: { name: string }): Promise<void>;
  createComment(taskGid: string, params: { text: string }): Promise<void>;
  listComments(taskGid: string): Promise<AsanaComment[]>;
  listTasks(projectGid: string, modifiedSince: Date): Promise<AsanaTask[]>;
}

export interface AsanaWebhookApi {
  createWebhook(params: {
    resourceGid: string;
    targetUrl: string;
    filters?: Array<{ resource_type: string; action: string }>;
  }): Promise<{ webhookGid: string }>;
}

export class AsanaApiError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly statusCode: number,
    readonly responseText: string,
  ) {
    super(`Asana API ${method} ${path} failed: ${statusCode} ${responseText}`);
    this.name = 'AsanaApiError';
  }
}

type HttpMethod = 'GET' | 'POST' | 'PUT';

const dataSchema = <T extends z.ZodTypeAny>(inner: T) => z.object({ data: inner });

const pageSchema = z.object({
  data: z.array(z.unknown()),
  next_page: z.object({ offset: z.string() }).nullish(),
});

const storySchema = z.object({
  gid: z.string(),
  text: z.string().nullish(),
  type: z.string().nullish(),
  resource_subtype: z.string().nullish(),
});

const PAGE_LIMIT = 100;

export class AsanaClient implements AsanaTaskApi, AsanaWebhookApi {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(
    private readonly pat: string,
    opts: { baseUrl?: string; dispatcher?: Dispatcher } = {},
  ) {
    this.baseUrl = opts.baseUrl ?? ASANA_API_BASE;
    this.dispatcher = opts.dispatcher;
  }

  private async asanaRequest<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.infer<S>> {
    const res = await request(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.pat}`,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      body: body ? JSON.stringify(body) : undefined,
      ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
    });

    const text = await res.body.text();
    if (res.statusCode < 200 || res.statusCode >= 300) {
      incExternalApiError('asana', res.statusCode);
      throw new AsanaApiError(method, path, res.statusCode, text);
    }

    return schema.parse(text ? JSON.parse(text) : {});
  }

  private async paginate<S extends z.ZodTypeAny>(path: string, item: S): Promise<Array<S['_output']>> {
    const out: Array<S['_output']> = [];
    const sep = path.includes('?') ? '&' : '?';
    let offset: string | null = null;

    do {
      const pagePath: string = `${path}${sep}limit=${PAGE_LIMIT}${offset ? `&offset=${encodeURIComponent(offset)}` : ''}`;
      const page: z.infer<typeof pageSchema> = await this.asanaRequest('GET', pagePath, pageSchema);
      for (const row of page.data) out.push(item.parse(row));
      offset = page.next_page?.offset ?? null;
    } while (offset);

    return out;
  }

  async getTask(taskGid: string, fields: readonly string[] = TASK_OPT_FIELDS): Promise<AsanaTask> {
    const res = await this.asanaRequest(
      'GET',
      `/tasks/${encodeURIComponent(taskGid)}?opt_fields=${fields.join(',')}`,
      dataSchema(z.unknown()),
    );
    return parseAsanaTask(res.data);
  }

  async createSubtask(parentGid: string, params: { name: string; projects?: string[] }): Promise<AsanaSubtask> {
    const res = await this.asanaRequest(
      'POST',
      `/tasks/${encodeURIComponent(parentGid)}/subtasks`,
      dataSchema(z.object({ gid: z.string(), name: z.string().nullish() })),
      {
        data: {
          name: params.name,
          ...(params.projects?.length ? { projects: params.projects } : {}),
        },
      },
    );
    return { gid: res.data.gid, name: res.data.name ?? params.name };
  }

  async updateTask(taskGid: string, params: { name: string }): Promise<void> {
    await this.asanaRequest('PUT', `/tasks/${encodeURIComponent(taskGid)}`, z.unknown(), { data: { name: params.name } });
  }

  async createComment(taskGid: string, params: { text: string }): Promise<void> {
    await this.asanaRequest('POST', `/tasks/${encodeURIComponent(taskGid)}/stories`, z.unknown(), {
      data: { text: params.text },
    });
  }

  async listComments(taskGid: string): Promise<AsanaComment[]> {
    const stories = await this.paginate(
      `/tasks/${encodeURIComponent(taskGid)}/stories?opt_fields=gid,text,type,resource_subtype`,
      storySchema,
    );
    return stories
      .filter((s) => s.resource_subtype === 'comment_added' || s.type === 'comment')
      .map((s) => ({ gid: s.gid, text: s.text ?? '' }));
  }

  async listTasks(projectGid: string, modifiedSince: Date): Promise<AsanaTask[]> {
    const rows = await this.paginate(
      `/tasks?project=${encodeURIComponent(projectGid)}&modified_since=${encodeURIComponent(modifiedSince.toISOString())}&opt_fields=${TASK_OPT_FIELDS.join(',')}`,
      z.unknown(),
    );
    return rows.map(parseAsanaTask);
  }

  async createWebhook(params: {
    resourceGid: string;
    targetUrl: string;
    filters?: Array<{ resource_type: string; action: string }>;
  }): Promise<{ webhookGid: string }> {
    const res = await this.asanaRequest(
      'POST',
      '/webhooks',
      dataSchema(z.object({ gid: z.string() })),
      {
        data: {
          resource: params.resourceGid,
          target: params.targetUrl,
          ...(params.filters ? { filters: params.filters } : {}),
        },
      },
    );
    return { webhookGid: res.data.gid };
  }
}
