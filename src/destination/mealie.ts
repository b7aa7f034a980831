import { z } from 'zod';
import type { Config } from '../shared/config.js';
import { DestinationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as defaultSleep, discardBody } from '../shared/utils.js';
import type { ConnectionInfo, CreateResult, RecipeDestination } from './types.js';

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const AboutSchema = z.object({ version: z.string().optional() }).passthrough();

const OrganizerSchema = z.object({ id: z.string(), name: z.string() }).passthrough();
type Organizer = z.infer<typeof OrganizerSchema>;

const OrganizerListSchema = z.union([
  z.array(OrganizerSchema),
  z.object({ items: z.array(OrganizerSchema) }).passthrough(),
]);

// create endpoints answer with the new slug as a bare JSON string on current
// servers, and with the recipe object on older ones
const CreatedSchema = z.union([
  z.string(),
  z
    .object({ slug: z.string().optional(), id: z.string().optional(), name: z.string().optional() })
    .passthrough(),
]);

const NamedSchema = z.object({ name: z.string() }).passthrough();
const RecipeOrganizersSchema = z
  .object({
    tags: z.array(NamedSchema).nullish(),
    recipeCategory: z.array(NamedSchema).nullish(),
  })
  .passthrough();

type OrganizerKind = 'tags' | 'categories';

/** A response read to the end within the request's deadline. */
interface Reply {
  status: number;
  statusText: string;
  ok: boolean;
  body: string;
}

type Outcome = { ok: true; reply: Reply } | { ok: false; error: string };

export interface MealieClientOptions {
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Mealie REST client. Transient failures (429/5xx, network) are retried with
 * exponential backoff; expected outcomes come back as CreateResult values.
 */
export class MealieClient implements RecipeDestination {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryBackoffMs: number;
  private readonly includeTags: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly organizerIds: Record<OrganizerKind, Map<string, string>> = {
    tags: new Map(),
    categories: new Map(),
  };

  constructor(config: Config['destination'], options: MealieClientOptions = {}) {
    this.baseUrl = config.base_url.replace(/\/+$/, '');
    this.apiToken = config.api_token;
    this.timeoutMs = config.timeout_ms;
    this.retries = config.retries;
    this.retryBackoffMs = config.retry_backoff_ms;
    this.includeTags = config.include_tags;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async checkConnection(): Promise<ConnectionInfo> {
    const outcome = await this.send('GET', '/api/app/about');
    if (!outcome.ok) {
      throw new DestinationError(`Cannot reach Mealie at ${this.baseUrl}: ${outcome.error}`);
    }
    const { reply } = outcome;
    if (!reply.ok) {
      throw new DestinationError(`Mealie at ${this.baseUrl} answered ${reply.status}`, reply.status);
    }

    const about = AboutSchema.safeParse(parseJson(reply.body));
    const version = about.success ? about.data.version ?? 'unknown' : 'unknown';
    logger.info({ version }, 'Connected to Mealie');
    return { version };
  }

  async createFromUrl(
    url: string,
    tags: readonly string[],
    categories: readonly string[],
  ): Promise<CreateResult> {
    const outcome = await this.send('POST', '/api/recipes/create/url', {
      url,
      includeTags: this.includeTags,
    });
    return this.toCreateResult(outcome, url, tags, categories, true);
  }

  async createFromRawContent(
    url: string,
    content: string,
    tags: readonly string[],
    categories: readonly string[],
  ): Promise<CreateResult> {
    const outcome = await this.send(
      'POST',
      '/api/recipes/create/html-or-json',
      { url, data: content, includeTags: this.includeTags },
      this.timeoutMs * 2,
    );
    return this.toCreateResult(outcome, url, tags, categories, false);
  }

  ensureTag(name: string): Promise<string | null> {
    return this.ensureOrganizer('tags', name);
  }

  ensureCategory(name: string): Promise<string | null> {
    return this.ensureOrganizer('categories', name);
  }

  private async toCreateResult(
    outcome: Outcome,
    url: string,
    tags: readonly string[],
    categories: readonly string[],
    queueable: boolean,
  ): Promise<CreateResult> {
    if (!outcome.ok) {
      return { kind: 'unavailable', reason: outcome.error };
    }

    const { reply } = outcome;
    if (reply.status === 201) {
      const created = CreatedSchema.safeParse(parseJson(reply.body));
      let slug = '';
      let name = '';
      if (created.success) {
        if (typeof created.data === 'string') {
          slug = created.data;
        } else {
          slug = created.data.slug ?? created.data.id ?? '';
          name = created.data.name ?? '';
        }
      }
      if (slug) {
        await this.mergeOrganizers(slug, tags, categories);
      }
      logger.debug({ url, slug }, 'Recipe created');
      return { kind: 'created', id: slug, name: name || slug };
    }

    if (reply.status === 202 && queueable) {
      return { kind: 'queued' };
    }

    if (reply.status === 409) {
      logger.info({ url }, 'Recipe already exists');
      return { kind: 'already_exists' };
    }

    const reason = reply.body.slice(0, 200) || reply.statusText || `HTTP ${reply.status}`;
    if (RETRYABLE_STATUSES.has(reply.status)) {
      return { kind: 'unavailable', reason: `HTTP ${reply.status}: ${reason}` };
    }
    logger.warn({ url, status: reply.status }, 'Recipe import rejected');
    return { kind: 'rejected', reason, status: reply.status };
  }

  private async ensureOrganizer(kind: OrganizerKind, name: string): Promise<string | null> {
    const key = name.toLowerCase();
    const cached = this.organizerIds[kind].get(key);
    if (cached) return cached;

    const found = await this.findOrganizer(kind, name);
    if (found) return found;

    const outcome = await this.send('POST', `/api/organizers/${kind}`, { name });
    if (!outcome.ok) {
      logger.warn({ kind, name, error: outcome.error }, 'Could not create organizer');
      return null;
    }

    const { reply } = outcome;
    if (reply.status === 409) {
      // created concurrently; look it up again
      return this.findOrganizer(kind, name);
    }
    if (!reply.ok) {
      logger.warn({ kind, name, status: reply.status }, 'Could not create organizer');
      return null;
    }

    const organizer = OrganizerSchema.safeParse(parseJson(reply.body));
    if (!organizer.success) return null;
    this.organizerIds[kind].set(key, organizer.data.id);
    logger.debug({ kind, name }, 'Organizer created');
    return organizer.data.id;
  }

  private async findOrganizer(kind: OrganizerKind, name: string): Promise<string | null> {
    const outcome = await this.send('GET', `/api/organizers/${kind}?search=${encodeURIComponent(name)}`);
    if (!outcome.ok || outcome.reply.status !== 200) return null;

    const parsed = OrganizerListSchema.safeParse(parseJson(outcome.reply.body));
    if (!parsed.success) return null;

    const items: Organizer[] = Array.isArray(parsed.data) ? parsed.data : parsed.data.items;
    const match = items.find((o) => o.name.toLowerCase() === name.toLowerCase());
    if (!match) return null;

    this.organizerIds[kind].set(name.toLowerCase(), match.id);
    return match.id;
  }

  /**
   * Add the tags and categories the recipe does not carry yet. Failures are
   * logged only: the recipe itself exists either way.
   */
  private async mergeOrganizers(
    slug: string,
    tags: readonly string[],
    categories: readonly string[],
  ): Promise<void> {
    if (tags.length === 0 && categories.length === 0) return;

    const path = `/api/recipes/${encodeURIComponent(slug)}`;
    const current = await this.send('GET', path);
    if (!current.ok || current.reply.status !== 200) return;

    const recipe = RecipeOrganizersSchema.safeParse(parseJson(current.reply.body));
    if (!recipe.success) return;

    const update: Record<string, unknown[]> = {};
    const newTags = await this.missingOrganizers('tags', recipe.data.tags ?? [], tags);
    if (newTags.length > 0) update.tags = [...(recipe.data.tags ?? []), ...newTags];
    const newCategories = await this.missingOrganizers(
      'categories',
      recipe.data.recipeCategory ?? [],
      categories,
    );
    if (newCategories.length > 0) {
      update.recipeCategory = [...(recipe.data.recipeCategory ?? []), ...newCategories];
    }

    if (Object.keys(update).length === 0) return;

    const patched = await this.send('PATCH', path, update);
    if (!patched.ok || !patched.reply.ok) {
      logger.warn({ slug }, 'Could not update recipe organizers');
    }
  }

  private async missingOrganizers(
    kind: OrganizerKind,
    existing: ReadonlyArray<{ name: string }>,
    wanted: readonly string[],
  ): Promise<Array<{ id: string; name: string }>> {
    const have = new Set(existing.map((o) => o.name.toLowerCase()));
    const added: Array<{ id: string; name: string }> = [];
    for (const name of wanted) {
      if (have.has(name.toLowerCase())) continue;
      const id = await this.ensureOrganizer(kind, name);
      if (id) {
        added.push({ id, name });
        have.add(name.toLowerCase());
      }
    }
    return added;
  }

  private async send(
    method: string,
    path: string,
    body?: unknown,
    timeoutMs = this.timeoutMs,
  ): Promise<Outcome> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiToken}`,
      'Accept-Language': 'en-US',
      Accept: 'application/json',
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    const attempts = this.retries + 1;
    let lastError = 'Unknown error';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        const response = await fetch(url, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        });

        if (RETRYABLE_STATUSES.has(response.status) && attempt < attempts) {
          await discardBody(response);
          clearTimeout(timer);
          logger.debug({ method, path, status: response.status, attempt }, 'Retrying Mealie request');
          await this.sleep(this.backoff(attempt));
          continue;
        }

        const text = await response.text();
        return {
          ok: true,
          reply: { status: response.status, statusText: response.statusText, ok: response.ok, body: text },
        };
      } catch (err) {
        const timedOut = err instanceof Error && err.name === 'AbortError';
        lastError = timedOut ? `timed out after ${timeoutMs}ms` : errorMessage(err);
        logger.debug({ method, path, attempt, error: lastError }, 'Mealie request failed');
        clearTimeout(timer);
        if (attempt < attempts) {
          await this.sleep(this.backoff(attempt));
        }
      } finally {
        clearTimeout(timer);
      }
    }

    return { ok: false, error: lastError };
  }

  private backoff(attempt: number): number {
    return this.retryBackoffMs * Math.pow(2, attempt - 1);
  }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}
