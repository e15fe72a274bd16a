import * as z from 'zod/v4';
import type { AppConfig } from './config.js';
import { ArchiveApiError, errorMessage, serializeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import {
  AccessionDetailSchema,
  AccessionPageSchema,
  SubjectPageSchema,
  SubjectSchema,
} from './models.js';
import type {
  AccessionDetail,
  AccessionPage,
  AccessionPatch,
  AccessionQuery,
  AccessionScope,
  DeletedSubject,
  MetadataLanguage,
  PageQuery,
  Subject,
  SubjectInput,
  SubjectPage,
} from './models.js';

export const API_KEY_HEADER = 'x-api-key';

const ERROR_TEXT_LIMIT = 500;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
export type QueryEntries = Array<[string, string]>;
type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface RequestOptions {
  query?: QueryEntries;
  body?: unknown;
}

interface RawResponse {
  status: number;
  statusText: string;
  ok: boolean;
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

function tryParseJson(text: string): unknown {
  if (text.trim().length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractErrorCode(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }

  const nestedError = body.error;
  if (isRecord(nestedError) && typeof nestedError.code === 'string') {
    return nestedError.code;
  }

  if (typeof body.code === 'string') {
    return body.code;
  }

  return undefined;
}

function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }

  const nestedError = body.error;
  if (isRecord(nestedError) && typeof nestedError.message === 'string') {
    return nestedError.message;
  }

  for (const key of ['message', 'error', 'detail']) {
    const value = body[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }

  return undefined;
}

function statusLine(raw: RawResponse): string {
  return raw.statusText ? `HTTP ${raw.status} ${raw.statusText}` : `HTTP ${raw.status}`;
}

function toStatusError(raw: RawResponse): ArchiveApiError {
  const body = tryParseJson(raw.text);
  const plainText = body === undefined ? raw.text.trim() : '';
  const message =
    extractErrorMessage(body) ??
    (plainText.length > 0 ? plainText.slice(0, ERROR_TEXT_LIMIT) : `Archive API request failed with ${statusLine(raw)}.`);

  return new ArchiveApiError(message, 'http_status', raw.status, extractErrorCode(body), body);
}

function pushText(entries: QueryEntries, key: string, value: string | undefined): void {
  if (value !== undefined) {
    entries.push([key, value]);
  }
}

function pushNumber(entries: QueryEntries, key: string, value: number | undefined): void {
  if (value !== undefined) {
    entries.push([key, String(value)]);
  }
}

export function buildPageQuery(query: PageQuery): QueryEntries {
  const entries: QueryEntries = [];
  pushNumber(entries, 'page', query.page);
  pushNumber(entries, 'per_page', query.per_page);
  return entries;
}

/** Query string entries for accession listing; repeated keys carry list values. */
export function buildAccessionQuery(query: AccessionQuery): QueryEntries {
  const entries = buildPageQuery(query);
  pushText(entries, 'lang', query.lang);
  for (const subjectId of query.metadata_subjects ?? []) {
    entries.push(['metadata_subjects', String(subjectId)]);
  }
  if (query.metadata_subjects_inclusive_filter) {
    entries.push(['metadata_subjects_inclusive_filter', 'true']);
  }
  pushText(entries, 'query_term', query.query_term);
  pushText(entries, 'url_filter', query.url_filter);
  pushText(entries, 'date_from', query.date_from);
  pushText(entries, 'date_to', query.date_to);
  return entries;
}

function accessionsPath(scope: AccessionScope): string {
  return scope === 'private' ? '/api/v1/accessions/private' : '/api/v1/accessions';
}

/**
 * Thin client over the archive REST API. Every method issues exactly one request
 * and either resolves with a shape-checked value or rejects with an {@link ArchiveApiError}.
 */
export class ArchiveApiClient {
  constructor(
    private readonly config: AppConfig,
    private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init),
    private readonly logger: Logger = silentLogger,
  ) {}

  private buildUrl(path: string, query: QueryEntries = []): string {
    const url = new URL(`${this.config.apiBaseUrl}${path}`);
    for (const [key, value] of query) {
      url.searchParams.append(key, value);
    }
    return url.toString();
  }

  private async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<RawResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      [API_KEY_HEADER]: this.config.apiKey,
    };
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    // The timer also covers reading the body.
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    const startedAt = Date.now();

    let raw: RawResponse;
    try {
      const response = await this.fetchImpl(this.buildUrl(path, options.query), {
        ...init,
        signal: controller.signal,
      });
      raw = {
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        text: await response.text(),
      };
    } catch (error) {
      const message = isAbortError(error)
        ? `${method} ${path} timed out after ${this.config.requestTimeoutMs} ms.`
        : `Failed to reach archive API at ${this.config.apiBaseUrl}: ${errorMessage(error)}`;
      this.logger.warn('archive request failed', { method, path, durationMs: Date.now() - startedAt, reason: message });
      throw new ArchiveApiError(message, 'transport', undefined, undefined, serializeError(error));
    } finally {
      clearTimeout(timer);
    }

    this.logger.debug('archive request completed', {
      method,
      path,
      status: raw.status,
      durationMs: Date.now() - startedAt,
    });

    if (!raw.ok) {
      throw toStatusError(raw);
    }

    return raw;
  }

  private decode<TData>(raw: RawResponse, schema: z.ZodType<TData>, operation: string): TData {
    let body: unknown;
    try {
      body = JSON.parse(raw.text);
    } catch {
      throw new ArchiveApiError(
        `Archive API response for ${operation} is not valid JSON.`,
        'decode',
        raw.status,
        undefined,
        { preview: raw.text.slice(0, ERROR_TEXT_LIMIT) },
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new ArchiveApiError(
        `Archive API response for ${operation} has an unexpected shape: ${z.prettifyError(result.error)}`,
        'decode',
        raw.status,
        undefined,
        result.error.issues,
      );
    }

    return result.data;
  }

  async listAccessions(query: AccessionQuery, scope: AccessionScope = 'public'): Promise<AccessionPage> {
    const raw = await this.send('GET', accessionsPath(scope), { query: buildAccessionQuery(query) });
    return this.decode(raw, AccessionPageSchema, 'accession list');
  }

  async getAccession(id: string, scope: AccessionScope = 'public'): Promise<AccessionDetail> {
    const raw = await this.send('GET', `${accessionsPath(scope)}/${encodeURIComponent(id)}`);
    return this.decode(raw, AccessionDetailSchema, 'accession');
  }

  async updateAccession(id: string, patch: AccessionPatch): Promise<AccessionDetail> {
    const raw = await this.send('PUT', `/api/v1/accessions/${encodeURIComponent(id)}`, { body: patch });
    return this.decode(raw, AccessionDetailSchema, 'accession update');
  }

  async listSubjects(query: PageQuery): Promise<SubjectPage> {
    const raw = await this.send('GET', '/api/v1/metadata-subjects', { query: buildPageQuery(query) });
    return this.decode(raw, SubjectPageSchema, 'subject list');
  }

  async createSubject(input: SubjectInput): Promise<Subject> {
    const body = input.lang
      ? { label: input.label, visibility: input.visibility, lang: input.lang }
      : { label: input.label, visibility: input.visibility };
    const raw = await this.send('POST', '/api/v1/metadata-subjects', { body });
    return this.decode(raw, SubjectSchema, 'created subject');
  }

  async deleteSubject(id: string, lang?: MetadataLanguage): Promise<DeletedSubject> {
    await this.send('DELETE', `/api/v1/metadata-subjects/${encodeURIComponent(id)}`, {
      body: lang ? { lang } : undefined,
    });
    return { id, deleted: true };
  }
}
