import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod/v4';
import { ArchiveApiError, ValidationError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

const RESULT_TEXT_LIMIT = 25000;
const STRUCTURED_DATA_PREVIEW_LIMIT = 4000;
const ERROR_DETAILS_LIMIT = 4000;
const TRUNCATION_NOTICE = 'Use a smaller per_page or narrower filters for complete output.';

const TruncatedStructuredDataSchema = z
  .object({
    _truncated: z.literal(true),
    notice: z.string(),
    preview: z.string(),
    originalLength: z.number().int().nonnegative(),
  })
  .strict();

type TruncatedStructuredData = z.infer<typeof TruncatedStructuredDataSchema>;
type ToolOutput<TData = unknown> = {
  ok: true;
  operation: string;
  data: TData | TruncatedStructuredData;
  truncated?: boolean;
};

export type ToolErrorKind = 'validation' | 'transport' | 'remote_status' | 'decode' | 'internal';

export interface ToolErrorPayload {
  kind: ToolErrorKind;
  message: string;
  status?: number;
  code?: string;
  field?: string;
}

export const ReadOnlyAnnotations: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

export const MutationAnnotations: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

export const DestructiveAnnotations: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  idempotentHint: false,
  openWorldHint: true,
};

function createToolOutputSchema<TDataSchema extends z.ZodTypeAny>(dataSchema: TDataSchema) {
  return z
    .object({
      ok: z.literal(true),
      operation: z.string(),
      data: z.union([dataSchema, TruncatedStructuredDataSchema]),
      truncated: z.boolean().optional(),
    })
    .strict();
}

export function stringify(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
}

function truncateText(value: string): { text: string; truncated: boolean } {
  if (value.length <= RESULT_TEXT_LIMIT) {
    return { text: value, truncated: false };
  }

  return {
    text: `${value.slice(0, RESULT_TEXT_LIMIT)}\n\n[truncated] ${TRUNCATION_NOTICE}`,
    truncated: true,
  };
}

function truncateErrorDetails(details: unknown): string {
  const rendered = stringify(details);
  if (rendered.length <= ERROR_DETAILS_LIMIT) {
    return rendered;
  }

  return `${rendered.slice(0, ERROR_DETAILS_LIMIT)}\n...[details truncated]`;
}

function formatIssues(error: z.ZodError): { message: string; field?: string } {
  const messages = error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  const firstPath = error.issues[0]?.path.map(String).join('.');

  return {
    message: `Invalid arguments. ${messages.join('; ')}`,
    field: firstPath || undefined,
  };
}

/**
 * Input schema handed to the MCP server. It advertises the tool's JSON schema but accepts
 * any object, so argument checking happens once, in {@link parseToolArgs}.
 */
export function advertisedInputSchema(inputSchema: z.ZodTypeAny) {
  const { $schema: _dialect, ...jsonSchema } = z.toJSONSchema(inputSchema, { io: 'input' });
  return z.looseObject({}).meta(jsonSchema);
}

export function parseToolArgs<TInputSchema extends z.ZodTypeAny>(
  schema: TInputSchema,
  rawArgs: unknown,
): z.infer<TInputSchema> {
  const result = schema.safeParse(rawArgs ?? {});
  if (!result.success) {
    const { message, field } = formatIssues(result.error);
    throw new ValidationError(message, field);
  }
  return result.data;
}

function toolSpecificHint(operation: string, error: ArchiveApiError): string | undefined {
  if (error.origin !== 'http_status') {
    return undefined;
  }

  if (error.status === 401 || error.status === 403) {
    return 'Check that the configured API key is valid and allowed to perform this operation.';
  }

  if (error.status !== 404) {
    return undefined;
  }

  switch (operation) {
    case 'get_accession':
    case 'update_accession':
      return 'Private accessions are only visible through get_private_accession and list_private_accessions.';
    case 'get_private_accession':
      return 'Public accessions are only visible through get_accession and list_accessions.';
    case 'delete_subject':
      return 'Use list_subjects to find the IDs of existing subjects.';
    default:
      return undefined;
  }
}

export function describeError(error: unknown): ToolErrorPayload {
  if (error instanceof ValidationError) {
    return error.field
      ? { kind: 'validation', message: error.message, field: error.field }
      : { kind: 'validation', message: error.message };
  }

  if (error instanceof ArchiveApiError) {
    const kind: ToolErrorKind =
      error.origin === 'http_status' ? 'remote_status' : error.origin === 'decode' ? 'decode' : 'transport';
    const payload: ToolErrorPayload = { kind, message: error.message };
    if (error.status !== undefined) {
      payload.status = error.status;
    }
    if (error.code) {
      payload.code = error.code;
    }
    return payload;
  }

  if (error instanceof Error) {
    return { kind: 'internal', message: error.message };
  }

  return { kind: 'internal', message: stringify(error) };
}

export function successResult<TData>(operation: string, data: TData): CallToolResult {
  const fullPayload: ToolOutput<TData> = {
    ok: true,
    operation,
    data,
  };
  const fullText = stringify(fullPayload);
  const rendered = truncateText(fullText);

  let structuredPayload: ToolOutput<TData> = fullPayload;
  if (rendered.truncated) {
    const dataText = stringify(data);
    structuredPayload = {
      ok: true,
      operation,
      truncated: true,
      data: {
        _truncated: true,
        notice: TRUNCATION_NOTICE,
        preview: dataText.slice(0, STRUCTURED_DATA_PREVIEW_LIMIT),
        originalLength: dataText.length,
      },
    };
  }

  return {
    content: [{ type: 'text', text: rendered.text }],
    structuredContent: structuredPayload,
  };
}

export function errorResult(operation: string, error: unknown): CallToolResult {
  const payload = describeError(error);
  const status = payload.status !== undefined ? ` (HTTP ${payload.status})` : '';
  const code = payload.code ? ` [${payload.code}]` : '';

  let text = `${operation} failed${status}${code}: ${payload.message}`;
  if (error instanceof ArchiveApiError) {
    const hint = toolSpecificHint(operation, error);
    if (hint) {
      text += `\nHint: ${hint}`;
    }
    if (error.details !== undefined) {
      text += `\nDetails: ${truncateErrorDetails(error.details)}`;
    }
  }

  return {
    isError: true,
    content: [{ type: 'text', text }],
    structuredContent: { ok: false, operation, error: payload },
  };
}

export interface ToolConfig<TInputSchema extends z.ZodTypeAny, TOutputDataSchema extends z.ZodTypeAny> {
  title: string;
  description: string;
  inputSchema: TInputSchema;
  outputDataSchema: TOutputDataSchema;
  annotations: ToolAnnotations;
}

export interface ToolSummary {
  name: string;
  title: string;
  description: string;
  annotations: ToolAnnotations;
}

interface RegisteredTool extends ToolSummary {
  inputSchema: z.ZodTypeAny;
  outputSchema: z.ZodTypeAny;
  run(rawArgs: unknown): Promise<unknown>;
}

/**
 * Catalogue of invocable tools, built once at startup.
 *
 * `dispatch` is the single pipeline every tool goes through: parse the raw arguments
 * against the tool's input schema, run the handler (normalize, then call the archive),
 * and wrap the outcome. Failures resolve with an error envelope; it never rejects.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(private readonly logger: Logger = silentLogger) {}

  define<TInputSchema extends z.ZodTypeAny, TOutputDataSchema extends z.ZodTypeAny>(
    name: string,
    config: ToolConfig<TInputSchema, TOutputDataSchema>,
    handler: (args: z.infer<TInputSchema>) => Promise<unknown>,
  ): void {
    if (this.tools.has(name)) {
      throw new Error(`Tool "${name}" is already registered.`);
    }

    this.tools.set(name, {
      name,
      title: config.title,
      description: config.description,
      annotations: config.annotations,
      inputSchema: config.inputSchema,
      outputSchema: createToolOutputSchema(config.outputDataSchema),
      run: async (rawArgs) => handler(parseToolArgs(config.inputSchema, rawArgs)),
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolSummary[] {
    return [...this.tools.values()].map(({ name, title, description, annotations }) => ({
      name,
      title,
      description,
      annotations,
    }));
  }

  /** Throws unless exactly the expected tool names are registered. */
  assertCatalogue(expected: readonly string[]): void {
    const missing = expected.filter((name) => !this.tools.has(name));
    const unexpected = this.names().filter((name) => !expected.includes(name));
    if (missing.length > 0 || unexpected.length > 0) {
      throw new Error(
        `Tool catalogue mismatch. Missing: [${missing.join(', ')}]. Unexpected: [${unexpected.join(', ')}].`,
      );
    }
  }

  async dispatch(name: string, rawArgs: unknown): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return errorResult(name, new Error(`Unknown tool "${name}".`));
    }

    const startedAt = Date.now();
    try {
      const data = await tool.run(rawArgs);
      this.logger.debug('tool call succeeded', { tool: name, durationMs: Date.now() - startedAt });
      return successResult(name, data);
    } catch (error) {
      const payload = describeError(error);
      const fields = {
        tool: name,
        kind: payload.kind,
        status: payload.status,
        reason: payload.message,
        durationMs: Date.now() - startedAt,
      };
      if (payload.kind === 'internal') {
        this.logger.error('tool call failed', fields);
      } else {
        this.logger.warn('tool call failed', fields);
      }
      return errorResult(name, error);
    }
  }

  /** Exposes every registered tool on an MCP server, routing calls through {@link dispatch}. */
  attach(server: McpServer): void {
    const register = server.registerTool.bind(server) as (
      toolName: string,
      toolConfig: {
        title: string;
        description: string;
        inputSchema: z.ZodTypeAny;
        outputSchema: z.ZodTypeAny;
        annotations: ToolAnnotations;
      },
      toolHandler: (args: unknown, extra: unknown) => Promise<CallToolResult>,
    ) => void;

    for (const tool of this.tools.values()) {
      register(
        tool.name,
        {
          title: tool.title,
          description: tool.description,
          inputSchema: advertisedInputSchema(tool.inputSchema),
          outputSchema: tool.outputSchema,
          annotations: tool.annotations,
        },
        async (args) => this.dispatch(tool.name, args),
      );
    }
  }
}
