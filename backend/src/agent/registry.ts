import type { z } from 'zod';
import { EmbeddingFailure, InvalidArgsError, NotFoundError, errorMessage } from '../errors.js';
import { getLogger } from '../services/logger.js';
import type { AnalyticsResult, FileDetails, SearchResult, ToolErrorKind } from '../types.js';

export interface ToolContext {
  /** Bytes of the image attached to the current request, if any. */
  uploadedImage: Buffer | null;
}

export type ToolData =
  | { kind: 'results'; results: SearchResult[] }
  | { kind: 'counts'; counts: AnalyticsResult }
  | { kind: 'details'; details: FileDetails };

export type ToolOutcome =
  | { ok: true; data: ToolData }
  | { ok: false; errorKind: ToolErrorKind; message: string };

/** JSON schema of a tool's arguments as shown to the decision model. */
export type ToolParameters = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  additionalProperties?: boolean;
};

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: ToolParameters;
  schema: S;
  output: ToolData['kind'];
  execute(args: z.output<S>, ctx: ToolContext): Promise<ToolData>;
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: ToolParameters;
  output: ToolData['kind'];
}

interface RegisteredTool extends ToolSpec {
  run(rawArgs: unknown, ctx: ToolContext): Promise<ToolOutcome>;
}

export function resultCount(data: ToolData): number {
  switch (data.kind) {
    case 'results':
      return data.results.length;
    case 'counts':
      return data.counts.groups.length;
    case 'details':
      return 1;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function toFailure(err: unknown): ToolOutcome {
  if (err instanceof InvalidArgsError) {
    return { ok: false, errorKind: 'InvalidArgs', message: err.message };
  }
  if (err instanceof NotFoundError) {
    return { ok: false, errorKind: 'NotFound', message: err.message };
  }
  if (err instanceof EmbeddingFailure) {
    return {
      ok: false,
      errorKind: 'ExecutionError',
      message: `${err.message}; keyword_search does not need embeddings`,
    };
  }
  return { ok: false, errorKind: 'ExecutionError', message: errorMessage(err) };
}

/**
 * Static table of the tools the reasoning loop may call. Built once at
 * startup; the loop only ever sees names, schemas and outcomes.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly log = getLogger('tools');

  register<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`tool ${definition.name} is already registered`);
    }

    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      parameters: definition.parameters,
      output: definition.output,
      run: async (rawArgs, ctx) => {
        const parsed = definition.schema.safeParse(rawArgs ?? {});
        if (!parsed.success) {
          return { ok: false, errorKind: 'InvalidArgs', message: formatIssues(parsed.error) };
        }
        try {
          return { ok: true, data: await definition.execute(parsed.data, ctx) };
        } catch (err) {
          return toFailure(err);
        }
      },
    });
    return this;
  }

  list(): ToolSpec[] {
    return [...this.tools.values()].map(({ name, description, parameters, output }) => ({
      name,
      description,
      parameters,
      output,
    }));
  }

  async invoke(name: string, args: unknown, ctx: ToolContext): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, errorKind: 'NotFound', message: `unknown tool: ${name}` };
    }

    const started = Date.now();
    const outcome = await tool.run(args, ctx);
    if (outcome.ok) {
      this.log.debug({ tool: name, count: resultCount(outcome.data), ms: Date.now() - started }, 'Tool succeeded');
    } else {
      this.log.warn({ tool: name, errorKind: outcome.errorKind, ms: Date.now() - started }, outcome.message);
    }
    return outcome;
  }
}
