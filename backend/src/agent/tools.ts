import { z } from 'zod';
import { InvalidArgsError } from '../errors.js';
import { getFileDetails } from '../search/details.js';
import { FilterSearch } from '../search/filter.js';
import { KeywordSearch } from '../search/keyword.js';
import { SemanticSearch } from '../search/semantic.js';
import { VisualSearch } from '../search/visual.js';
import type { CatalogStore } from '../services/catalog.js';
import type { EmbeddingProvider } from '../services/embeddings.js';
import type { VectorIndex } from '../services/qdrant.js';
import type { ThumbnailResolver } from '../services/storage.js';
import { FILE_TYPES, GROUP_BY_DIMENSIONS } from '../types.js';
import { ToolRegistry } from './registry.js';

export interface CatalogToolDeps {
  catalog: CatalogStore;
  index: VectorIndex;
  embeddings: EmbeddingProvider;
  thumbnails: ThumbnailResolver;
}

export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 50;

const limitSchema = z.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT);

const limitParameter = {
  type: 'integer',
  minimum: 1,
  maximum: MAX_LIMIT,
  default: DEFAULT_LIMIT,
  description: 'Maximum number of results',
};

/** Registers every catalog tool. The set is closed: the loop sees nothing else. */
export function createCatalogTools(deps: CatalogToolDeps): ToolRegistry {
  const semantic = new SemanticSearch(deps.catalog, deps.index, deps.thumbnails);
  const visual = new VisualSearch(deps.catalog, deps.index, deps.thumbnails);
  const keyword = new KeywordSearch(deps.catalog, deps.thumbnails);
  const filter = new FilterSearch(deps.catalog, deps.thumbnails);

  return new ToolRegistry()
    .register({
      name: 'search_by_metadata_embedding',
      description:
        'Semantic search over file metadata (names, paths, shows). Use for finding files by description, ' +
        'concept or topic, e.g. "character models" or "lighting setups".',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'What to look for, in plain words' },
          limit: limitParameter,
        },
        required: ['query'],
        additionalProperties: false,
      },
      schema: z.object({ query: z.string().min(1), limit: limitSchema }),
      output: 'results',
      async execute({ query, limit }) {
        const vector = await deps.embeddings.embedText(query);
        return { kind: 'results', results: await semantic.search({ vector, limit }) };
      },
    })
    .register({
      name: 'search_by_visual_embedding',
      description:
        'Search images, videos and Blender scene renders by what they look like, from a text description ' +
        'such as "red car" or "sunset over water".',
      parameters: {
        type: 'object',
        properties: {
          description: { type: 'string', description: 'Visual description of the content' },
          limit: limitParameter,
        },
        required: ['description'],
        additionalProperties: false,
      },
      schema: z.object({ description: z.string().min(1), limit: limitSchema }),
      output: 'results',
      async execute({ description, limit }) {
        const vector = await deps.embeddings.embedTextForVisualSpace(description);
        return { kind: 'results', results: await visual.search({ vector, limit }) };
      },
    })
    .register({
      name: 'search_by_uploaded_image',
      description:
        'Find images, videos and scenes visually similar to the image the user attached to this message. ' +
        'Only usable when an image is attached.',
      parameters: {
        type: 'object',
        properties: { limit: limitParameter },
        additionalProperties: false,
      },
      schema: z.object({ limit: limitSchema }),
      output: 'results',
      async execute({ limit }, ctx) {
        if (!ctx.uploadedImage) {
          throw new InvalidArgsError('no image is attached to this message');
        }
        const vector = await deps.embeddings.embedImage(ctx.uploadedImage);
        return { kind: 'results', results: await visual.search({ vector, limit }) };
      },
    })
    .register({
      name: 'keyword_search',
      description:
        'Case-insensitive substring match on file names, paths and show names. Works without embeddings; ' +
        'use for exact names or when other searches fail.',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Literal text to find' },
          limit: limitParameter,
        },
        required: ['query'],
        additionalProperties: false,
      },
      schema: z.object({ query: z.string().trim().min(1), limit: limitSchema }),
      output: 'results',
      async execute({ query, limit }) {
        return { kind: 'results', results: await keyword.search({ query, limit }) };
      },
    })
    .register({
      name: 'filter_by_metadata',
      description:
        'Filter files by exact attributes: file type, minimum resolution, extension or show. ' +
        'e.g. 4K renders are min_resolution_x=3840 and min_resolution_y=2160. Newest first.',
      parameters: {
        type: 'object',
        properties: {
          file_type: { type: 'string', enum: [...FILE_TYPES] },
          min_resolution_x: { type: 'integer', minimum: 1, description: 'Minimum width in pixels' },
          min_resolution_y: { type: 'integer', minimum: 1, description: 'Minimum height in pixels' },
          extension: { type: 'string', description: 'File extension such as ".blend" or "png"' },
          show: { type: 'string', description: 'Show or project name' },
          limit: limitParameter,
        },
        additionalProperties: false,
      },
      schema: z.object({
        file_type: z.enum(FILE_TYPES).optional(),
        min_resolution_x: z.number().int().positive().optional(),
        min_resolution_y: z.number().int().positive().optional(),
        extension: z.string().trim().min(1).optional(),
        show: z.string().trim().min(1).optional(),
        limit: limitSchema,
      }),
      output: 'results',
      async execute(args) {
        return { kind: 'results', results: await filter.search(args) };
      },
    })
    .register({
      name: 'analytics_query',
      description: 'Count catalog files grouped by type, show or extension. Use for totals and statistics.',
      parameters: {
        type: 'object',
        properties: {
          group_by: { type: 'string', enum: [...GROUP_BY_DIMENSIONS], default: 'type' },
        },
        additionalProperties: false,
      },
      schema: z.object({ group_by: z.enum(GROUP_BY_DIMENSIONS).default('type') }),
      output: 'counts',
      async execute({ group_by }) {
        return { kind: 'counts', counts: deps.catalog.countBy(group_by) };
      },
    })
    .register({
      name: 'get_file_details',
      description: 'Full metadata of one file by its numeric id, as returned by the search tools.',
      parameters: {
        type: 'object',
        properties: {
          file_id: { type: 'integer', minimum: 1 },
        },
        required: ['file_id'],
        additionalProperties: false,
      },
      schema: z.object({ file_id: z.number().int().positive() }),
      output: 'details',
      async execute({ file_id }) {
        return { kind: 'details', details: getFileDetails(deps.catalog, deps.thumbnails, file_id) };
      },
    });
}
