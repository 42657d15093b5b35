import path from 'path';
import { CatalogValidationError } from '../errors.js';
import {
  FILE_TYPES,
  TEXT_EMBEDDING_DIM,
  VISUAL_EMBEDDING_DIM,
  isVisualKind,
  type AnalyticsResult,
  type CatalogEntry,
  type CatalogFile,
  type CatalogFileInput,
  type CatalogHit,
  type FileType,
  type GroupByDimension,
  type TypedExtension,
} from '../types.js';
import { getLogger } from './logger.js';
import type { VectorIndex } from './qdrant.js';
import type { Db } from './sqlite.js';

export interface FilterCriteria {
  file_type?: FileType;
  min_resolution_x?: number;
  min_resolution_y?: number;
  extension?: string;
  show?: string;
}

interface FileRow {
  id: number;
  file_name: string;
  file_path: string;
  extension: string;
  file_type: string;
  file_size: number;
  created_at: string;
  modified_at: string;
  scanned_at: string | null;
  show: string | null;
  has_embedding: number;
  error: string | null;
}

interface HitRow {
  file_id: number;
  file_name: string;
  file_path: string;
  file_type: string;
  extension: string;
  show: string | null;
  file_size: number;
  modified_at: string;
  width: number | null;
  height: number | null;
  thumbnail_path: string | null;
}

const EXTENSION_TABLES = [
  'images',
  'videos',
  'blend_files',
  'audio_files',
  'code_files',
  'spreadsheets',
  'documents',
] as const;

// Width/height come from whichever visual extension the file has; blend
// scenes store them as render resolution.
const HIT_SELECT = `
  SELECT
    f.id AS file_id,
    f.file_name,
    f.file_path,
    f.file_type,
    f.extension,
    f.show,
    f.file_size,
    f.modified_at,
    COALESCE(i.width, v.width, b.resolution_x) AS width,
    COALESCE(i.height, v.height, b.resolution_y) AS height,
    COALESCE(i.thumbnail_path, v.thumbnail_path, b.thumbnail_path) AS thumbnail_path
  FROM files f
  LEFT JOIN images i ON i.file_id = f.id
  LEFT JOIN videos v ON v.file_id = f.id
  LEFT JOIN blend_files b ON b.file_id = f.id
`;

export function toFileType(value: string): FileType {
  return FILE_TYPES.find((type) => type === value) ?? 'unknown';
}

export function normalizeExtension(value: string): string {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function toHit(row: HitRow): CatalogHit {
  return { ...row, file_type: toFileType(row.file_type) };
}

function toCatalogFile(row: FileRow): CatalogFile {
  return {
    ...row,
    file_type: toFileType(row.file_type),
    has_embedding: row.has_embedding === 1,
  };
}

function toIsoTimestamp(value: string, field: string): string {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new CatalogValidationError(`${field} is not a valid timestamp: ${value}`);
  }
  return parsed.toISOString();
}

/**
 * File metadata in SQLite plus the vectors that go with it in the index.
 * Reads are plain queries; writes keep both sides consistent per file.
 */
export class CatalogStore {
  private readonly log = getLogger('catalog');

  constructor(
    private readonly db: Db,
    private readonly index: VectorIndex
  ) {}

  async upsertFile(input: CatalogFileInput): Promise<CatalogEntry> {
    validateInput(input);

    const createdAt = toIsoTimestamp(input.created_at, 'created_at');
    const modifiedAt = toIsoTimestamp(input.modified_at, 'modified_at');
    const scannedAt = input.scanned_at ? toIsoTimestamp(input.scanned_at, 'scanned_at') : null;
    const hasEmbedding = Boolean(input.embedding);
    const hasVisual = Boolean(input.visual_embedding);

    const write = this.db.transaction(() => {
      this.db
        .prepare(`
          INSERT INTO files
            (id, file_name, file_path, extension, file_type, file_size,
             created_at, modified_at, scanned_at, show, has_embedding, error)
          VALUES
            (@id, @file_name, @file_path, @extension, @file_type, @file_size,
             @created_at, @modified_at, @scanned_at, @show, @has_embedding, @error)
          ON CONFLICT(id) DO UPDATE SET
            file_name = excluded.file_name,
            file_path = excluded.file_path,
            extension = excluded.extension,
            file_type = excluded.file_type,
            file_size = excluded.file_size,
            created_at = excluded.created_at,
            modified_at = excluded.modified_at,
            scanned_at = excluded.scanned_at,
            show = excluded.show,
            has_embedding = excluded.has_embedding,
            error = excluded.error
        `)
        .run({
          id: input.id,
          file_name: input.file_name,
          file_path: input.file_path,
          extension: normalizeExtension(path.extname(input.file_name)),
          file_type: input.file_type,
          file_size: input.file_size,
          created_at: createdAt,
          modified_at: modifiedAt,
          scanned_at: scannedAt,
          show: input.show?.trim() || null,
          has_embedding: hasEmbedding ? 1 : 0,
          error: input.error ?? null,
        });

      for (const table of EXTENSION_TABLES) {
        this.db.prepare(`DELETE FROM ${table} WHERE file_id = ?`).run(input.id);
      }

      if (input.media) {
        this.insertMedia(input.id, input.media, hasVisual);
      }
    });
    write();

    await this.index.deleteByFileId(input.id);
    if (input.embedding) {
      await this.index.upsert('text', [{ file_id: input.id, kind: input.file_type, vector: input.embedding }]);
    }
    if (input.visual_embedding) {
      await this.index.upsert('visual', [{ file_id: input.id, kind: input.file_type, vector: input.visual_embedding }]);
    }

    const entry = this.getEntry(input.id);
    if (!entry) {
      throw new Error(`file ${input.id} missing right after upsert`);
    }
    this.log.debug({ fileId: input.id, type: input.file_type, hasEmbedding, hasVisual }, 'Catalog file upserted');
    return entry;
  }

  async deleteFile(fileId: number): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM files WHERE id = ?').run(fileId);
    if (result.changes === 0) return false;

    await this.index.deleteByFileId(fileId);
    this.log.debug({ fileId }, 'Catalog file deleted');
    return true;
  }

  getEntry(fileId: number): CatalogEntry | null {
    const row = this.db.prepare('SELECT * FROM files WHERE id = ?').get(fileId) as FileRow | undefined;
    if (!row) return null;

    const file = toCatalogFile(row);
    const { media, hasVisual } = this.readMedia(file.file_type, file.id);
    return { file, media, has_visual_embedding: hasVisual };
  }

  /**
   * Look up hits by id. With `textEmbeddedOnly`, files lacking a usable
   * text embedding are left out.
   */
  getHits(ids: number[], options: { textEmbeddedOnly?: boolean } = {}): Map<number, CatalogHit> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return new Map();

    const placeholders = unique.map(() => '?').join(', ');
    const embeddedClause = options.textEmbeddedOnly ? 'AND f.has_embedding = 1 AND f.error IS NULL' : '';
    const rows = this.db
      .prepare(`${HIT_SELECT} WHERE f.id IN (${placeholders}) ${embeddedClause}`)
      .all(...unique) as HitRow[];

    return new Map(rows.map((row) => [row.file_id, toHit(row)]));
  }

  /** Case-insensitive literal substring match on name, path and show. */
  keywordSearch(query: string, limit: number): CatalogHit[] {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    // instr() keeps % and _ literal, unlike LIKE
    const rows = this.db
      .prepare(`
        ${HIT_SELECT}
        WHERE instr(casefold(f.file_name), @needle) > 0
           OR instr(casefold(f.file_path), @needle) > 0
           OR instr(casefold(COALESCE(f.show, '')), @needle) > 0
        ORDER BY f.modified_at DESC, f.id ASC
        LIMIT @limit
      `)
      .all({ needle, limit }) as HitRow[];

    return rows.map(toHit);
  }

  filterSearch(criteria: FilterCriteria, limit: number): CatalogHit[] {
    const clauses: string[] = [];
    const params: Record<string, string | number> = { limit };

    if (criteria.file_type) {
      clauses.push('f.file_type = @file_type');
      params.file_type = criteria.file_type;
    }
    if (criteria.min_resolution_x !== undefined) {
      clauses.push('COALESCE(i.width, v.width, b.resolution_x) >= @min_x');
      params.min_x = criteria.min_resolution_x;
    }
    if (criteria.min_resolution_y !== undefined) {
      clauses.push('COALESCE(i.height, v.height, b.resolution_y) >= @min_y');
      params.min_y = criteria.min_resolution_y;
    }
    if (criteria.extension) {
      clauses.push('f.extension = @extension');
      params.extension = normalizeExtension(criteria.extension);
    }
    if (criteria.show) {
      clauses.push('casefold(f.show) = @show');
      params.show = criteria.show.trim().toLowerCase();
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`${HIT_SELECT} ${where} ORDER BY f.modified_at DESC, f.id ASC LIMIT @limit`)
      .all(params) as HitRow[];

    return rows.map(toHit);
  }

  countBy(dimension: GroupByDimension): AnalyticsResult {
    const keyExpr: Record<GroupByDimension, string> = {
      type: 'file_type',
      show: "COALESCE(NULLIF(show, ''), 'other')",
      extension: "CASE WHEN extension = '' THEN '(none)' ELSE extension END",
    };

    const groups = this.db
      .prepare(`
        SELECT ${keyExpr[dimension]} AS key, COUNT(*) AS count
        FROM files
        GROUP BY key
        ORDER BY count DESC, key ASC
      `)
      .all() as Array<{ key: string; count: number }>;

    const { total } = this.db.prepare('SELECT COUNT(*) AS total FROM files').get() as { total: number };

    return { group_by: dimension, total, groups };
  }

  private insertMedia(fileId: number, media: TypedExtension, hasVisual: boolean): void {
    const visualFlag = hasVisual ? 1 : 0;
    switch (media.kind) {
      case 'image':
        this.db
          .prepare(`
            INSERT INTO images (file_id, width, height, color_space, thumbnail_path, has_visual_embedding)
            VALUES (?, ?, ?, ?, ?, ?)
          `)
          .run(fileId, media.width, media.height, media.color_space ?? null, media.thumbnail_path ?? null, visualFlag);
        return;
      case 'video':
        this.db
          .prepare(`
            INSERT INTO videos
              (file_id, width, height, duration_seconds, frame_rate, codec, thumbnail_path, has_visual_embedding)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
          `)
          .run(
            fileId,
            media.width,
            media.height,
            media.duration_seconds ?? null,
            media.frame_rate ?? null,
            media.codec ?? null,
            media.thumbnail_path ?? null,
            visualFlag
          );
        return;
      case 'blend':
        this.db
          .prepare(`
            INSERT INTO blend_files
              (file_id, resolution_x, resolution_y, render_engine, frame_start, frame_end,
               thumbnail_path, has_visual_embedding)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
          `)
          .run(
            fileId,
            media.resolution_x,
            media.resolution_y,
            media.render_engine ?? null,
            media.frame_start ?? null,
            media.frame_end ?? null,
            media.thumbnail_path ?? null,
            visualFlag
          );
        return;
      case 'audio':
        this.db
          .prepare(`
            INSERT INTO audio_files (file_id, duration_seconds, bitrate, sample_rate, channels)
            VALUES (?, ?, ?, ?, ?)
          `)
          .run(fileId, media.duration_seconds, media.bitrate ?? null, media.sample_rate ?? null, media.channels);
        return;
      case 'code':
        this.db
          .prepare('INSERT INTO code_files (file_id, language, line_count) VALUES (?, ?, ?)')
          .run(fileId, media.language, media.line_count);
        return;
      case 'spreadsheet':
        this.db
          .prepare('INSERT INTO spreadsheets (file_id, sheet_count, row_count) VALUES (?, ?, ?)')
          .run(fileId, media.sheet_count, media.row_count ?? null);
        return;
      case 'document':
        this.db
          .prepare('INSERT INTO documents (file_id, page_count, word_count) VALUES (?, ?, ?)')
          .run(fileId, media.page_count ?? null, media.word_count ?? null);
        return;
    }
  }

  private readMedia(fileType: FileType, fileId: number): { media: TypedExtension | null; hasVisual: boolean } {
    switch (fileType) {
      case 'image': {
        const row = this.db
          .prepare('SELECT width, height, color_space, thumbnail_path, has_visual_embedding FROM images WHERE file_id = ?')
          .get(fileId) as
          | { width: number; height: number; color_space: string | null; thumbnail_path: string | null; has_visual_embedding: number }
          | undefined;
        if (!row) return { media: null, hasVisual: false };
        const { has_visual_embedding, ...rest } = row;
        return { media: { kind: 'image', ...rest }, hasVisual: has_visual_embedding === 1 };
      }
      case 'video': {
        const row = this.db
          .prepare(`
            SELECT width, height, duration_seconds, frame_rate, codec, thumbnail_path, has_visual_embedding
            FROM videos WHERE file_id = ?
          `)
          .get(fileId) as
          | {
              width: number;
              height: number;
              duration_seconds: number | null;
              frame_rate: number | null;
              codec: string | null;
              thumbnail_path: string | null;
              has_visual_embedding: number;
            }
          | undefined;
        if (!row) return { media: null, hasVisual: false };
        const { has_visual_embedding, ...rest } = row;
        return { media: { kind: 'video', ...rest }, hasVisual: has_visual_embedding === 1 };
      }
      case 'blend': {
        const row = this.db
          .prepare(`
            SELECT resolution_x, resolution_y, render_engine, frame_start, frame_end, thumbnail_path, has_visual_embedding
            FROM blend_files WHERE file_id = ?
          `)
          .get(fileId) as
          | {
              resolution_x: number;
              resolution_y: number;
              render_engine: string | null;
              frame_start: number | null;
              frame_end: number | null;
              thumbnail_path: string | null;
              has_visual_embedding: number;
            }
          | undefined;
        if (!row) return { media: null, hasVisual: false };
        const { has_visual_embedding, ...rest } = row;
        return { media: { kind: 'blend', ...rest }, hasVisual: has_visual_embedding === 1 };
      }
      case 'audio': {
        const row = this.db
          .prepare('SELECT duration_seconds, bitrate, sample_rate, channels FROM audio_files WHERE file_id = ?')
          .get(fileId) as
          | { duration_seconds: number; bitrate: number | null; sample_rate: number | null; channels: number }
          | undefined;
        return { media: row ? { kind: 'audio', ...row } : null, hasVisual: false };
      }
      case 'code': {
        const row = this.db
          .prepare('SELECT language, line_count FROM code_files WHERE file_id = ?')
          .get(fileId) as { language: string; line_count: number } | undefined;
        return { media: row ? { kind: 'code', ...row } : null, hasVisual: false };
      }
      case 'spreadsheet': {
        const row = this.db
          .prepare('SELECT sheet_count, row_count FROM spreadsheets WHERE file_id = ?')
          .get(fileId) as { sheet_count: number; row_count: number | null } | undefined;
        return { media: row ? { kind: 'spreadsheet', ...row } : null, hasVisual: false };
      }
      case 'document': {
        const row = this.db
          .prepare('SELECT page_count, word_count FROM documents WHERE file_id = ?')
          .get(fileId) as { page_count: number | null; word_count: number | null } | undefined;
        return { media: row ? { kind: 'document', ...row } : null, hasVisual: false };
      }
      case 'unknown':
        return { media: null, hasVisual: false };
    }
  }
}

function validateInput(input: CatalogFileInput): void {
  if (!Number.isInteger(input.id) || input.id <= 0) {
    throw new CatalogValidationError(`file id must be a positive integer, got ${input.id}`);
  }
  if (!FILE_TYPES.includes(input.file_type)) {
    throw new CatalogValidationError(`unknown file type: ${String(input.file_type)}`);
  }
  if (!input.file_name.trim()) {
    throw new CatalogValidationError(`file ${input.id} has no name`);
  }

  const hasError = Boolean(input.error);
  const hasEmbedding = Boolean(input.embedding || input.visual_embedding);
  if (hasError && hasEmbedding) {
    throw new CatalogValidationError(`file ${input.id} has a scan error and must not carry an embedding`);
  }
  if (hasEmbedding && !input.scanned_at) {
    throw new CatalogValidationError(`file ${input.id} carries an embedding but was never scanned`);
  }
  if (input.embedding && input.embedding.length !== TEXT_EMBEDDING_DIM) {
    throw new CatalogValidationError(
      `file ${input.id} text embedding has ${input.embedding.length} dimensions, expected ${TEXT_EMBEDDING_DIM}`
    );
  }

  if (input.media) {
    if (input.file_type === 'unknown') {
      throw new CatalogValidationError(`file ${input.id} of unknown type cannot carry ${input.media.kind} metadata`);
    }
    if (input.media.kind !== input.file_type) {
      throw new CatalogValidationError(
        `file ${input.id} is a ${input.file_type} but carries ${input.media.kind} metadata`
      );
    }
  }

  if (input.visual_embedding) {
    if (!input.media || !isVisualKind(input.media.kind)) {
      throw new CatalogValidationError(`file ${input.id} needs image, video or blend metadata for a visual embedding`);
    }
    if (input.visual_embedding.length !== VISUAL_EMBEDDING_DIM) {
      throw new CatalogValidationError(
        `file ${input.id} visual embedding has ${input.visual_embedding.length} dimensions, expected ${VISUAL_EMBEDDING_DIM}`
      );
    }
  }
}
