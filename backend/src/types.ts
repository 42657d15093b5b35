import { z } from 'zod';

export const FILE_TYPES = ['image', 'video', 'blend', 'audio', 'code', 'spreadsheet', 'document', 'unknown'] as const;
export type FileType = (typeof FILE_TYPES)[number];

export const VISUAL_KINDS = ['image', 'video', 'blend'] as const;
export type VisualKind = (typeof VISUAL_KINDS)[number];

export const TEXT_EMBEDDING_DIM = 384;
export const VISUAL_EMBEDDING_DIM = 512;

export function isVisualKind(value: string): value is VisualKind {
  return (VISUAL_KINDS as readonly string[]).includes(value);
}

export interface CatalogFile {
  id: number;
  file_name: string;
  file_path: string;
  extension: string;
  file_type: FileType;
  file_size: number;
  created_at: string;
  modified_at: string;
  scanned_at: string | null;
  show: string | null;
  has_embedding: boolean;
  error: string | null;
}

// Per-kind metadata, one row per file in the matching extension table.
export interface ImageInfo {
  kind: 'image';
  width: number;
  height: number;
  color_space?: string | null;
  thumbnail_path?: string | null;
}

export interface VideoInfo {
  kind: 'video';
  width: number;
  height: number;
  duration_seconds?: number | null;
  frame_rate?: number | null;
  codec?: string | null;
  thumbnail_path?: string | null;
}

export interface BlendInfo {
  kind: 'blend';
  resolution_x: number;
  resolution_y: number;
  render_engine?: string | null;
  frame_start?: number | null;
  frame_end?: number | null;
  thumbnail_path?: string | null;
}

export interface AudioInfo {
  kind: 'audio';
  duration_seconds: number;
  bitrate?: number | null;
  sample_rate?: number | null;
  channels: number;
}

export interface CodeInfo {
  kind: 'code';
  language: string;
  line_count: number;
}

export interface SpreadsheetInfo {
  kind: 'spreadsheet';
  sheet_count: number;
  row_count?: number | null;
}

export interface DocumentInfo {
  kind: 'document';
  page_count?: number | null;
  word_count?: number | null;
}

export type VisualExtension = ImageInfo | VideoInfo | BlendInfo;
export type TypedExtension = VisualExtension | AudioInfo | CodeInfo | SpreadsheetInfo | DocumentInfo;

export interface CatalogFileInput {
  id: number;
  file_name: string;
  file_path: string;
  file_type: FileType;
  file_size: number;
  created_at: string;
  modified_at: string;
  scanned_at?: string | null;
  show?: string | null;
  error?: string | null;
  embedding?: number[] | null;
  media?: TypedExtension | null;
  visual_embedding?: number[] | null;
}

export interface CatalogEntry {
  file: CatalogFile;
  media: TypedExtension | null;
  has_visual_embedding: boolean;
}

/** A catalog row flattened for ranking, before the thumbnail key is resolved. */
export interface CatalogHit {
  file_id: number;
  file_name: string;
  file_path: string;
  file_type: FileType;
  extension: string;
  show: string | null;
  file_size: number;
  modified_at: string;
  width: number | null;
  height: number | null;
  thumbnail_path: string | null;
}

export interface SearchResult {
  file_id: number;
  file_name: string;
  file_path: string;
  file_type: FileType;
  extension: string;
  show: string | null;
  file_size: number;
  modified_at: string;
  width: number | null;
  height: number | null;
  thumbnail_url: string | null;
  similarity: number | null;
}

export const GROUP_BY_DIMENSIONS = ['type', 'show', 'extension'] as const;
export type GroupByDimension = (typeof GROUP_BY_DIMENSIONS)[number];

export interface AnalyticsResult {
  group_by: GroupByDimension;
  total: number;
  groups: Array<{ key: string; count: number }>;
}

export interface FileDetails {
  file: CatalogFile;
  media: TypedExtension | null;
  has_visual_embedding: boolean;
  thumbnail_url: string | null;
}

// ─────────────────────────────────────────────
// Conversations
// ─────────────────────────────────────────────

export const TOOL_ERROR_KINDS = ['InvalidArgs', 'ExecutionError', 'NotFound'] as const;
export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[number];

const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  args: z.record(z.unknown()),
});

export type ToolCall = z.infer<typeof ToolCallSchema>;

export const TurnSchema = z.discriminatedUnion('role', [
  z.object({
    role: z.literal('user'),
    content: z.string(),
    image_attached: z.boolean(),
    timestamp: z.string(),
  }),
  z.object({
    role: z.literal('assistant'),
    content: z.string(),
    tool_calls: z.array(ToolCallSchema),
    best_effort: z.boolean(),
    timestamp: z.string(),
  }),
  z.object({
    role: z.literal('tool_call'),
    tool: z.string(),
    args: z.record(z.unknown()),
    ok: z.boolean(),
    result_count: z.number().int().nonnegative(),
    error_kind: z.enum(TOOL_ERROR_KINDS).nullable(),
    message: z.string().nullable(),
    timestamp: z.string(),
  }),
]);

export type Turn = z.infer<typeof TurnSchema>;
export type UserTurn = Extract<Turn, { role: 'user' }>;
export type AssistantTurn = Extract<Turn, { role: 'assistant' }>;
export type ToolCallTurn = Extract<Turn, { role: 'tool_call' }>;

export interface ConversationSummary {
  conversation_id: string;
  user_id: string;
  title: string;
  created_at: string;
  updated_at: string;
  message_count: number;
}

export interface Conversation extends ConversationSummary {
  turns: Turn[];
}
