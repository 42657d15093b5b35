import { NotFoundError } from '../errors.js';
import { TurnSchema, type Conversation, type ConversationSummary, type Turn } from '../types.js';
import { getLogger } from './logger.js';
import type { Db } from './sqlite.js';

export interface AppendResult {
  messageCountBefore: number;
  messageCountAfter: number;
}

/**
 * Append-only conversation log, one per (conversation, user). A
 * conversation owned by someone else behaves as if it did not exist.
 */
export interface ConversationStore {
  appendTurn(conversationId: string, userId: string, turn: Turn): Promise<AppendResult>;
  appendTurns(conversationId: string, userId: string, turns: Turn[]): Promise<AppendResult>;
  listConversations(userId: string, limit?: number): Promise<ConversationSummary[]>;
  getConversation(conversationId: string, userId: string): Promise<Conversation | null>;
  deleteConversation(conversationId: string, userId: string): Promise<boolean>;
}

export const DEFAULT_TITLE = 'New Conversation';
const MAX_TITLE_LENGTH = 50;
const FILLER_PREFIXES = ['show me', 'can you', 'find', 'get', 'what', 'where', 'how'];

/** e.g. "Show me all 4K renders" becomes "All 4K renders". */
export function deriveConversationTitle(query: string): string {
  let title = query.replace(/\s+/g, ' ').trim();

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const prefix of FILLER_PREFIXES) {
      const lower = title.toLowerCase();
      if (lower === prefix || lower.startsWith(`${prefix} `)) {
        title = title.slice(prefix.length).trim();
        stripped = true;
      }
    }
  }

  if (!title) return DEFAULT_TITLE;

  title = title.charAt(0).toUpperCase() + title.slice(1);
  if (title.length > MAX_TITLE_LENGTH) {
    title = `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
  }
  return title;
}

interface ConversationRow {
  conversation_id: string;
  user_id: string;
  title: string | null;
  created_at: string;
  updated_at: string;
  message_count: number;
}

function toSummary(row: ConversationRow): ConversationSummary {
  return { ...row, title: row.title ?? DEFAULT_TITLE };
}

export class SqliteConversationStore implements ConversationStore {
  private readonly log = getLogger('conversations');

  constructor(private readonly db: Db) {}

  async appendTurn(conversationId: string, userId: string, turn: Turn): Promise<AppendResult> {
    return this.appendTurns(conversationId, userId, [turn]);
  }

  async appendTurns(conversationId: string, userId: string, turns: Turn[]): Promise<AppendResult> {
    const validated = turns.map((turn) => TurnSchema.parse(turn));

    // better-sqlite3 transactions run synchronously, so appends to the
    // same conversation can never interleave
    const append = this.db.transaction((): AppendResult => {
      let row = this.db
        .prepare('SELECT * FROM conversations WHERE conversation_id = ?')
        .get(conversationId) as ConversationRow | undefined;

      if (row && row.user_id !== userId) {
        throw new NotFoundError(`conversation ${conversationId} not found`);
      }

      if (!row) {
        const createdAt = validated[0]?.timestamp ?? new Date().toISOString();
        this.db
          .prepare(`
            INSERT INTO conversations (conversation_id, user_id, title, created_at, updated_at, message_count)
            VALUES (?, ?, NULL, ?, ?, 0)
          `)
          .run(conversationId, userId, createdAt, createdAt);
        row = {
          conversation_id: conversationId,
          user_id: userId,
          title: null,
          created_at: createdAt,
          updated_at: createdAt,
          message_count: 0,
        };
      }

      const before = row.message_count;
      let title = row.title;
      let updatedAt = row.updated_at;
      const insert = this.db.prepare(`
        INSERT INTO conversation_turns (conversation_id, seq, role, payload, created_at)
        VALUES (?, ?, ?, ?, ?)
      `);

      validated.forEach((turn, offset) => {
        insert.run(conversationId, before + offset, turn.role, JSON.stringify(turn), turn.timestamp);
        if (title === null && turn.role === 'user') {
          title = deriveConversationTitle(turn.content);
        }
        if (turn.timestamp > updatedAt) updatedAt = turn.timestamp;
      });

      const after = before + validated.length;
      this.db
        .prepare(`
          UPDATE conversations
          SET title = ?, updated_at = ?, message_count = ?
          WHERE conversation_id = ?
        `)
        .run(title, updatedAt, after, conversationId);

      return { messageCountBefore: before, messageCountAfter: after };
    });

    const result = append();
    this.log.debug({ conversationId, appended: validated.length, total: result.messageCountAfter }, 'Turns appended');
    return result;
  }

  async listConversations(userId: string, limit = 20): Promise<ConversationSummary[]> {
    const rows = this.db
      .prepare(`
        SELECT * FROM conversations
        WHERE user_id = ?
        ORDER BY updated_at DESC, conversation_id ASC
        LIMIT ?
      `)
      .all(userId, limit) as ConversationRow[];
    return rows.map(toSummary);
  }

  async getConversation(conversationId: string, userId: string): Promise<Conversation | null> {
    const row = this.db
      .prepare('SELECT * FROM conversations WHERE conversation_id = ? AND user_id = ?')
      .get(conversationId, userId) as ConversationRow | undefined;
    if (!row) return null;

    const payloads = this.db
      .prepare('SELECT payload FROM conversation_turns WHERE conversation_id = ? ORDER BY seq ASC')
      .all(conversationId) as Array<{ payload: string }>;

    const turns = payloads.map(({ payload }) => TurnSchema.parse(JSON.parse(payload)));
    return { ...toSummary(row), turns };
  }

  async deleteConversation(conversationId: string, userId: string): Promise<boolean> {
    const result = this.db
      .prepare('DELETE FROM conversations WHERE conversation_id = ? AND user_id = ?')
      .run(conversationId, userId);
    return result.changes > 0;
  }
}
