import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError } from '../src/errors.js';
import { DEFAULT_TITLE, SqliteConversationStore, deriveConversationTitle } from '../src/services/conversations.js';
import { openDb } from '../src/services/sqlite.js';
import type { Turn } from '../src/types.js';

const userTurn = (content: string, timestamp: string): Turn => ({
  role: 'user',
  content,
  image_attached: false,
  timestamp,
});

const assistantTurn = (content: string, timestamp: string): Turn => ({
  role: 'assistant',
  content,
  tool_calls: [{ id: 'call_0', name: 'keyword_search', args: { query: 'forest' } }],
  best_effort: false,
  timestamp,
});

describe('deriveConversationTitle', () => {
  it('strips leading filler and capitalizes', () => {
    expect(deriveConversationTitle('Show me all 4K renders from the lighting project')).toBe(
      'All 4K renders from the lighting project'
    );
    expect(deriveConversationTitle('can you find   blend files')).toBe('Blend files');
  });

  it('leaves filler words inside the sentence alone', () => {
    expect(deriveConversationTitle('renders that show me the hero')).toBe('Renders that show me the hero');
  });

  it('does not strip a filler that is only a word prefix', () => {
    expect(deriveConversationTitle('whatever happened to shot 12')).toBe('Whatever happened to shot 12');
  });

  it('truncates long titles to 50 characters', () => {
    const title = deriveConversationTitle('a'.repeat(80));
    expect(title).toHaveLength(50);
    expect(title.endsWith('...')).toBe(true);
  });

  it('falls back to the default when nothing is left', () => {
    expect(deriveConversationTitle('show me')).toBe(DEFAULT_TITLE);
    expect(deriveConversationTitle('   ')).toBe(DEFAULT_TITLE);
  });
});

describe('SqliteConversationStore', () => {
  let store: SqliteConversationStore;

  beforeEach(() => {
    store = new SqliteConversationStore(openDb(':memory:'));
  });

  it('round-trips turns in append order', async () => {
    const turns: Turn[] = [
      userTurn('find forest renders', '2024-05-01T10:00:00.000Z'),
      {
        role: 'tool_call',
        tool: 'keyword_search',
        args: { query: 'forest' },
        ok: false,
        result_count: 0,
        error_kind: 'ExecutionError',
        message: 'index offline',
        timestamp: '2024-05-01T10:00:01.000Z',
      },
      assistantTurn('Nothing found.', '2024-05-01T10:00:02.000Z'),
    ];

    const appended = await store.appendTurns('conv-1', 'user-1', turns);
    expect(appended).toEqual({ messageCountBefore: 0, messageCountAfter: 3 });

    const conversation = await store.getConversation('conv-1', 'user-1');
    expect(conversation).toEqual({
      conversation_id: 'conv-1',
      user_id: 'user-1',
      title: 'Forest renders',
      created_at: '2024-05-01T10:00:00.000Z',
      updated_at: '2024-05-01T10:00:02.000Z',
      message_count: 3,
      turns,
    });
  });

  it('keeps the first title across later turns', async () => {
    await store.appendTurn('conv-1', 'user-1', userTurn('where is the hero model', '2024-05-01T10:00:00.000Z'));
    const result = await store.appendTurn('conv-1', 'user-1', userTurn('and the props', '2024-05-01T11:00:00.000Z'));

    expect(result).toEqual({ messageCountBefore: 1, messageCountAfter: 2 });
    const conversation = await store.getConversation('conv-1', 'user-1');
    expect(conversation?.title).toBe('Is the hero model');
    expect(conversation?.updated_at).toBe('2024-05-01T11:00:00.000Z');
  });

  it('hides conversations from other users', async () => {
    await store.appendTurn('conv-1', 'user-1', userTurn('hello', '2024-05-01T10:00:00.000Z'));

    expect(await store.getConversation('conv-1', 'user-2')).toBeNull();
    expect(await store.deleteConversation('conv-1', 'user-2')).toBe(false);
    await expect(
      store.appendTurn('conv-1', 'user-2', userTurn('sneaky', '2024-05-01T10:05:00.000Z'))
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists a user\'s conversations most recently updated first', async () => {
    await store.appendTurn('conv-a', 'user-1', userTurn('older one', '2024-05-01T09:00:00.000Z'));
    await store.appendTurn('conv-b', 'user-1', userTurn('newer one', '2024-05-02T09:00:00.000Z'));
    await store.appendTurn('conv-c', 'user-2', userTurn('someone else', '2024-05-03T09:00:00.000Z'));

    const list = await store.listConversations('user-1');
    expect(list.map((c) => c.conversation_id)).toEqual(['conv-b', 'conv-a']);
    expect(await store.listConversations('user-1', 1)).toHaveLength(1);
  });

  it('deletes a conversation and its turns', async () => {
    await store.appendTurn('conv-1', 'user-1', userTurn('hello', '2024-05-01T10:00:00.000Z'));

    expect(await store.deleteConversation('conv-1', 'user-1')).toBe(true);
    expect(await store.getConversation('conv-1', 'user-1')).toBeNull();
    expect(await store.listConversations('user-1')).toEqual([]);
  });

  it('rejects malformed turns before writing anything', async () => {
    const bad: Turn = {
      role: 'tool_call',
      tool: 'keyword_search',
      args: {},
      ok: true,
      result_count: -1,
      error_kind: null,
      message: null,
      timestamp: '2024-05-01T10:00:00.000Z',
    };
    await expect(
      store.appendTurns('conv-1', 'user-1', [userTurn('hi', '2024-05-01T10:00:00.000Z'), bad])
    ).rejects.toThrow();
    expect(await store.getConversation('conv-1', 'user-1')).toBeNull();
  });
});
