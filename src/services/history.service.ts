import { desc, eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DB, Executor } from '../db/client';
import { messageHistory } from '../db/schema';
import type { MessageHistoryEntry } from '../types/message.types';
import { charLength } from '../utils/text';

export interface RecordEditInput {
  messageId: string;
  editorId: string;
  oldContent: string;
  newContent: string;
  reason?: string | null;
  editedAt: Date;
}

type ContentPair = Pick<MessageHistoryEntry, 'oldContent' | 'newContent'>;

/** Derived from the stored contents, never persisted. */
export const summarizeEdit = (entry: ContentPair): string => {
  const difference = charLength(entry.newContent) - charLength(entry.oldContent);
  if (difference > 0) return `expanded by ${difference} characters`;
  if (difference < 0) return `shortened by ${-difference} characters`;
  return 'same length';
};

export const contentChanged = (entry: ContentPair): boolean => entry.oldContent !== entry.newContent;

/**
 * Append-only edit log. Rows are only ever removed by the cascades on
 * their message or editor.
 */
export class HistoryService {
  constructor(private readonly db: DB) {}

  recordEdit(executor: Executor, input: RecordEditInput): MessageHistoryEntry {
    return executor
      .insert(messageHistory)
      .values({
        id: uuidv4(),
        messageId: input.messageId,
        editorId: input.editorId,
        oldContent: input.oldContent,
        newContent: input.newContent,
        editReason: input.reason ?? null,
        editedAt: input.editedAt,
      })
      .returning()
      .get();
  }

  /** Newest first, editor joined in the same query. */
  async listForMessage(messageId: string) {
    const entries = await this.db.query.messageHistory.findMany({
      where: eq(messageHistory.messageId, messageId),
      with: {
        editor: {
          columns: { id: true, username: true, email: true, firstName: true, lastName: true },
        },
      },
      orderBy: [desc(messageHistory.editedAt)],
    });

    return entries.map((entry) => ({
      ...entry,
      summary: summarizeEdit(entry),
      contentChanged: contentChanged(entry),
    }));
  }
}
