import type { Pool } from "pg";
import { z } from "zod";
import type { ConversationTurn } from "../pipeline/types";

/** Read-only view of prior turns; the pipeline never writes conversations. */
export interface ConversationStore {
  recentTurns(conversationId: string, limit: number): Promise<ConversationTurn[]>;
}

const MessageRowSchema = z.object({
  role: z.string(),
  content: z.string(),
  created_at: z.coerce.date().optional()
});

function toTurnRole(role: string): ConversationTurn["role"] | null {
  const normalized = role.toLowerCase();
  if (normalized === "user" || normalized === "human") return "user";
  if (normalized === "assistant" || normalized === "ai") return "assistant";
  return null;
}

export class PostgresConversationStore implements ConversationStore {
  constructor(
    private readonly pool: Pool,
    private readonly table = "conversation_messages"
  ) {}

  async recentTurns(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }
    const result = await this.pool.query(
      `SELECT role, content, created_at
         FROM ${this.table}
        WHERE conversation_id = $1
        ORDER BY created_at DESC
        LIMIT $2`,
      [conversationId, limit]
    );

    const turns: ConversationTurn[] = [];
    for (const raw of result.rows) {
      const row = MessageRowSchema.safeParse(raw);
      if (!row.success) continue;
      const role = toTurnRole(row.data.role);
      if (!role) continue;
      turns.push({ role, content: row.data.content, createdAt: row.data.created_at });
    }
    return turns.reverse();
  }
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, ConversationTurn[]>();

  constructor(seed: Record<string, ConversationTurn[]> = {}) {
    for (const [conversationId, turns] of Object.entries(seed)) {
      this.conversations.set(conversationId, [...turns]);
    }
  }

  async recentTurns(conversationId: string, limit: number): Promise<ConversationTurn[]> {
    if (limit <= 0) {
      return [];
    }
    return (this.conversations.get(conversationId) ?? []).slice(-limit);
  }
}
