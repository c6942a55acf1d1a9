export type HistoryRole = "user" | "assistant";

export interface HistoryEntry {
  role: HistoryRole;
  content: string;
}

const ROLE_LABELS: Record<HistoryRole, string> = {
  user: "User",
  assistant: "Assistant",
};

/**
 * In-memory conversation history, one bounded FIFO per session id.
 * Keeps the most recent `maxHistory` exchanges (user + assistant pairs).
 */
export class SessionManager {
  private sessions = new Map<string, HistoryEntry[]>();
  private sessionCounter = 0;

  constructor(private readonly maxHistory: number = 2) {
    if (!Number.isInteger(maxHistory) || maxHistory <= 0) {
      throw new Error("maxHistory must be a positive integer");
    }
  }

  createSession(): string {
    this.sessionCounter += 1;
    const sessionId = `session_${this.sessionCounter}`;
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  addMessage(sessionId: string, role: HistoryRole, content: string): void {
    let entries = this.sessions.get(sessionId);
    if (!entries) {
      entries = [];
      this.sessions.set(sessionId, entries);
    }

    entries.push({ role, content });

    const limit = this.maxHistory * 2;
    if (entries.length > limit) {
      entries.splice(0, entries.length - limit);
    }
  }

  addExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    this.addMessage(sessionId, "user", userMessage);
    this.addMessage(sessionId, "assistant", assistantMessage);
  }

  /**
   * Formatted transcript, oldest first, or null when there is nothing to show.
   */
  getConversationHistory(sessionId?: string | null): string | null {
    if (!sessionId) return null;

    const entries = this.sessions.get(sessionId);
    if (!entries || entries.length === 0) return null;

    return entries.map((entry) => `${ROLE_LABELS[entry.role]}: ${entry.content}`).join("\n");
  }

  getEntries(sessionId: string): ReadonlyArray<HistoryEntry> {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  clearSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }
}
