import { type ChatSession, createSession } from "./engine";

const sessions = new Map<string, ChatSession>();

export function getOrCreateSession(sessionId?: string | null): ChatSession {
  const existing = sessionId ? sessions.get(sessionId) : undefined;
  if (existing) return existing;
  const session = createSession();
  sessions.set(session.id, session);
  return session;
}

export function startNewSession(previousId?: string | null): ChatSession {
  if (previousId) sessions.delete(previousId);
  const session = createSession();
  sessions.set(session.id, session);
  return session;
}

export function saveSession(session: ChatSession): void {
  sessions.set(session.id, session);
}
