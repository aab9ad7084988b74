/**
 * Session types for conversation history.
 */

/**
 * A message in the session history.
 */
export interface SessionMessage {
  role: "user" | "assistant";
  content: string;
  timestamp: number;
}

/**
 * A conversation session, kept in memory for the life of the process.
 */
export interface Session {
  /** Session key (channel:chat_id) */
  key: string;
  messages: SessionMessage[];
  createdAtMs: number;
  updatedAtMs: number;
}
