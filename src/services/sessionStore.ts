/**
 * MigrationSessionStore: live migration sessions, keyed by session id.
 *
 * Sessions hold parsed source rows in memory, so they are not persisted;
 * the mapping set itself survives through the JSON export.
 */

import type { MigrationSession } from './migrationSession.js';

export interface SessionSummary {
  id: string;
  createdAt: string;
  connectionId?: string;
  tables: number;
  validated: number;
}

export class MigrationSessionStore {
  private sessions: Map<string, MigrationSession> = new Map();

  add(session: MigrationSession): void {
    this.sessions.set(session.id, session);
  }

  /**
   * @returns the session if found, undefined otherwise
   */
  get(sessionId: string): MigrationSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Drop a session and the source rows it holds.
   * @returns true when a session was removed
   */
  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values(), (session) => {
      const { tables } = session.mappingSet();
      return {
        id: session.id,
        createdAt: session.createdAt,
        ...(session.connectionId ? { connectionId: session.connectionId } : {}),
        tables: tables.length,
        validated: tables.filter((t) => t.status === 'validated').length,
      };
    });
  }
}
