// Refinement session storage with optimistic versioning

import Database from 'better-sqlite3';
import { z } from 'zod';
import { createConflictError, createNotFoundError, createSchemaError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { deserializeState, serializeState } from '../workflow/state.js';
import type { ProcessingStatus, WorkflowState } from '../workflow/types.js';

const log = createLogger('Sessions');

export interface StoredSession {
  state: WorkflowState;
  version: number;
}

export interface SessionSummary {
  id: string;
  status: ProcessingStatus;
  isComplete: boolean;
  iterationCount: number;
  errorCount: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}

const SessionRowSchema = z.object({
  id: z.string(),
  status: z.enum(['generating', 'critiquing', 'refining', 'awaiting_human', 'completed', 'failed', 'abandoned']),
  is_complete: z.number().int(),
  iteration_count: z.number().int(),
  error_count: z.number().int(),
  state: z.string(),
  version: z.number().int(),
  created_at: z.string(),
  updated_at: z.string()
});

type SessionRow = z.infer<typeof SessionRowSchema>;

export class SessionStorage {
  constructor(private db: Database.Database, private qualityThreshold?: number) {}

  // Store a new session at version 1
  create(state: WorkflowState): StoredSession {
    const existing = this.db.prepare('SELECT 1 FROM refinement_sessions WHERE id = ?').get(state.sessionId);
    if (existing) {
      throw createConflictError('Session', state.sessionId);
    }

    this.db.prepare(`
      INSERT INTO refinement_sessions (id, status, is_complete, iteration_count, error_count, state, version, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, 1, ?, ?)
    `).run(
      state.sessionId,
      state.status,
      state.isComplete ? 1 : 0,
      state.iterationCount,
      state.errorCount,
      serializeState(state),
      state.createdAt,
      state.updatedAt
    );

    log.debug(`Created session ${state.sessionId}`);
    return { state, version: 1 };
  }

  get(id: string): StoredSession | null {
    const row = this.db.prepare('SELECT * FROM refinement_sessions WHERE id = ?').get(id);
    return row ? this.rowToSession(this.parseRow(row)) : null;
  }

  // Write only if nobody else wrote since expectedVersion was read
  save(state: WorkflowState, expectedVersion: number): StoredSession {
    const result = this.db.prepare(`
      UPDATE refinement_sessions
      SET status = ?, is_complete = ?, iteration_count = ?, error_count = ?, state = ?, version = version + 1, updated_at = ?
      WHERE id = ? AND version = ?
    `).run(
      state.status,
      state.isComplete ? 1 : 0,
      state.iterationCount,
      state.errorCount,
      serializeState(state),
      state.updatedAt,
      state.sessionId,
      expectedVersion
    );

    if (result.changes === 0) {
      const exists = this.db.prepare('SELECT 1 FROM refinement_sessions WHERE id = ?').get(state.sessionId);
      if (!exists) {
        throw createNotFoundError('Session', state.sessionId);
      }
      throw createConflictError('Session', state.sessionId);
    }

    return { state, version: expectedVersion + 1 };
  }

  // Most recently updated first
  list(limit = 50): SessionSummary[] {
    const rows = this.db.prepare('SELECT * FROM refinement_sessions ORDER BY updated_at DESC, id ASC LIMIT ?').all(limit);
    return rows.map(row => this.rowToSummary(this.parseRow(row)));
  }

  delete(id: string): void {
    const result = this.db.prepare('DELETE FROM refinement_sessions WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw createNotFoundError('Session', id);
    }
  }

  private parseRow(row: unknown): SessionRow {
    const parsed = SessionRowSchema.safeParse(row);
    if (!parsed.success) {
      throw createSchemaError(`stored session row is malformed (${parsed.error.issues[0]?.message ?? 'unknown'})`);
    }
    return parsed.data;
  }

  private rowToSession(row: SessionRow): StoredSession {
    try {
      return { state: deserializeState(row.state, this.qualityThreshold), version: row.version };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw createSchemaError(`stored session ${row.id} could not be decoded: ${reason}`);
    }
  }

  private rowToSummary(row: SessionRow): SessionSummary {
    return {
      id: row.id,
      status: row.status,
      isComplete: row.is_complete === 1,
      iterationCount: row.iteration_count,
      errorCount: row.error_count,
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}
