// Session orchestrator - loads, runs and persists refinement sessions

import Database from 'better-sqlite3';
import { SessionStorage, type SessionSummary, type StoredSession } from '../db/sessions.js';
import { createNotFoundError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import type { TextGenerator } from '../shared/llm.js';
import { RefinementWorkflow } from '../workflow/controller.js';
import type { ContentInput, FeedbackInput, WorkflowConfig } from '../workflow/types.js';

const log = createLogger('Orchestrator');

export const BUSY_MESSAGE = "Please wait, I'm still processing your previous request...";

export type SessionOutcome =
  | { kind: 'done'; session: StoredSession }
  | { kind: 'busy'; sessionId: string; message: string };

export class SessionOrchestrator {
  private storage: SessionStorage;
  private workflow: RefinementWorkflow;
  // Sessions with a run in flight
  private inFlight: Set<string> = new Set();

  constructor(db: Database.Database, llm: TextGenerator, config: WorkflowConfig) {
    this.storage = new SessionStorage(db, config.qualityThreshold);
    this.workflow = new RefinementWorkflow(llm, config);
  }

  isBusy(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }

  // Create a session and run it until it completes, fails or needs review
  async start(input: ContentInput, sessionId?: string): Promise<SessionOutcome> {
    const initial = this.workflow.createSession(input, sessionId);

    return this.withLock(initial.sessionId, async () => {
      const stored = this.storage.create(initial);
      log.info(`Started session ${initial.sessionId}`);
      const state = await this.workflow.run(stored.state);
      return this.storage.save(state, stored.version);
    });
  }

  async feedback(sessionId: string, input: FeedbackInput): Promise<SessionOutcome> {
    return this.withLock(sessionId, async () => {
      const stored = this.require(sessionId);
      const withFeedback = this.workflow.injectFeedback(stored.state, input);
      const state = await this.workflow.run(withFeedback);
      return this.storage.save(state, stored.version);
    });
  }

  async approve(sessionId: string): Promise<SessionOutcome> {
    return this.feedback(sessionId, { approve: true });
  }

  get(sessionId: string): StoredSession | null {
    return this.storage.get(sessionId);
  }

  list(limit?: number): SessionSummary[] {
    return this.storage.list(limit);
  }

  private require(sessionId: string): StoredSession {
    const stored = this.storage.get(sessionId);
    if (!stored) {
      throw createNotFoundError('Session', sessionId);
    }
    return stored;
  }

  // A second submission while a run is in flight is rejected, not queued
  private async withLock(
    sessionId: string,
    work: () => Promise<StoredSession>
  ): Promise<SessionOutcome> {
    if (this.inFlight.has(sessionId)) {
      log.warn(`Session ${sessionId} is busy`);
      return { kind: 'busy', sessionId, message: BUSY_MESSAGE };
    }

    this.inFlight.add(sessionId);
    try {
      return { kind: 'done', session: await work() };
    } finally {
      this.inFlight.delete(sessionId);
    }
  }
}
