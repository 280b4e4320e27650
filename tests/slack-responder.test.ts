import { afterEach, beforeEach, describe, expect, it } from "vitest";
import Database from "better-sqlite3";
import { resolveWorkflowConfig } from "../src/config.js";
import { runMigrations } from "../src/db/index.js";
import { BUSY_MESSAGE, SessionOrchestrator } from "../src/orchestrator/index.js";
import type { CompletionRequest, TextGenerator } from "../src/shared/llm.js";
import { HELP_TEXT } from "../src/slack/intents.js";
import { ThreadResponder } from "../src/slack/responder.js";
import { ScriptedGenerator, draftJson, evaluationJson } from "./helpers/fake-llm.js";

describe("ThreadResponder", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
    runMigrations(db);
  });

  afterEach(() => {
    db.close();
  });

  const responderWith = (llm: TextGenerator, maxIterations = 3) =>
    new ThreadResponder(new SessionOrchestrator(db, llm, resolveWorkflowConfig({ maxIterations })));

  it("answers an empty mention with help", async () => {
    const responder = responderWith(new ScriptedGenerator());
    expect(await responder.onMention({ channel: "C1", threadTs: "1.0", text: "<@U1>" })).toBe(HELP_TEXT);
  });

  it("starts a session keyed by the thread", async () => {
    const responder = responderWith(new ScriptedGenerator([draftJson(), evaluationJson(8)]));

    const reply = await responder.onMention({
      channel: "C1",
      threadTs: "1.0",
      text: "<@U1> We moved standups to async updates",
      userId: "U2"
    });

    expect(reply.startsWith(":white_check_mark: *Final post* after 1 iteration(s)")).toBe(true);
    expect(responder.hasSession("C1", "1.0")).toBe(true);
    expect(responder.hasSession("C1", "2.0")).toBe(false);
    expect(await responder.onReply({ channel: "C1", threadTs: "1.0", text: "status" })).toBe(reply);
  });

  it("approves an abandoned session from a reply", async () => {
    const responder = responderWith(new ScriptedGenerator([draftJson(), evaluationJson(6)]), 1);
    const stopped = await responder.onMention({ channel: "C1", threadTs: "1.0", text: "<@U1> Notes" });
    expect(stopped.startsWith(":zzz: Stopped after 1 iteration(s) without reviewer feedback.")).toBe(true);

    const approved = await responder.onReply({ channel: "C1", threadTs: "1.0", text: "approve" });

    expect(approved.startsWith(":white_check_mark: *Approved* after 1 iteration(s)")).toBe(true);
  });

  it("treats a mention inside an existing session thread as a reply", async () => {
    const llm = new ScriptedGenerator([draftJson(), evaluationJson(6)]);
    const responder = responderWith(llm, 1);
    await responder.onMention({ channel: "C1", threadTs: "1.0", text: "<@U1> Notes" });

    llm.push(draftJson({ title: "Punchier" }));
    const reply = await responder.onMention({ channel: "C1", threadTs: "1.0", text: "<@U1> make the hook punchier" });

    expect(reply).toContain("*Punchier*");
  });

  it("reports a status request without a session", async () => {
    const responder = responderWith(new ScriptedGenerator());
    expect(await responder.onReply({ channel: "C1", threadTs: "9.0", text: "status" }))
      .toBe(":x: No session in this thread.");
  });

  it("turns errors into a friendly reply", async () => {
    const responder = responderWith(new ScriptedGenerator());
    expect(await responder.onReply({ channel: "C1", threadTs: "9.0", text: "make it shorter" }))
      .toBe(':x: I couldn\'t find a Session matching "C1:9.0".');
  });

  it("says it is still processing while a run is in flight", async () => {
    const inner = new ScriptedGenerator([draftJson(), evaluationJson(8)]);
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const gated: TextGenerator = {
      complete: async (request: CompletionRequest) => {
        await gate;
        return inner.complete(request);
      }
    };
    const responder = responderWith(gated);

    const first = responder.onMention({ channel: "C1", threadTs: "1.0", text: "<@U1> Notes" });
    const second = await responder.onReply({ channel: "C1", threadTs: "1.0", text: "make it shorter" });

    expect(second).toBe(BUSY_MESSAGE);
    release();
    expect((await first).startsWith(":white_check_mark:")).toBe(true);
  });
});
