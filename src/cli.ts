#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { closeDatabase, initializeDatabase } from "./db/index.js";
import { SessionOrchestrator, type SessionOutcome } from "./orchestrator/index.js";
import { parseArgs, parseInsights, parseLimit, parseSatisfaction, requireFlag } from "./commands.js";
import { LLMClient } from "./shared/llm.js";
import { setLogLevel } from "./shared/logger.js";

const usage = `Usage:
  post-refinery run --source "Text" [--insights "one; two"] [--requirements "Text"] [--session <id>]
  post-refinery feedback --session <id> --message "Text" [--satisfaction 1-5] [--regenerate]
  post-refinery approve --session <id>
  post-refinery show --session <id>
  post-refinery list [--limit 20]
`;

const args = process.argv.slice(2);

const print = (value: unknown): void => {
  console.log(JSON.stringify(value, null, 2));
};

const printOutcome = (outcome: SessionOutcome): void => {
  if (outcome.kind === "busy") {
    print({ sessionId: outcome.sessionId, busy: true, message: outcome.message });
    return;
  }
  print({ version: outcome.session.version, ...outcome.session.state });
};

const run = async (): Promise<void> => {
  const parsed = parseArgs(args);
  const command = parsed.command;
  const flags = parsed.flags;

  if (!["run", "feedback", "approve", "show", "list"].includes(command)) {
    console.log(usage);
    return;
  }

  const config = loadConfig();
  setLogLevel(config.logging.level);
  const db = await initializeDatabase({ path: config.database.path });
  const orchestrator = new SessionOrchestrator(db, new LLMClient(config.llm), config.workflow);

  try {
    switch (command) {
      case "run": {
        const outcome = await orchestrator.start({
          sourceContent: requireFlag(flags, "--source"),
          contentInsights: parseInsights(flags["--insights"]),
          requirements: flags["--requirements"] ?? ""
        }, flags["--session"]);
        printOutcome(outcome);
        return;
      }
      case "feedback": {
        const sessionId = requireFlag(flags, "--session");
        const outcome = await orchestrator.feedback(sessionId, {
          message: requireFlag(flags, "--message"),
          satisfaction: parseSatisfaction(flags["--satisfaction"]),
          regenerate: "--regenerate" in flags ? true : undefined
        });
        printOutcome(outcome);
        return;
      }
      case "approve": {
        printOutcome(await orchestrator.approve(requireFlag(flags, "--session")));
        return;
      }
      case "show": {
        const sessionId = requireFlag(flags, "--session");
        const stored = orchestrator.get(sessionId);
        if (!stored) {
          throw new Error(`Session not found: ${sessionId}`);
        }
        print({ version: stored.version, ...stored.state });
        return;
      }
      case "list": {
        print(orchestrator.list(parseLimit(flags["--limit"])));
        return;
      }
    }
  } finally {
    closeDatabase();
  }
};

run().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
