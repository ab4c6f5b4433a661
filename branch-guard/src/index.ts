#!/usr/bin/env node
import { text } from "node:stream/consumers";
import { buildApplication, buildCommand, run } from "@stricli/core";
import { runHook } from "./branch-guard.js";
import { getCurrentBranch } from "./git.js";
import { DEFAULT_AUTOMATION_PREFIXES } from "./policy.js";
import { logger } from "./utils/logger.js";

interface GuardFlags {
  prefix?: readonly string[];
  debug: boolean;
}

const guardCommand = buildCommand({
  docs: {
    brief: "PreToolUse hook: auto-approve git add/commit/push on automation branches, ask elsewhere",
  },
  parameters: {
    flags: {
      prefix: {
        kind: "parsed",
        brief: `Branch prefix that is auto-approved (repeatable, default: ${DEFAULT_AUTOMATION_PREFIXES.join(", ")})`,
        parse: String,
        variadic: true,
        optional: true,
      },
      debug: {
        kind: "boolean",
        brief: "Log decisions to stderr",
        default: false,
      },
    },
  },
  async func(flags: GuardFlags) {
    logger.setDebug(flags.debug);

    let stdinText = "";
    try {
      stdinText = await text(process.stdin);
    } catch (error) {
      logger.error(`Failed to read stdin: ${error instanceof Error ? error.message : String(error)}`);
    }

    const output = await runHook(stdinText, {
      resolveBranch: getCurrentBranch,
      prefixes: flags.prefix && flags.prefix.length > 0 ? flags.prefix : DEFAULT_AUTOMATION_PREFIXES,
      defaultCwd: process.cwd(),
    });

    if (output !== null) {
      console.log(output);
    }
    process.exitCode = 0;
  },
});

const app = buildApplication(guardCommand, {
  name: "branch-guard",
  versionInfo: {
    currentVersion: "0.1.0",
  },
});

run(app, process.argv.slice(2), { process });
