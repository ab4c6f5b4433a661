import { decision, evaluate, parseHookInput } from "./policy.js";
import type { BranchResolver } from "./types.js";
import { logger } from "./utils/logger.js";

export interface RunHookOptions {
  resolveBranch: BranchResolver;
  prefixes: readonly string[];
  defaultCwd?: string;
}

/**
 * Process one hook payload. Returns the JSON line to print, or null when
 * the invocation is not a git mutation and the guard stays silent.
 * Any failure falls back to asking the user.
 */
export async function runHook(stdinText: string, options: RunHookOptions): Promise<string | null> {
  try {
    const input = parseHookInput(stdinText);
    logger.debug(`tool=${input.tool_name} command=${input.tool_input.command ?? "<none>"}`);

    const output = await evaluate(input, options);
    if (output === null) {
      return null;
    }
    logger.debug(`decision=${output.hookSpecificOutput.permissionDecision}`);
    return JSON.stringify(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to evaluate hook input: ${message}`);
    return JSON.stringify(decision("ask", `Branch guard could not evaluate this command (${message}); approval required.`));
  }
}
