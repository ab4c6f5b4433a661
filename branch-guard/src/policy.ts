import type { BranchResolver, HookInput, HookOutput, PermissionDecision } from "./types.js";

export const DEFAULT_AUTOMATION_PREFIXES = ["claude/"];

const GIT_MUTATION = /^git\s+(add|commit|push)\b/;

/**
 * Validate the raw stdin payload. Throws when it is not a tool invocation.
 */
export function parseHookInput(raw: string): HookInput {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error("Hook input must be a JSON object");
  }

  const toolName: unknown = Reflect.get(data, "tool_name");
  if (typeof toolName !== "string") {
    throw new Error("Hook input is missing tool_name");
  }

  const toolInput: unknown = Reflect.get(data, "tool_input");
  const command: unknown =
    typeof toolInput === "object" && toolInput !== null ? Reflect.get(toolInput, "command") : undefined;
  const cwd: unknown = Reflect.get(data, "cwd");

  return {
    tool_name: toolName,
    tool_input: typeof command === "string" ? { command } : {},
    cwd: typeof cwd === "string" ? cwd : undefined,
  };
}

/**
 * The git subcommand when the invocation is `git add`, `git commit` or `git push`
 * at the start of a Bash command, otherwise null
 */
export function gitMutation(input: HookInput): string | null {
  if (input.tool_name !== "Bash") return null;
  const command = input.tool_input.command?.trim() ?? "";
  const match = command.match(GIT_MUTATION);
  return match ? match[1] : null;
}

export function isAutomationBranch(branch: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => prefix.length > 0 && branch.startsWith(prefix));
}

export function decision(permissionDecision: PermissionDecision, reason: string): HookOutput {
  return {
    hookSpecificOutput: {
      hookEventName: "PreToolUse",
      permissionDecision,
      permissionDecisionReason: reason,
    },
  };
}

/**
 * Decide for a known branch. `null` branch (detached HEAD, not a repo) always asks.
 */
export function decide(subcommand: string, branch: string | null, prefixes: readonly string[]): HookOutput {
  if (branch === null) {
    return decision("ask", `git ${subcommand}: could not determine the current branch; approval required.`);
  }

  if (isAutomationBranch(branch, prefixes)) {
    return decision("allow", `git ${subcommand} auto-approved on automation branch '${branch}'.`);
  }

  return decision(
    "ask",
    `git ${subcommand} on '${branch}' requires approval: only branches starting with ${prefixes
      .map((p) => `'${p}'`)
      .join(", ")} are auto-approved.`
  );
}

export interface EvaluateOptions {
  resolveBranch: BranchResolver;
  prefixes?: readonly string[];
  /** Directory used when the payload has no cwd */
  defaultCwd?: string;
}

/**
 * Evaluate one tool invocation. Returns null when the guard has no opinion
 * (anything other than a git mutation).
 */
export async function evaluate(input: HookInput, options: EvaluateOptions): Promise<HookOutput | null> {
  const subcommand = gitMutation(input);
  if (subcommand === null) return null;

  const cwd = input.cwd ?? options.defaultCwd ?? process.cwd();
  const branch = await options.resolveBranch(cwd);
  return decide(subcommand, branch, options.prefixes ?? DEFAULT_AUTOMATION_PREFIXES);
}
