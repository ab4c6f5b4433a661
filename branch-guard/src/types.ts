/**
 * PreToolUse payload sent by the assistant. Only the fields the guard reads.
 */
export interface HookInput {
  tool_name: string;
  tool_input: {
    command?: string;
  };
  cwd?: string;
}

export type PermissionDecision = "allow" | "ask";

export interface HookOutput {
  hookSpecificOutput: {
    hookEventName: "PreToolUse";
    permissionDecision: PermissionDecision;
    permissionDecisionReason: string;
  };
}

/** Returns the checked-out branch, or null when it cannot be determined */
export type BranchResolver = (cwd: string) => Promise<string | null>;
