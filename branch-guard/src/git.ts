import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger } from "./utils/logger.js";

const execFileAsync = promisify(execFile);

/**
 * Current branch name, or null when detached or outside a repository
 */
export async function getCurrentBranch(cwd: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync("git", ["rev-parse", "--abbrev-ref", "HEAD"], {
      cwd,
      encoding: "utf-8",
      timeout: 5000,
    });
    const branch = stdout.trim();
    if (!branch || branch === "HEAD") {
      return null;
    }
    return branch;
  } catch (error) {
    logger.debug(`git rev-parse failed in ${cwd}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
