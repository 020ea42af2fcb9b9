import { RepositoryLock } from "../core/repository-lock.js";
import { summarizeCommandError, type CommandExecutor } from "../utils/exec.js";
import type { Logger } from "../utils/logger.js";
import { CLEAN_STATUS, parseAheadBehind, summarizeStatus, type AheadBehind } from "./status.js";

export interface BranchStatus {
  name: string;
  isDirty: boolean;
  ahead: number;
  behind: number;
  status: string;
  current: boolean;
}

export interface RepoStatus {
  path: string;
  currentBranch: string;
  branches: BranchStatus[];
  error?: string;
}

export interface InspectOptions {
  includeClean: boolean;
}

export const CHECKOUT_FAILED_STATUS = "Error checking out branch";
export const STATUS_FAILED_STATUS = "Error getting status";

const DETACHED_HEAD = "HEAD";

/**
 * Where HEAD has to go back to once every branch has been visited.
 */
type RestoreTarget = { kind: "branch"; name: string } | { kind: "detached"; sha: string };

export class GitBranchInspector {
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;
  private readonly lock: RepositoryLock;

  public constructor(executor: CommandExecutor, logger: Logger, lock: RepositoryLock = new RepositoryLock()) {
    this.executor = executor;
    this.logger = logger;
    this.lock = lock;
  }

  /**
   * Checks out each local branch in turn and records its working-tree state.
   * Inspections of one repository path are serialized through the lock.
   */
  public async inspect(repoPath: string, options: InspectOptions): Promise<RepoStatus> {
    return this.lock.runExclusive(repoPath, () => this.inspectExclusive(repoPath, options));
  }

  private async inspectExclusive(repoPath: string, options: InspectOptions): Promise<RepoStatus> {
    const result: RepoStatus = {
      path: repoPath,
      currentBranch: "",
      branches: []
    };

    let currentBranch: string;
    try {
      currentBranch = (await this.git(repoPath, ["rev-parse", "--abbrev-ref", "HEAD"])).trim();
    } catch (error) {
      result.error = `Error getting current branch: ${summarizeCommandError(error)}`;
      this.logger.warn("Cannot determine current branch", { repoPath, error: result.error });
      return result;
    }
    result.currentBranch = currentBranch;

    let restoreTarget: RestoreTarget = { kind: "branch", name: currentBranch };
    if (currentBranch === DETACHED_HEAD) {
      try {
        const sha = (await this.git(repoPath, ["rev-parse", "HEAD"])).trim();
        restoreTarget = { kind: "detached", sha };
      } catch (error) {
        result.error = `Error getting current commit: ${summarizeCommandError(error)}`;
        this.logger.warn("Cannot determine detached HEAD commit", { repoPath, error: result.error });
        return result;
      }
    }

    let branchNames: string[];
    try {
      // `git branch` would also print "(HEAD detached at ...)" and "(no branch, rebasing ...)".
      const output = await this.git(repoPath, ["for-each-ref", "--format=%(refname:short)", "refs/heads/"]);
      branchNames = output
        .split("\n")
        .map((line) => line.trim())
        .filter(Boolean);
    } catch (error) {
      result.error = `Error getting branches: ${summarizeCommandError(error)}`;
      this.logger.warn("Cannot list branches", { repoPath, error: result.error });
      return result;
    }

    const currentName = restoreTarget.kind === "branch" ? restoreTarget.name : undefined;

    try {
      for (const branch of branchNames) {
        const branchStatus = await this.inspectBranch(repoPath, branch, branch === currentName);
        if (branchStatus.isDirty || options.includeClean) {
          result.branches.push(branchStatus);
        }
      }
    } finally {
      await this.restore(repoPath, restoreTarget);
    }

    this.logger.debug("Repository inspected", {
      repoPath,
      branches: branchNames.length,
      reported: result.branches.length
    });

    return result;
  }

  private async inspectBranch(repoPath: string, branch: string, current: boolean): Promise<BranchStatus> {
    const status: BranchStatus = {
      name: branch,
      isDirty: false,
      ahead: 0,
      behind: 0,
      status: "",
      current
    };

    if (!current) {
      try {
        await this.git(repoPath, ["checkout", "-q", branch]);
      } catch (error) {
        this.logger.warn("Cannot checkout branch", {
          repoPath,
          branch,
          error: summarizeCommandError(error)
        });
        status.status = CHECKOUT_FAILED_STATUS;
        return status;
      }
    }

    let porcelain: string;
    try {
      porcelain = await this.git(repoPath, ["status", "--porcelain"]);
    } catch (error) {
      this.logger.warn("Cannot get working tree status", {
        repoPath,
        branch,
        error: summarizeCommandError(error)
      });
      status.status = STATUS_FAILED_STATUS;
      return status;
    }

    if (porcelain.length > 0) {
      status.isDirty = true;
      status.status = summarizeStatus(porcelain);
    } else {
      status.status = CLEAN_STATUS;
    }

    const { ahead, behind } = await this.readAheadBehind(repoPath, branch);
    status.ahead = ahead;
    status.behind = behind;

    return status;
  }

  private async readAheadBehind(repoPath: string, branch: string): Promise<AheadBehind> {
    try {
      const output = await this.git(repoPath, [
        "rev-list",
        "--left-right",
        "--count",
        `${branch}...${branch}@{upstream}`
      ]);
      return parseAheadBehind(output);
    } catch {
      // No upstream configured.
      return { ahead: 0, behind: 0 };
    }
  }

  private async restore(repoPath: string, target: RestoreTarget): Promise<void> {
    const args =
      target.kind === "branch" ? ["checkout", "-q", target.name] : ["checkout", "-q", "--detach", target.sha];

    try {
      await this.git(repoPath, args);
    } catch (error) {
      this.logger.error("Cannot return to original HEAD", {
        repoPath,
        target: target.kind === "branch" ? target.name : target.sha,
        error: summarizeCommandError(error)
      });
    }
  }

  private git(repoPath: string, args: string[]): Promise<string> {
    return this.executor.run("git", args, { cwd: repoPath });
  }
}
