import type { InspectOptions, RepoStatus } from "../git/branch-inspector.js";
import { summarizeCommandError } from "../utils/exec.js";
import type { Logger } from "../utils/logger.js";

export interface RepositoryInspector {
  inspect(repoPath: string, options: InspectOptions): Promise<RepoStatus>;
}

export interface ScanOptions {
  parallel: boolean;
  concurrency: number;
  includeClean: boolean;
}

export interface OrchestratorDependencies {
  inspector: RepositoryInspector;
  logger: Logger;
}

export class ScanOrchestrator {
  private readonly inspector: RepositoryInspector;
  private readonly logger: Logger;

  public constructor(deps: OrchestratorDependencies) {
    this.inspector = deps.inspector;
    this.logger = deps.logger;
  }

  /**
   * Sequential scans keep input order. Parallel scans return records in completion order.
   */
  public async scan(repoPaths: readonly string[], options: ScanOptions): Promise<RepoStatus[]> {
    const inspectOptions: InspectOptions = { includeClean: options.includeClean };

    if (!options.parallel) {
      const statuses: RepoStatus[] = [];
      for (const repoPath of repoPaths) {
        statuses.push(await this.inspectSafely(repoPath, inspectOptions));
      }
      return statuses;
    }

    return this.scanWithWorkers(repoPaths, Math.max(1, options.concurrency), inspectOptions);
  }

  private async scanWithWorkers(
    repoPaths: readonly string[],
    concurrency: number,
    inspectOptions: InspectOptions
  ): Promise<RepoStatus[]> {
    const statuses: RepoStatus[] = [];
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < repoPaths.length) {
        const repoPath = repoPaths[cursor];
        cursor += 1;
        if (repoPath === undefined) {
          break;
        }

        statuses.push(await this.inspectSafely(repoPath, inspectOptions));
      }
    };

    const workerCount = Math.min(concurrency, repoPaths.length);
    this.logger.debug("Starting parallel scan", {
      repositories: repoPaths.length,
      workers: workerCount
    });

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return statuses;
  }

  private async inspectSafely(repoPath: string, inspectOptions: InspectOptions): Promise<RepoStatus> {
    try {
      return await this.inspector.inspect(repoPath, inspectOptions);
    } catch (error) {
      const message = summarizeCommandError(error);
      this.logger.error("Repository inspection failed unexpectedly", { repoPath, error: message });
      return {
        path: repoPath,
        currentBranch: "",
        branches: [],
        error: `Unexpected error: ${message}`
      };
    }
  }
}
