import { CommandExecutionError, type CommandExecutor, type ExecOptions } from "../../src/utils/exec.js";

export interface FakeBranch {
  porcelain?: string;
  upstream?: { ahead: number; behind: number };
  checkoutFails?: boolean;
  statusFails?: boolean;
}

export interface FakeRepository {
  head: string;
  detachedAt?: string;
  branches: Record<string, FakeBranch>;
  headQueryFails?: boolean;
  branchListFails?: boolean;
  restoreFails?: boolean;
}

const gitFailure = (args: string[], stderr: string): CommandExecutionError =>
  new CommandExecutionError({ command: "git", args, stdout: "", stderr, exitCode: 128 });

export class FakeGit implements CommandExecutor {
  public readonly calls: Array<{ cwd: string; args: string[] }> = [];
  private readonly repositories: Map<string, FakeRepository>;
  private readonly initialHeads: Map<string, string>;

  public constructor(repositories: Record<string, FakeRepository>) {
    this.repositories = new Map(Object.entries(repositories));
    this.initialHeads = new Map(
      Object.entries(repositories).map(([repoPath, repo]) => [repoPath, repo.detachedAt ?? repo.head])
    );
  }

  public repository(repoPath: string): FakeRepository {
    const repository = this.repositories.get(repoPath);
    if (!repository) {
      throw new Error(`Unknown repository ${repoPath}`);
    }
    return repository;
  }

  public async run(command: string, args: string[], options?: ExecOptions): Promise<string> {
    const cwd = options?.cwd ?? "";
    this.calls.push({ cwd, args });

    if (command !== "git") {
      throw new Error(`Unexpected command: ${command}`);
    }

    const repo = this.repositories.get(cwd);
    if (!repo) {
      throw gitFailure(args, "fatal: not a git repository (or any of the parent directories): .git");
    }

    const key = args.join(" ");

    if (key === "rev-parse --abbrev-ref HEAD") {
      if (repo.headQueryFails) {
        throw gitFailure(args, "fatal: ambiguous argument 'HEAD': unknown revision");
      }
      return repo.detachedAt ? "HEAD" : repo.head;
    }

    if (key === "rev-parse HEAD" && repo.detachedAt) {
      return repo.detachedAt;
    }

    if (key === "for-each-ref --format=%(refname:short) refs/heads/") {
      if (repo.branchListFails) {
        throw gitFailure(args, "fatal: unable to read refs");
      }
      return Object.keys(repo.branches).join("\n");
    }

    // Real `git branch` lists the detached HEAD as a pseudo-entry.
    if (key === "branch --format=%(refname:short)") {
      const names = Object.keys(repo.branches);
      return (repo.detachedAt ? [`(HEAD detached at ${repo.detachedAt})`, ...names] : names).join("\n");
    }

    const [verb, first, second, third] = args;
    const initialHead = this.initialHeads.get(cwd);
    const isRestore = verb === "checkout" && (second === initialHead || third === initialHead);
    if (isRestore && repo.restoreFails) {
      throw gitFailure(args, "error: pathspec did not match any file(s) known to git");
    }

    if (verb === "checkout" && first === "-q" && second === "--detach" && third) {
      repo.detachedAt = third;
      return "";
    }

    if (verb === "checkout" && first === "-q" && second) {
      const target = repo.branches[second];
      if (!target || target.checkoutFails) {
        throw gitFailure(args, "error: Your local changes would be overwritten by checkout.");
      }
      repo.head = second;
      delete repo.detachedAt;
      return "";
    }

    if (key === "status --porcelain") {
      const branch = repo.branches[repo.head];
      if (branch?.statusFails) {
        throw gitFailure(args, "fatal: index file corrupt");
      }
      return (branch?.porcelain ?? "").trimEnd();
    }

    if (verb === "rev-list" && first === "--left-right" && second === "--count" && third) {
      const name = third.split("...")[0] ?? "";
      const upstream = repo.branches[name]?.upstream;
      if (!upstream) {
        throw gitFailure(args, `fatal: no upstream configured for branch '${name}'`);
      }
      return `${upstream.ahead}\t${upstream.behind}`;
    }

    throw new Error(`Unexpected git args: ${key}`);
  }
}
