import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  cwd?: string;
}

export class CommandExecutionError extends Error {
  public readonly command: string;
  public readonly args: string[];
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly exitCode: number | undefined;

  public constructor(params: {
    command: string;
    args: string[];
    stdout: string;
    stderr: string;
    exitCode: number | undefined;
    message?: string;
  }) {
    super(params.message ?? `Command failed: ${params.command} ${params.args.join(" ")}`);
    this.name = "CommandExecutionError";
    this.command = params.command;
    this.args = params.args;
    this.stdout = params.stdout;
    this.stderr = params.stderr;
    this.exitCode = params.exitCode;
  }
}

export interface CommandExecutor {
  run(command: string, args: string[], options?: ExecOptions): Promise<string>;
}

const firstLine = (raw: string): string | undefined =>
  raw
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.length > 0);

/**
 * One-line description of a failed command, suitable for embedding in a report.
 */
export const summarizeCommandError = (error: unknown): string => {
  if (error instanceof CommandExecutionError) {
    const detail = firstLine(error.stderr) ?? firstLine(error.message) ?? "unknown error";
    return error.exitCode === undefined ? detail : `${detail} (exit code ${error.exitCode})`;
  }

  return error instanceof Error ? error.message : String(error);
};

interface ExecFileFailure {
  stdout?: unknown;
  stderr?: unknown;
  code?: unknown;
  message?: unknown;
}

const isExecFileFailure = (error: unknown): error is ExecFileFailure =>
  typeof error === "object" && error !== null;

export class NodeCommandExecutor implements CommandExecutor {
  public async run(command: string, args: string[], options?: ExecOptions): Promise<string> {
    try {
      const { stdout } = await execFileAsync(command, args, {
        cwd: options?.cwd,
        maxBuffer: 10 * 1024 * 1024,
        encoding: "utf8"
      });

      // Only trailing whitespace goes: porcelain status codes may start with a space.
      return stdout.trimEnd();
    } catch (error) {
      const failure: ExecFileFailure = isExecFileFailure(error) ? error : {};

      throw new CommandExecutionError({
        command,
        args,
        stdout: typeof failure.stdout === "string" ? failure.stdout : "",
        stderr: typeof failure.stderr === "string" ? failure.stderr : "",
        exitCode: typeof failure.code === "number" ? failure.code : undefined,
        message: typeof failure.message === "string" ? failure.message : String(error)
      });
    }
  }
}
