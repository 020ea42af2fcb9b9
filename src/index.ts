#!/usr/bin/env node
import { loadConfig, resolveScanRoot, USAGE, type ScanConfig } from "./core/config.js";
import { RepositoryLock } from "./core/repository-lock.js";
import { renderJson, renderText } from "./core/report.js";
import { ScanOrchestrator } from "./core/scan-orchestrator.js";
import { GitBranchInspector } from "./git/branch-inspector.js";
import { discoverRepositories } from "./git/discovery.js";
import { NodeCommandExecutor } from "./utils/exec.js";
import { createConsoleLogger } from "./utils/logger.js";

const usage = (): void => {
  // eslint-disable-next-line no-console
  console.log(USAGE);
};

const formatDuration = (durationMs: number): string => `${(durationMs / 1000).toFixed(1)}s`;

const scan = async (config: ScanConfig): Promise<void> => {
  const logger = createConsoleLogger({ level: config.verbose ? "debug" : "error" });
  const root = await resolveScanRoot(config.dir);
  const startedAt = Date.now();

  logger.info("Scanning directory", {
    root,
    showClean: config.showClean,
    parallel: config.parallel,
    concurrency: config.concurrency,
    maxDepth: config.maxDepth
  });

  const discovery = await discoverRepositories(root, {
    maxDepth: config.maxDepth,
    excludedDirectories: config.excludedDirectories,
    logger
  });

  const orchestrator = new ScanOrchestrator({
    inspector: new GitBranchInspector(new NodeCommandExecutor(), logger, new RepositoryLock()),
    logger
  });

  const statuses = await orchestrator.scan(discovery.repositories, {
    parallel: config.parallel,
    concurrency: config.concurrency,
    includeClean: config.showClean
  });

  const report = config.json ? renderJson(statuses) : renderText(statuses, { showClean: config.showClean });
  process.stdout.write(`${report}\n`);

  logger.info("Scan finished", {
    repositories: statuses.length,
    failed: statuses.filter((status) => status.error).length,
    scannedDirectories: discovery.scannedDirectories,
    unreadableDirectories: discovery.errors.length,
    duration: formatDuration(Date.now() - startedAt)
  });
};

const main = async (): Promise<void> => {
  const commandLine = loadConfig(process.argv.slice(2), process.env);

  if (commandLine.command === "help") {
    usage();
    return;
  }

  await scan(commandLine.config);
};

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
