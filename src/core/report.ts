import type { BranchStatus, RepoStatus } from "../git/branch-inspector.js";

export interface TextReportOptions {
  showClean: boolean;
}

interface BranchJson {
  name: string;
  current: boolean;
  dirty: boolean;
  ahead: number;
  behind: number;
  status: string;
}

interface RepoJson {
  path: string;
  current_branch: string;
  error?: string;
  branches: BranchJson[];
}

const REPO_ICON = "📁";
const DIRTY_ICON = "⚠️";
const CLEAN_ICON = "✓";

const pluralize = (count: number, singular: string, plural: string): string =>
  count === 1 ? singular : plural;

export const formatAheadBehind = (ahead: number, behind: number): string => {
  const parts: string[] = [];
  if (ahead > 0) {
    parts.push(`↑${ahead}`);
  }
  if (behind > 0) {
    parts.push(`↓${behind}`);
  }

  return parts.length === 0 ? "" : `[${parts.join(" ")}]`;
};

export const formatBranchLine = (branch: BranchStatus): string => {
  const icon = branch.isDirty ? DIRTY_ICON : CLEAN_ICON;
  const name = branch.current ? `${branch.name} *` : branch.name;
  const tracking = formatAheadBehind(branch.ahead, branch.behind);

  return `   ${icon} ${name}${tracking ? ` ${tracking}` : ""} - ${branch.status}`;
};

const formatRepository = (status: RepoStatus, options: TextReportOptions): string[] => {
  if (status.error) {
    return [`${REPO_ICON} ${status.path} - ERROR: ${status.error}`, ""];
  }

  const lines = [`${REPO_ICON} ${status.path}`];
  if (status.branches.length === 0) {
    lines.push(options.showClean ? "   (no local branches)" : `   ${CLEAN_ICON} All branches clean`);
  } else {
    lines.push(...status.branches.map(formatBranchLine));
  }
  lines.push("");

  return lines;
};

export const renderText = (statuses: readonly RepoStatus[], options: TextReportOptions): string => {
  if (statuses.length === 0) {
    return "No git repositories found.";
  }

  const lines = [
    `Found ${statuses.length} git ${pluralize(statuses.length, "repository", "repositories")}:`,
    "",
    ...statuses.flatMap((status) => formatRepository(status, options))
  ];

  return lines.join("\n").trimEnd();
};

export const toJsonRecord = (status: RepoStatus): RepoJson => ({
  path: status.path,
  current_branch: status.currentBranch,
  ...(status.error ? { error: status.error } : {}),
  branches: status.branches.map((branch) => ({
    name: branch.name,
    current: branch.current,
    dirty: branch.isDirty,
    ahead: branch.ahead,
    behind: branch.behind,
    status: branch.status
  }))
});

export const renderJson = (statuses: readonly RepoStatus[]): string =>
  JSON.stringify(statuses.map(toJsonRecord), null, 2);
