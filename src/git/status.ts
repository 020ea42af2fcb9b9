export type ChangeCategory =
  | "modified"
  | "added"
  | "deleted"
  | "untracked"
  | "renamed"
  | "copied"
  | "conflicted"
  | "other";

export type ChangeCounts = Record<ChangeCategory, number>;

export interface AheadBehind {
  ahead: number;
  behind: number;
}

export const CLEAN_STATUS = "Clean";

// Summary order; the first four are the historical categories.
export const CHANGE_CATEGORY_ORDER: readonly ChangeCategory[] = [
  "modified",
  "added",
  "deleted",
  "untracked",
  "renamed",
  "copied",
  "conflicted",
  "other"
];

const CONFLICT_CODES = new Set(["AA", "DD"]);

const hasCode = (code: string, letter: string): boolean =>
  code.startsWith(letter) || code.startsWith(` ${letter}`);

/**
 * Classifies one line of `git status --porcelain` output by its two-character XY code.
 * Returns null for lines too short to carry a code.
 */
export const classifyStatusLine = (line: string): ChangeCategory | null => {
  if (line.length < 2) {
    return null;
  }

  const code = line.slice(0, 2);

  if (code.includes("U") || CONFLICT_CODES.has(code)) {
    return "conflicted";
  }
  if (hasCode(code, "M") || hasCode(code, "T")) {
    return "modified";
  }
  if (hasCode(code, "A")) {
    return "added";
  }
  if (hasCode(code, "D")) {
    return "deleted";
  }
  if (code === "??") {
    return "untracked";
  }
  if (hasCode(code, "R")) {
    return "renamed";
  }
  if (hasCode(code, "C")) {
    return "copied";
  }

  return "other";
};

export const countChanges = (porcelain: string): ChangeCounts => {
  const counts: ChangeCounts = {
    modified: 0,
    added: 0,
    deleted: 0,
    untracked: 0,
    renamed: 0,
    copied: 0,
    conflicted: 0,
    other: 0
  };

  for (const line of porcelain.split("\n")) {
    const category = classifyStatusLine(line.replace(/\r$/, ""));
    if (category) {
      counts[category] += 1;
    }
  }

  return counts;
};

export const summarizeStatus = (porcelain: string): string => {
  const counts = countChanges(porcelain);
  const parts = CHANGE_CATEGORY_ORDER.filter((category) => counts[category] > 0).map(
    (category) => `${counts[category]} ${category}`
  );

  return parts.length === 0 ? CLEAN_STATUS : parts.join(", ");
};

const toCount = (raw: string | undefined): number => {
  if (!raw || !/^\d+$/.test(raw)) {
    return 0;
  }

  return Number.parseInt(raw, 10);
};

/**
 * Parses `git rev-list --left-right --count A...B` output ("<ahead>\t<behind>").
 */
export const parseAheadBehind = (output: string): AheadBehind => {
  const [ahead, behind] = output.trim().split(/\s+/);

  return {
    ahead: toCount(ahead),
    behind: toCount(behind)
  };
};
