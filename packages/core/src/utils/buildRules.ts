// ABOUTME: Automated build rules: which git refs publish which Docker tags.
// ABOUTME: Rendered as the setup table and used to generate the Actions workflow tags.

export interface BuildRule {
  type: "branch" | "tag";
  /** Branch name, or the tag pattern for release tags */
  source: string;
  /** Docker tag; `{\1}` stands for the captured version */
  dockerTag: string;
  /** Suffix appended to the version for tag rules */
  suffix?: string;
  dockerfile: string;
  context: string;
}

export const RELEASE_TAG_PATTERN = "/^v([0-9.]+)$/";

/**
 * Build rules for the default branch, the develop branch and release tags
 */
export function buildRules(defaultBranch: string = "main", dockerfile: string = "Dockerfile"): BuildRule[] {
  return [
    { type: "branch", source: defaultBranch, dockerTag: "latest", dockerfile, context: "/" },
    { type: "branch", source: "develop", dockerTag: "dev", dockerfile, context: "/" },
    { type: "tag", source: RELEASE_TAG_PATTERN, dockerTag: "{\\1}", dockerfile, context: "/" },
    {
      type: "tag",
      source: RELEASE_TAG_PATTERN,
      dockerTag: "{\\1}-gpu",
      suffix: "-gpu",
      dockerfile,
      context: "/"
    }
  ];
}

const COLUMN_WIDTHS = [12, 15, 12, 18] as const;

function row(cells: [string, string, string, string, string]): string {
  const padded = COLUMN_WIDTHS.map((width, index) => (cells[index] ?? "").padEnd(width));
  return [...padded, cells[4]].join(" | ");
}

/**
 * Render build rules as a fixed-width table
 */
export function formatBuildRulesTable(rules: BuildRule[]): string[] {
  const separator = [
    "-".repeat(COLUMN_WIDTHS[0] + 1),
    ...COLUMN_WIDTHS.slice(1).map((width) => "-".repeat(width + 2)),
    "--------"
  ].join("|");

  return [
    row(["Type", "Source", "Docker Tag", "Dockerfile", "Context"]),
    separator,
    ...rules.map((rule) =>
      row([
        rule.type === "branch" ? "Branch" : "Tag",
        rule.source,
        rule.dockerTag,
        rule.dockerfile,
        rule.context
      ])
    )
  ];
}
