import { describe, test, expect } from "vitest";
import { RELEASE_TAG_PATTERN, buildRules, formatBuildRulesTable } from "./buildRules";

describe("buildRules", () => {
  test("publishes latest, dev and the two release variants", () => {
    const rules = buildRules();

    expect(rules.map((rule) => [rule.type, rule.source, rule.dockerTag])).toEqual([
      ["branch", "main", "latest"],
      ["branch", "develop", "dev"],
      ["tag", RELEASE_TAG_PATTERN, "{\\1}"],
      ["tag", RELEASE_TAG_PATTERN, "{\\1}-gpu"]
    ]);
    expect(rules.every((rule) => rule.context === "/" && rule.dockerfile === "Dockerfile")).toBe(true);
  });

  test("follows the configured default branch and Dockerfile", () => {
    const [first] = buildRules("trunk", "docker/Dockerfile.gpu");

    expect(first).toEqual({
      type: "branch",
      source: "trunk",
      dockerTag: "latest",
      dockerfile: "docker/Dockerfile.gpu",
      context: "/"
    });
  });
});

describe("formatBuildRulesTable", () => {
  test("renders a header, a separator and one row per rule", () => {
    const lines = formatBuildRulesTable(buildRules());

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe("Type         | Source          | Docker Tag   | Dockerfile         | Context");
    expect(lines[1]).toBe("-------------|-----------------|--------------|--------------------|--------");
    expect(lines[2]).toBe("Branch       | main            | latest       | Dockerfile         | /");
    expect(lines[5]).toBe("Tag          | /^v([0-9.]+)$/  | {\\1}-gpu     | Dockerfile         | /");
  });
});
