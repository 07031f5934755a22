import { describe, test, expect } from "vitest";
import { buildStatusReport, quickSetup } from "../src/utils/guide-utils";
import { createTestContext } from "./helpers";

describe("quickSetup", () => {
  test("links the secrets page of the origin repository", async () => {
    const { ctx, runner, reporter } = createTestContext();
    runner.on(["git", "remote", "get-url"], { stdout: "git@github.com:alice/speech-app.git\n" });

    await quickSetup(ctx, { open: false });

    expect(reporter.output).toContain(
      "   🌐 Go to: https://github.com/alice/speech-app/settings/secrets/actions"
    );
    expect(reporter.output).toContain("🚀 GitHub Actions: https://github.com/alice/speech-app/actions");
    expect(reporter.output).toContain("   ➕ Add DOCKER_HUB_USERNAME: alice");
    expect(reporter.output.slice(-2)).toEqual([
      "success: After completing the manual steps above, run:",
      "   hubdeploy cloud build"
    ]);
  });

  test("uses placeholders without a GitHub repository", async () => {
    const { ctx, reporter } = createTestContext();

    await quickSetup(ctx, { open: false });

    expect(reporter.output).toContain(
      "⚙️  GitHub Secrets: https://github.com/<github-user>/<repository>/settings/secrets/actions"
    );
  });

  test("falls back to the configured repository", async () => {
    const { ctx, runner, reporter } = createTestContext({
      config: { githubRepository: "carol/voice-lab" }
    });
    runner.fail(["git", "rev-parse", "--git-dir"], 128);

    await quickSetup(ctx, { open: false });

    expect(reporter.output).toContain("🚀 GitHub Actions: https://github.com/carol/voice-lab/actions");
  });

  test("prints the link when no browser opener exists", async () => {
    const { ctx, runner, reporter, prompter } = createTestContext({ answers: { confirms: [true] } });
    runner.fail(["which"]);

    await quickSetup(ctx);

    expect(prompter.questions).toEqual(["🌐 Open Docker Hub in browser?"]);
    expect(reporter.output).toContain("Please open: https://hub.docker.com/");
  });
});

describe("buildStatusReport", () => {
  test("shows recent runs for the origin repository", async () => {
    const { ctx, runner, reporter } = createTestContext();
    runner
      .on(["git", "remote", "get-url"], { stdout: "https://github.com/alice/speech-app.git\n" })
      .on(["gh", "run", "list"], { stdout: "STATUS  TITLE\ncompleted  Bump\n" });

    await buildStatusReport(ctx);

    expect(runner.commandLines()).toEqual([
      "git rev-parse --git-dir",
      "git remote get-url origin",
      "which gh",
      "gh run list --limit 3 --repo alice/speech-app"
    ]);
    expect(reporter.output.slice(0, 7)).toEqual([
      "# 🚀 speech-app - Build Status Check",
      "",
      "📊 Latest GitHub Actions runs:",
      "STATUS  TITLE\ncompleted  Bump",
      "",
      "🔗 View all runs: https://github.com/alice/speech-app/actions",
      ""
    ]);
    expect(reporter.output).toContain("success: DOCKER_HUB_USERNAME: alice");
    expect(reporter.output).toContain("   docker run --rm -p 7860:7860 -p 7861:7861 alice/speech-app:latest");
  });

  test("explains what is missing without gh or a username", async () => {
    const { ctx, runner, reporter } = createTestContext({ config: { dockerHubUsername: undefined } });
    runner
      .on(["git", "remote", "get-url"], { stdout: "https://github.com/alice/speech-app.git\n" })
      .fail(["which", "gh"]);

    await buildStatusReport(ctx);

    expect(reporter.output).toContain("💡 Install GitHub CLI for detailed status: brew install gh");
    expect(reporter.output).toContain("🔗 Manual check: https://github.com/alice/speech-app/actions");
    expect(reporter.output).toContain("error: DOCKER_HUB_USERNAME not set");
    expect(reporter.output).toContain("   docker pull your-username/speech-app:latest");
  });
});
