import { describe, test, expect } from "vitest";
import { renderMenu, resolveChoice, runMenu, type Menu } from "../src/utils/menu";
import { RecordingReporter, createTestContext } from "./helpers";

function sampleMenu(ran: string[]): Menu {
  return {
    title: "🚀 Quick Deploy",
    options: [
      { label: "Deploy locally", run: async () => void ran.push("local") },
      { label: "Deploy with GPU", run: async () => void ran.push("gpu") }
    ]
  };
}

describe("renderMenu", () => {
  test("numbers the options from 1", () => {
    const reporter = new RecordingReporter();

    renderMenu(sampleMenu([]), reporter);

    expect(reporter.output).toEqual(["", "Choose an option:", "1) Deploy locally", "2) Deploy with GPU"]);
  });
});

describe("resolveChoice", () => {
  test("accepts a number in range", () => {
    expect(resolveChoice(sampleMenu([]), " 2 ").label).toBe("Deploy with GPU");
  });

  test.each(["0", "3", "abc", "1.5", "-1", ""])("rejects %j", (answer) => {
    expect(() => resolveChoice(sampleMenu([]), answer)).toThrow("Invalid choice");
  });
});

describe("runMenu", () => {
  test("runs the chosen option", async () => {
    const ran: string[] = [];
    const { ctx, reporter, prompter } = createTestContext({ answers: { inputs: ["2"] } });

    await runMenu(sampleMenu(ran), ctx);

    expect(ran).toEqual(["gpu"]);
    expect(prompter.questions).toEqual(["Enter choice (1-2):"]);
    expect(reporter.output[0]).toBe("# 🚀 Quick Deploy");
  });

  test("runs nothing on an invalid choice", async () => {
    const ran: string[] = [];
    const { ctx } = createTestContext({ answers: { inputs: ["9"] } });

    await expect(runMenu(sampleMenu(ran), ctx)).rejects.toMatchObject({
      message: "Invalid choice",
      exitCode: 2
    });
    expect(ran).toEqual([]);
  });
});
