import { DeployError, ExitCodes } from "@hubdeploy/core";
import type { DeployContext } from "./context";
import type { Reporter } from "./reporter";

export interface MenuOption {
  label: string;
  run: () => Promise<void>;
}

export interface Menu {
  title: string;
  options: MenuOption[];
}

/**
 * Print the numbered options
 */
export function renderMenu(menu: Menu, reporter: Reporter): void {
  reporter.line("");
  reporter.line("Choose an option:");
  menu.options.forEach((option, index) => {
    reporter.line(`${index + 1}) ${option.label}`);
  });
}

/**
 * Map the typed answer to an option
 */
export function resolveChoice(menu: Menu, answer: string): MenuOption {
  const trimmed = answer.trim();
  const choice = /^[0-9]+$/.test(trimmed) ? Number(trimmed) : NaN;
  const option = Number.isInteger(choice) ? menu.options[choice - 1] : undefined;

  if (!option) {
    throw new DeployError("Invalid choice", ExitCodes.INVALID_ARGUMENT);
  }
  return option;
}

/**
 * Show a menu, read one choice and run it
 */
export async function runMenu(menu: Menu, ctx: DeployContext): Promise<void> {
  ctx.reporter.heading(menu.title);
  renderMenu(menu, ctx.reporter);

  const answer = await ctx.prompter.input(`Enter choice (1-${menu.options.length}):`);
  const option = resolveChoice(menu, answer);
  await option.run();
}
