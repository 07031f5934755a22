import type { CommandRunner } from "../utils/command";
import { commandExists, succeeds } from "../utils/command";

const OPENERS = ["open", "xdg-open"];

/**
 * Open a URL with the platform opener (macOS `open`, Linux `xdg-open`)
 * @returns False when no opener is available or it failed
 */
export async function openInBrowser(runner: CommandRunner, url: string): Promise<boolean> {
  for (const opener of OPENERS) {
    if (await commandExists(runner, opener)) {
      return succeeds(runner, opener, [url]);
    }
  }
  return false;
}
