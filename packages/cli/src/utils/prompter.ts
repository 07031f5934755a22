import inquirer from "inquirer";

export interface Prompter {
  /** Free-text answer; returns `defaultValue` when the answer is empty */
  input(message: string, defaultValue?: string): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  /** Wait for Enter */
  pause(message: string): Promise<void>;
}

/**
 * Prompter backed by inquirer
 */
export class InquirerPrompter implements Prompter {
  async input(message: string, defaultValue?: string): Promise<string> {
    const answers = await inquirer.prompt<{ value: string }>([
      { type: "input", name: "value", message, default: defaultValue }
    ]);
    const value = answers.value.trim();
    return value === "" && defaultValue !== undefined ? defaultValue : value;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const answers = await inquirer.prompt<{ value: boolean }>([
      { type: "confirm", name: "value", message, default: defaultValue }
    ]);
    return answers.value;
  }

  async pause(message: string): Promise<void> {
    await inquirer.prompt<{ value: string }>([{ type: "input", name: "value", message }]);
  }
}
