/**
 * terminal.ts — Terminal output: chalk + ora
 */

import chalk from "chalk";
import ora, { type Ora } from "ora";

// ─── Output Utilities ────────────────────────────────────

export const log = {
  info: (msg: string) => console.log(chalk.cyan("ℹ ") + msg),
  success: (msg: string) => console.log(chalk.green("✓ ") + msg),
  warn: (msg: string) => console.error(chalk.yellow("⚠ ") + msg),
  error: (msg: string) => console.error(chalk.red("✗ ") + msg),
  tool: (name: string, detail?: string) =>
    console.error(
      chalk.magenta("  ⚙ ") +
        chalk.magenta.bold(name) +
        (detail ? chalk.gray(" " + detail) : ""),
    ),
  toolDone: (name: string, ms: number) =>
    console.error(chalk.green("  ✓ ") + chalk.green(name) + chalk.gray(` (${ms}ms)`)),
};

// ─── Spinner ─────────────────────────────────────────────

let spinner: Ora | null = null;

// Spinner goes to stderr so piped stdout stays machine-readable
export function startSpinner(text: string): void {
  spinner = ora({ text, color: "cyan", stream: process.stderr }).start();
}

export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}
