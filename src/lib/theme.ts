import chalk from "chalk";

export const theme = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.gray,
} as const;

export function formatSectionHeader(text: string): string {
  return theme.info(`\n${text}:`);
}

/** Green check or red cross for a yes/no status column. */
export function formatPresence(present: boolean): string {
  return present ? theme.success("✓") : theme.error("✗");
}
