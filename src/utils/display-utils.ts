import chalk from "chalk";
import type { CellError, ShiftWindow } from "../types";

/**
 * Displays a console-rendered report; the title line is highlighted and the
 * header and underline lines dimmed
 */
export function displayConsoleReport(content: string): void {
  const [title, ...rest] = content.split("\n");

  console.log("\n" + chalk.bold.blue(`📋 ${title}`));

  if (rest.length === 1) {
    // No-results sentinel
    console.log(chalk.gray(`  ${rest[0]}`));
    return;
  }

  rest.forEach((line, index) => {
    console.log(index < 2 ? chalk.bold(line) : line);
  });
  console.log(chalk.gray(`\n${rest.length - 2} work item(s)`));
}

/**
 * Displays the UTC range a report covers
 */
export function displayShiftWindow(window: ShiftWindow): void {
  console.log(
    chalk.gray(
      `Shift ${window.shift}: ${window.start.toISOString()} → ${window.end.toISOString()} (UTC)`
    )
  );
}

/**
 * Lists cells that rendered as a placeholder
 */
export function displayCellErrors(cellErrors: CellError[]): void {
  if (cellErrors.length === 0) {
    return;
  }

  displayWarning(`${cellErrors.length} cell(s) could not be rendered:`);
  cellErrors.forEach((cellError) => {
    console.log(
      chalk.gray(
        `  • Work item ${cellError.itemId}, ${cellError.column}: ${JSON.stringify(
          cellError.value ?? null
        )}`
      )
    );
  });
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error): void {
  console.error(chalk.red("❌ Error:"), message);
  if (error && process.env.NODE_ENV === "development") {
    console.error(chalk.gray(error.stack));
  }
}

/**
 * Displays warning messages in a consistent format
 */
export function displayWarning(message: string): void {
  console.log(chalk.yellow("⚠️"), message);
}

/**
 * Displays info messages in a consistent format
 */
export function displayInfo(message: string): void {
  console.log(chalk.blue("ℹ️"), message);
}
