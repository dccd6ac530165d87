import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { validateConfig } from "./config/config";
import { requireRecipients } from "./config/mail.config";
import { CredentialService } from "./services/credential-service";
import { MailService } from "./services/mail-service";
import { loadStyleSheet } from "./services/presentation-service";
import { createShiftReportService } from "./services/shift-report-service";
import type { ShiftName } from "./types";
import {
  displayCellErrors,
  displayConsoleReport,
  displayError,
  displayInfo,
  displayShiftWindow,
  displayWarning,
} from "./utils/display-utils";
import { SHIFT_NAMES, parseShiftName } from "./utils/shift-window";

interface CliOptions {
  preview?: boolean;
}

/**
 * Builds the shift-report program; parsing is left to the caller
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("shift-report")
    .description("Report the Azure DevOps work items due in a shift window")
    .version("1.0.0")
    .argument(
      "<shift>",
      `shift to report on (${SHIFT_NAMES.join(", ")})`,
      parseShiftName
    )
    .option("-p, --preview", "Print the report to the console instead of mailing it")
    .action(async (shift: ShiftName, options: CliOptions) => {
      try {
        const config = validateConfig();
        const mode = options.preview ? "console" : "html";
        const recipients =
          mode === "html" ? requireRecipients(config.mail) : [];

        const service = createShiftReportService(
          config.azureDevOps,
          config.report,
          new CredentialService()
        );
        if (!service.ok) {
          displayError(service.error.message, service.error);
          process.exit(1);
        }

        const spinner = ora(`Querying ${shift} shift work items...`).start();
        const result = await service.value.run({ shift, mode });
        if (!result.ok) {
          spinner.fail("Work item query failed");
          displayError(result.error.message, result.error);
          process.exit(1);
        }

        const report = result.value;
        spinner.succeed(`Fetched ${chalk.green(report.itemCount)} work item(s)`);
        displayShiftWindow(report.window);
        report.issues.forEach((issue) => displayWarning(issue.message));
        if (report.table.kind === "table") {
          displayCellErrors(report.table.cellErrors);
        }

        if (mode === "console") {
          displayConsoleReport(report.rendered.content);
          return;
        }

        const html = service.value.buildDocument(report.rendered.content, {
          greeting: config.mail.greeting,
          closing: config.mail.closing,
          styleSheet: loadStyleSheet(),
        });

        const mailSpinner = ora(
          config.mail.mode === "draft" ? "Writing mail draft..." : "Sending mail..."
        ).start();
        const mailService = new MailService(config.mail);
        const delivered = await mailService.deliver({
          to: recipients,
          subject: `${config.mail.subject} - ${shift} shift`,
          html,
        });

        if (!delivered.ok) {
          mailSpinner.fail("Mail delivery failed");
          displayError(delivered.error.message, delivered.error);
          process.exit(1);
        }

        if (config.mail.mode === "draft") {
          mailSpinner.succeed(`Draft saved as ${chalk.green(delivered.value)}`);
        } else {
          mailSpinner.succeed(`Mail sent to ${recipients.join(", ")}`);
          displayInfo(`Message id: ${delivered.value}`);
        }
      } catch (error) {
        console.error(
          chalk.red("\n❌ Error:"),
          error instanceof Error ? error.message : "Unknown error"
        );
        process.exit(1);
      }
    });

  return program;
}
