import { Command } from "commander";
import chalk from "chalk";

import { withLedger, type ConfigOption } from "./shared.js";

export const verifyCommand = new Command("verify")
    .description("Check that no balance is negative and every credit supply matches its credits")
    .option("-c, --config <path>", "Config file")
    .action((options: ConfigOption) => {
        withLedger(options, (ledger) => {
            const result = ledger.verify();
            if (result.passed) {
                console.log(chalk.green("[ReliefLedger] Ledger verified. All invariants hold."));
                return;
            }
            for (const issue of result.issues) {
                console.error(chalk.red(`  ${issue}`));
            }
            process.exitCode = 1;
        });
    });
