import { Command } from "commander";
import chalk from "chalk";

import { withLedger, type ConfigOption } from "./shared.js";

export const creditsCommand = new Command("credits")
    .description("List the contribution credits a donor holds")
    .argument("<donor>", "Credit owner")
    .option("-c, --config <path>", "Config file")
    .action((donor: string, options: ConfigOption) => {
        withLedger(options, (ledger) => {
            const credits = ledger.creditsOf(donor);
            if (credits.length === 0) {
                console.log(chalk.gray(`No credits held by '${donor}'.`));
                return;
            }
            for (const credit of credits) {
                console.log(`${credit.id}  ${String(credit.quantity).padStart(10)}  ${credit.centerId}  epoch ${credit.epoch}`);
            }
            const total = credits.reduce((sum, c) => sum + c.quantity, 0);
            console.log(chalk.bold(`Total: ${total}`));
        });
    });
