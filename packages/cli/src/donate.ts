import { Command } from "commander";
import chalk from "chalk";

import { operationContext, parseEpoch, withLedger, type ContextOptions } from "./shared.js";

export const donateCommand = new Command("donate")
    .description("Donate to a center and mint a contribution credit to the donor")
    .argument("<centerId>", "Receiving center")
    .argument("<amount>", "Whole amount in the smallest currency unit")
    .option("--principal <name>", "Donor the credit is minted to", "anonymous")
    .option("--epoch <n>", "Logical epoch (default: UTC days since 1970)", parseEpoch)
    .option("-c, --config <path>", "Config file")
    .action((centerId: string, amount: string, options: ContextOptions) => {
        withLedger(options, (ledger) => {
            const { center, credit } = ledger.donate(centerId, Number(amount), operationContext(options));
            console.log(chalk.green(`[ReliefLedger] ${credit.owner} donated ${credit.quantity} to '${center.name}'`));
            console.log(`  balance  ${center.balance}`);
            console.log(`  credit   ${credit.id} (epoch ${credit.epoch})`);
        });
    });
