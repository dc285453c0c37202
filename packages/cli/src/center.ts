import { Command } from "commander";
import chalk from "chalk";

import { formatCenter, withLedger, type ConfigOption } from "./shared.js";

const create = new Command("create")
    .description("Create a relief fund center and print its capability")
    .argument("<name>", "Center name")
    .option("-c, --config <path>", "Config file")
    .action((name: string, options: ConfigOption) => {
        withLedger(options, (ledger) => {
            const { center, capability } = ledger.createCenter(name);
            console.log(chalk.green(`[ReliefLedger] Created center '${center.name}'`));
            console.log(`  center      ${center.id}`);
            console.log(`  capability  ${chalk.yellow(capability.id)}`);
            console.log(chalk.gray("  The capability is shown once. Anyone holding it can move this center's funds."));
        });
    });

const show = new Command("show")
    .description("Show one center")
    .argument("<centerId>", "Center id")
    .option("-c, --config <path>", "Config file")
    .action((centerId: string, options: ConfigOption) => {
        withLedger(options, (ledger) => {
            console.log(formatCenter(ledger.requireCenter(centerId)));
        });
    });

const list = new Command("list")
    .description("List all centers")
    .option("-c, --config <path>", "Config file")
    .action((options: ConfigOption) => {
        withLedger(options, (ledger) => {
            const centers = ledger.centers();
            if (centers.length === 0) {
                console.log(chalk.gray("No centers yet."));
                return;
            }
            for (const center of centers) {
                console.log(`${center.id}  ${chalk.green(String(center.balance).padStart(10))}  ${center.name}`);
            }
        });
    });

export const centerCommand = new Command("center")
    .description("Create and inspect relief fund centers")
    .addCommand(create)
    .addCommand(show)
    .addCommand(list);
