import { Command } from "commander";
import chalk from "chalk";

import { operationContext, parseEpoch, presentedCapability, withLedger, type CapabilityOptions } from "./shared.js";

export const transferCommand = new Command("transfer")
    .description("Move funds between centers with the source center's capability")
    .argument("<fromCenterId>", "Source center")
    .argument("<toCenterId>", "Destination center")
    .argument("<amount>", "Whole amount in the smallest currency unit")
    .option("--capability <id>", "Source center's capability (or RELIEFLEDGER_CAPABILITY)")
    .option("--principal <name>", "Actor recorded in the audit trail", "cli")
    .option("--epoch <n>", "Logical epoch (default: UTC days since 1970)", parseEpoch)
    .option("-c, --config <path>", "Config file")
    .action((fromCenterId: string, toCenterId: string, amount: string, options: CapabilityOptions) => {
        withLedger(options, (ledger) => {
            const { from, to } = ledger.transferBetweenCenters(
                fromCenterId,
                toCenterId,
                Number(amount),
                presentedCapability(options),
                operationContext(options),
            );
            console.log(chalk.green(`[ReliefLedger] Transferred ${amount} from '${from.name}' to '${to.name}'`));
            console.log(`  ${from.name}  ${from.balance}`);
            console.log(`  ${to.name}  ${to.balance}`);
        });
    });
