import { Command } from "commander";
import chalk from "chalk";

import { operationContext, parseEpoch, presentedCapability, withLedger, type CapabilityOptions } from "./shared.js";

export const withdrawCommand = new Command("withdraw")
    .description("Disburse funds from a center to an outside recipient")
    .argument("<centerId>", "Paying center")
    .argument("<amount>", "Whole amount in the smallest currency unit")
    .argument("<recipient>", "Who receives the funds")
    .option("--capability <id>", "Center's capability (or RELIEFLEDGER_CAPABILITY)")
    .option("--principal <name>", "Actor recorded in the audit trail", "cli")
    .option("--epoch <n>", "Logical epoch (default: UTC days since 1970)", parseEpoch)
    .option("-c, --config <path>", "Config file")
    .action((centerId: string, amount: string, recipient: string, options: CapabilityOptions) => {
        withLedger(options, (ledger) => {
            const { center } = ledger.withdrawFunds(
                centerId,
                Number(amount),
                recipient,
                presentedCapability(options),
                operationContext(options),
            );
            console.log(chalk.green(`[ReliefLedger] Withdrew ${amount} from '${center.name}' to ${recipient}`));
            console.log(`  balance  ${center.balance}`);
        });
    });
