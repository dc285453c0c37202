import { Command } from "commander";
import chalk from "chalk";
import type { AuditRecord } from "@reliefledger/core";

import { withLedger, type ConfigOption } from "./shared.js";

interface AuditOptions extends ConfigOption {
    limit: string;
}

function summarize(record: AuditRecord): string {
    switch (record.kind) {
        case "DonationReceived":
            return `${record.donor} → ${record.centerId}`;
        case "TokensMinted":
            return `credit ${record.creditId} → ${record.recipient}`;
        case "FundsTransferred":
            return `${record.fromCenterId} → ${record.toCenterId} by ${record.actor}`;
        case "FundsWithdrawn":
            return `${record.centerId} → ${record.recipient} by ${record.actor}`;
    }
}

export const auditCommand = new Command("audit")
    .description("Show the journaled audit trail, for one center or the whole ledger")
    .argument("[centerId]", "Only records touching this center")
    .option("-n, --limit <n>", "Maximum entries", "100")
    .option("-c, --config <path>", "Config file")
    .action((centerId: string | undefined, options: AuditOptions) => {
        withLedger(options, (ledger) => {
            if (!ledger.journal) {
                console.log(chalk.yellow("[ReliefLedger] The audit journal is disabled (ledger.journal: false)."));
                return;
            }
            const limit = Number.parseInt(options.limit, 10);
            const entries = centerId
                ? ledger.journal.forCenter(ledger.requireCenter(centerId).id, limit)
                : ledger.journal.entries(limit);

            for (const { seq, recordedAt, record } of entries) {
                console.log(
                    `${chalk.gray(String(seq).padStart(5))} ${recordedAt} ${chalk.cyan(record.kind.padEnd(16))} ` +
                        `${String(record.amount).padStart(10)}  ${summarize(record)}  ${chalk.gray(`epoch ${record.epoch}`)}`,
                );
            }
        });
    });
