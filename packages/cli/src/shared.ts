import { InvalidArgumentError } from "commander";
import chalk from "chalk";
import {
    ReliefLedger,
    ReliefLedgerError,
    envVar,
    loadConfig,
    type Center,
    type OperationContext,
    type ReliefLedgerConfig,
} from "@reliefledger/core";
import { currentEpoch } from "@reliefledger/api";

export interface ConfigOption {
    config?: string;
}

export interface ContextOptions extends ConfigOption {
    principal: string;
    epoch?: number;
}

export interface CapabilityOptions extends ContextOptions {
    capability?: string;
}

export function openLedger(configPath?: string): { ledger: ReliefLedger; config: ReliefLedgerConfig } {
    const config = loadConfig(configPath);
    return { ledger: ReliefLedger.fromConfig(config), config };
}

/**
 * Open the ledger, run one command against it and close it again.
 * Ledger rejections are printed and set a non-zero exit code.
 */
export function withLedger(opts: ConfigOption, fn: (ledger: ReliefLedger) => void): void {
    const { ledger } = openLedger(opts.config);
    try {
        fn(ledger);
    } catch (err) {
        if (err instanceof ReliefLedgerError) {
            console.error(chalk.red(`${err.name}: ${err.message}`));
            process.exitCode = 1;
            return;
        }
        throw err;
    } finally {
        ledger.close();
    }
}

/** Option parser for --epoch: digits only, no sign, fraction or trailing text. */
export function parseEpoch(value: string): number {
    const epoch = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(epoch)) {
        throw new InvalidArgumentError("Epoch must be a non-negative whole number.");
    }
    return epoch;
}

export function operationContext(opts: ContextOptions): OperationContext {
    return {
        epoch: opts.epoch ?? currentEpoch(),
        principal: opts.principal,
    };
}

/** --capability, falling back to RELIEFLEDGER_CAPABILITY. Empty matches nothing. */
export function presentedCapability(opts: CapabilityOptions): string {
    return opts.capability ?? envVar("RELIEFLEDGER_CAPABILITY") ?? "";
}

export function formatCenter(center: Center): string {
    return [
        `${chalk.bold(center.name)} ${chalk.gray(center.id)}`,
        `  balance              ${chalk.green(center.balance)}`,
        `  total contributions  ${center.totalContributions}`,
        `  credit supply        ${center.tokenSupply}`,
        `  created              ${center.createdAt}`,
    ].join("\n");
}
