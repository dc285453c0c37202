import { Command } from "commander";
import chalk from "chalk";

import { openLedger, type ConfigOption } from "./shared.js";

interface ServeOptions extends ConfigOption {
    port?: string;
    host?: string;
}

export const serveCommand = new Command("serve")
    .description("Start the ReliefLedger REST API")
    .option("-p, --port <number>", "Port to bind to (default from config: 4747)")
    .option("--host <host>", "Interface to bind to (default from config: 127.0.0.1)")
    .option("-c, --config <path>", "Config file")
    .action(async (options: ServeOptions) => {
        const { ledger, config } = openLedger(options.config);
        const api = {
            ...config.api,
            port: options.port ? Number.parseInt(options.port, 10) : config.api.port,
            host: options.host ?? config.api.host,
        };
        console.log(chalk.green(`[ReliefLedger API] Booting on ${api.host}:${api.port}...`));
        const { startServer } = await import("@reliefledger/api");
        await startServer({ ledger, config: { ...config, api } });
    });
