#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { VERSION } from "@reliefledger/core";

import { centerCommand } from "./center.js";
import { donateCommand } from "./donate.js";
import { transferCommand } from "./transfer.js";
import { withdrawCommand } from "./withdraw.js";
import { creditsCommand } from "./credits.js";
import { auditCommand } from "./audit.js";
import { verifyCommand } from "./verify.js";
import { serveCommand } from "./serve.js";

const program = new Command();

program
    .name("reliefledger")
    .description("Capability-authorized ledger for pooled relief funds")
    .version(VERSION);

program.addCommand(centerCommand);
program.addCommand(donateCommand);
program.addCommand(transferCommand);
program.addCommand(withdrawCommand);
program.addCommand(creditsCommand);
program.addCommand(auditCommand);
program.addCommand(verifyCommand);
program.addCommand(serveCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(chalk.red(`\nFatal error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
});
