import dotenv from "dotenv";
dotenv.config();

import { program } from "commander";
import { registerPlayCommand } from "./commands/play";
import { registerSimulateCommand } from "./commands/simulate";
import { registerConfigCommand } from "./commands/config";
import { reportError } from "./commands/errors";

program
  .name("dropfour")
  .description("Four in a row at the terminal, for humans and random agents")
  .version("0.1.0", "-v, --version");

registerPlayCommand(program);
registerSimulateCommand(program);
registerConfigCommand(program);

program.parseAsync().catch(reportError);
