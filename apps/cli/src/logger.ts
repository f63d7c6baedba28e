import bunyan from "bunyan";
import { isLogLevel } from "./config/defaults";

const envLevel = process.env.LOG_LEVEL;

// stderr keeps log lines out of the board printed on stdout
const log = bunyan.createLogger({
  name: "dropfour",
  level: envLevel !== undefined && isLogLevel(envLevel) ? envLevel : "info",
  stream: process.stderr,
});

export default log;
