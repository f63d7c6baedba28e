export { RandomAgent } from "./RandomAgent";
export { ScriptedAgent } from "./ScriptedAgent";
export { CliAgent } from "./CliAgent";
export { createTerminalIO } from "./terminal";
export type { AgentIO, TerminalIO } from "./terminal";
export { renderBoard, describeOutcome } from "./ui";
