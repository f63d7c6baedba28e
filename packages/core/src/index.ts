export * from "./types/game";
export * from "./types/action";
export * from "./types/record";
export * from "./errors";
export * from "./view";
export { linkHash } from "./libs/recordHash";
export { SeededRng } from "./libs/SeededRng";
export type { RandomSource } from "./libs/SeededRng";
