import { Action } from "./action";
import { Token } from "./game";

export interface RecordEntry {
  sequence: number;
  token: Token;
  action: Action;
  /** Chain hash of everything before this entry */
  prevHash: string;
}
