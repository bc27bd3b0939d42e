// src/core/session/index.ts
export { Session, type TurnReport } from "./session";
export {
  runProgram,
  splitInlineInput,
  ReplDriver,
  type RunReport,
  type ReplOptions,
  type ReplSummary,
  type SplitSource,
} from "./driver";
