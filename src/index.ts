export * from "./data";
export * from "./sequence";
export * from "./grammar";
export * from "./transform";
export * from "./combinators";
export * from "./evaluator";
export * from "./numeric";
export * from "./tokens";
export { checkLaws } from "./laws";
export type { LawSamples, LawViolation } from "./laws";
export { traced } from "./debug";
export type { Logger } from "./debug";
export { GrammarError } from "./util";
