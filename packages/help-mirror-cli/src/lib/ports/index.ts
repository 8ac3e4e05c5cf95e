export type { DelayFn } from "./timer.js";
export type { PromptService } from "./prompt.js";
export type { PageSource } from "./page-source.js";
