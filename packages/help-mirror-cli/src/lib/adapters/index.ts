export { realDelay } from "./real-timers.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createHttpPageSource, buildHeaders } from "./http-page-source.js";
export type { FetchFn, HttpPageSourceOptions } from "./http-page-source.js";
