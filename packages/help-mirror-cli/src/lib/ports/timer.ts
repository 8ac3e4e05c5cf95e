/**
 * Promise-based delay function type.
 * Injected into the download loop so tests can skip the wait.
 */
export type DelayFn = (ms: number) => Promise<void>;
