/**
 * Promise-based delay function type.
 * Retry loops take one so tests can pass a zero-delay version.
 */
export type DelayFn = (ms: number) => Promise<void>;
