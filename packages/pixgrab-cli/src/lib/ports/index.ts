export type { Clock } from "./clock.js";
export type { DelayFn } from "./timer.js";
export type { PromptService, PromptChoice } from "./prompt.js";
export type { HttpClient, HttpRequestOptions, HttpResponse } from "./http.js";
export { HttpTimeoutError } from "./http.js";
