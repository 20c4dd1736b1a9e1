export { systemClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createNodeFetchHttpClient } from "./node-fetch-http.js";
