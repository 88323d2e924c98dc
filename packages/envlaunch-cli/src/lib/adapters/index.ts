export { systemBrowser } from "./system-browser.js";
export { createCommandBrowser } from "./command-browser.js";
export { processEnvironment, createMemoryEnvironment } from "./process-environment.js";
