export type { BrowserService } from "./browser.js";
export type { EnvironmentTable } from "./environment.js";
