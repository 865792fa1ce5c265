export * from "./types.js";
export { PlaywrightDriver, PlaywrightDriverFactory, type Handle } from "./playwright.js";
