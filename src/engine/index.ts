export * from "./scheduler/index.js";
export * from "./interactor/index.js";
export * from "./reconciler/index.js";
