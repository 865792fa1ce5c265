export { Interactor, nodeName, pickMatches, type InteractorOptions, type Match } from "./interactor.js";
