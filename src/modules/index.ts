/**
 * Pipeline modules export
 */

export { validate, resolveJob } from "./validator";
export { scan } from "./scanner";
export { process } from "./processor";
export { fetchList, download } from "./updater";
export { stats, formatDuration } from "./stats";
