export { parseSessionOptions, KNOWN_EXECUTION_PROVIDERS, DEFAULT_PROFILE_FILE_PREFIX } from "./session-options.js";
export { parseRunOptions } from "./run-options.js";
export { parsePreferredOutputLocations } from "./preferred-output-locations.js";
