export { devLog, devWarn, devError, isDebugEnabled, setDebugEnabled, parseDebugFlag } from "./debug-log.js";
