// Timeout utilities
export { withTimeout, type TimeoutOptions } from "./timeout.js";
