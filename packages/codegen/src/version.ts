/**
 * Version of the stagegen toolchain.
 *
 * The orchestrator passes it to the driver it compiles, and the driver
 * compares it against the copy bundled into itself.
 */
export const VERSION = "0.1.0";
