/**
 * Controlled debug logging for routing decisions.
 * Set DEBUG_ROUTING=true to enable.
 */

export const DEBUG_ROUTING = process.env.DEBUG_ROUTING === "true";

export function debugLog(...args: unknown[]): void {
  if (DEBUG_ROUTING) {
    console.log(...args);
  }
}
