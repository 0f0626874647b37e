import { pino } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "cid-ledger"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to one registry instance.
 */
export function getRegistryLogger(component: string, address: string) {
  return logger.child({
    component,
    registry: address
  });
}
