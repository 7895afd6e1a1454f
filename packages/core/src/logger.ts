/**
 * Console logging with a `[faultline]` tag. Debug lines only appear when the
 * `verbose` config value is set.
 */

import { config } from "./config.js";

const TAG = "[faultline]";

export const logger = {
  debug(message: string): void {
    if (config.get<boolean>("verbose")) {
      console.log(`${TAG} ${message}`);
    }
  },

  warn(message: string): void {
    console.warn(`${TAG} ${message}`);
  },

  error(message: string): void {
    console.error(`${TAG} ${message}`);
  },
} as const;
