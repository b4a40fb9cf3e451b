import pino from "pino";

import { LOG_LEVEL } from "./constants.js";

// stderr only: stdout carries the answer for the CLI
export const logger = pino(
  {
    level: LOG_LEVEL,
    base: { service: "stock-analyst" },
  },
  pino.destination({ dest: 2, sync: true }),
);

export const logAgent = logger.child({ subsystem: "agent" });
export const logTools = logger.child({ subsystem: "tools" });
export const logModel = logger.child({ subsystem: "model" });
