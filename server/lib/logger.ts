import pino from "pino";
import { config } from "../config/env";

export const logger = pino({
  name: "keyforge",
  level: config.LOG_LEVEL,
});
