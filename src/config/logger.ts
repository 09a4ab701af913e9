import pino from "pino";
import { config } from "./index.js";

export const logger = pino({
  name: "ban-store",
  level: config.logLevel,
  enabled: config.nodeEnv !== "test",
});
