import pino from "pino";
import { env } from "../config/env";

export const logger = pino({
  name: "concall-archiver",
  level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
});
