import { createLogger, format, transports } from "winston";
import config from "../config";

const logger = createLogger({
  defaultMeta: { service: config.SERVICE_NAME },
  format: format.combine(format.timestamp(), format.json()),
  level: config.LOG_LEVEL,
  transports: [
    config.NODE_ENV === "production" ? new transports.Console() : new transports.Console({ format: format.simple() }),
  ],
});

export default logger;
