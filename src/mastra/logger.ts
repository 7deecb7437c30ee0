import { PinoLogger } from "@mastra/loggers";

import { config } from "@/config";

export const logger = new PinoLogger({
  name: "GraphAnalyzer",
  level: config.logLevel,
});
