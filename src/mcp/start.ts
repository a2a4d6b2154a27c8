import "dotenv/config";
import { runServer } from "./server.js";
import { logger } from "../utils/logger.js";

runServer().catch((err) => {
  logger.error({ err }, 'Server failed');
  process.exit(1);
});
