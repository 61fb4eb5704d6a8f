import { logger } from "../src/logger.js";

logger.setLevel("error");
