import "dotenv/config";
import { loadToolConfig } from "../config/tool.config";
import { logger } from "../utils/logger";
import { createApp } from "./app";

const config = loadToolConfig();
const app = createApp(config);

app.listen(config.port, () => logger.info(`Scanner API listening on :${config.port}`));
