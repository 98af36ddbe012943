// src/server.ts

import { createApp } from './app';
import { loadConfig } from './config';
import { LlmScheduleExtractor, createLlmClient } from './extraction/availabilityExtractor';
import { ConsoleLogger } from './utils/logger';

const config = loadConfig();
const logger = new ConsoleLogger(config.logLevel);
const extractor = new LlmScheduleExtractor(createLlmClient(config.llm), config.llm);
const app = createApp(extractor, logger);

// Start server
app.listen(config.port, () => {
    logger.info(`Meeting slot matcher running on port ${config.port} (model ${config.llm.model} at ${config.llm.baseURL})`);
});
