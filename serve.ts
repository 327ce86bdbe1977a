import { createApp } from './agri-mcp.js';
import { createQaService } from './src/openqa/answer_open_question.js';
import { loadConfig } from './src/openqa/config.js';

const config = loadConfig();
const service = await createQaService(config);
createApp(service).listen(config.port, () =>
  console.log(`[agri-mcp] listening on http://localhost:${config.port}/mcp`));
