import path from 'path';
import { createApp } from './server.js';
import { getConfigurationManager } from './detection/ConfigurationManager.js';
import { installConsoleTee } from './utils/logger/fileLogger.js';

const { server, logging } = getConfigurationManager().getConfig();

installConsoleTee({
  logFile: logging.logFilePath || path.resolve(process.cwd(), logging.dataDir, 'app.log'),
  retentionDays: logging.retentionDays,
});

const app = createApp();

app.listen(server.port, () => {
  console.log(`Visitor analysis server running on port ${server.port}`);
});
