import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { configureErrorReportLog } from './services/errorReporting.js';

const config = loadConfig();
configureErrorReportLog(config.errorReportsFile);

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`[server] schema mapping API listening on http://localhost:${config.port}`);
  if (!config.erp) {
    console.log('[server] ERP_BASE_URL not set: submissions run as dry runs only');
  }
});
