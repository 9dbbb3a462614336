import 'dotenv/config';

import { createApp } from './app.js';
import { getEngineeringKey, getListenAddress, getPersistenceUrl, getSessionSecret } from './config.js';
import { logError, logInfo, logWarn } from './utils/logger.js';

function checkConfig(): boolean {
  try {
    getPersistenceUrl();
    getSessionSecret();
  } catch (e) {
    logError('[backend-api] config error', { error: String(e) });
    return false;
  }
  if (!getEngineeringKey()) {
    logWarn('[backend-api] PROCMON_ENGINEERING_KEY is empty: engineering login is disabled');
  }
  return true;
}

function bootstrap() {
  if (!checkConfig()) {
    process.exitCode = 1;
    return;
  }
  const { host, port } = getListenAddress();
  createApp().listen(port, host, () => {
    logInfo(`[backend-api] listening on ${host}:${port}`, undefined, { critical: true });
  });
}

bootstrap();
