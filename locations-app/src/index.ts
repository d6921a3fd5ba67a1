import { InvalidConfigError, loadConfig, type AppConfig } from './config.js';
import { createStore } from './store.js';
import { buildServer } from './api/server.js';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (!(err instanceof InvalidConfigError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exit(1);
}

const store = await createStore(config.source);

const app = buildServer(store, {
  logger: { level: config.logLevel },
  diagnosticsPath: config.diagnosticsPath,
});

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
});
