import 'dotenv/config';
import { readAppConfig } from '../shared/config/appConfig.js';
import { createApp } from './createApp.js';

const bootstrap = async () => {
  const config = readAppConfig();
  const app = createApp(config);

  app.listen(config.port, () => {
    console.log(`Dashboard API is running on port ${config.port}, reading data from ${config.dataDir}`);
  });
};

bootstrap().catch((error) => {
  console.error('Failed to start the server:', error);
  process.exit(1);
});
