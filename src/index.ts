import 'dotenv/config';

import { createApp } from './app';
import { resolveAppConfig } from './config/environment';
import { createServices } from './services/createServices';

/**
 * Load configuration and the recipe, then start the HTTP server.
 */
const bootstrap = async (): Promise<void> => {
  const config = resolveAppConfig();
  const { calculator, cache } = await createServices(config);
  const app = createApp({ calculator, cache, config });

  app.listen(config.port, () => {
    console.log(`Batch cost API for "${calculator.recipeName}" running on port ${config.port}`);
  });
};

void bootstrap().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
