import 'dotenv/config';

import { createApp } from './app';
import { getCatalog } from './catalog/CatalogStore';
import { loadServerConfig } from './config/ServerConfig';
import { configureAnalysisDefaults } from './modules/analysis/analysis.service';
import { analysisStore } from './persistence/AnalysisStore';

const config = loadServerConfig();

const bootstrap = () => {
  // Fail fast on a broken seed catalog.
  const snapshot = getCatalog().snapshot();

  configureAnalysisDefaults({ safetyFactor: config.defaultSafetyFactor });
  analysisStore.configure({ maxEntries: config.maxStoredAnalyses });

  const app = createApp(config);
  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(`[api] listening on http://localhost:${config.port}`);
    // eslint-disable-next-line no-console
    console.log(
      `[api] catalog: ${snapshot.materialCount} materials, ${snapshot.machineCount} machines`,
    );
  });
};

try {
  bootstrap();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error('[api] failed to start', err);
  process.exitCode = 1;
}
