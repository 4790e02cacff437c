import { buildServer } from './api/server.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './utils/logging.js';

async function main() {
  const cfg = loadConfig();
  const server = await buildServer();
  await server.listen({ port: cfg.server.port, host: '0.0.0.0' });
  getLogger().info(
    { port: cfg.server.port, secretConfigured: Boolean(cfg.probe.secretId) },
    'Server started',
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
