import { createApp } from './app.js';
import { getMaxBodySize, getServerPort, loadConfig } from './config.js';
import { DEFAULT_REGISTRY_PATH, loadRegistry } from './registry.js';
import { describeError } from './errors.js';

/**
 * Start the server
 */
async function bootstrap() {
  const args = process.argv.slice(2);
  const portArg = args.find(a => a.startsWith('--port='));

  const config = await loadConfig();
  const port = portArg ? parseInt(portArg.split('=')[1], 10) : getServerPort();
  const registryPath = config.registryPath ?? DEFAULT_REGISTRY_PATH;

  console.log(`Loading registry from: ${registryPath}`);
  const registry = await loadRegistry(registryPath);
  console.log(`Loaded ${registry.size} tables with translatable columns`);

  const app = createApp(registry, { maxBodySize: getMaxBodySize() });

  const server = app.listen(port, () => {
    console.log(`SQL extraction API listening on http://localhost:${port}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err: unknown) => {
  console.error(`Failed to start: ${describeError(err)}`);
  process.exitCode = 1;
});
