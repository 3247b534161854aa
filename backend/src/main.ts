/**
 * Process entry point: load configuration, wire the service, start listening
 */

import { createServer } from 'http';
import { config, printConfig, validateConfig } from './config';
import { Log, createLogger } from './logging/log';
import { PathfindingService } from './pipeline';
import { createApp } from './server';

const log = createLogger('main');

const validation = validateConfig(config);
if (!validation.valid) {
  log.error('Configuration validation failed', { errors: validation.errors });
  process.exit(1);
}

if (config.logging.filePath) {
  Log.configure({ filePath: config.logging.filePath });
}

if (config.server.env === 'development') {
  printConfig(config);
}

const service = PathfindingService.fromConfig(config);
service.startMaintenance();

const server = createServer(createApp(service));

server.listen(config.server.port, config.server.host, () => {
  log.info('Server listening', {
    host: config.server.host,
    port: config.server.port,
    env: config.server.env,
    model: config.llm.model,
  });
});

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  log.info('Shutting down', { signal });
  service.stopMaintenance();
  for (const task of service.listTasks()) {
    if (task.state === 'pending' || task.state === 'running' || task.state === 'paused') {
      service.cancelTask(task.id);
    }
  }
  server.close(() => {
    log.info('Closed');
    process.exit(0);
  });
};

process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
