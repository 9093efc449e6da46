import { AmqpService, type TaskMessage } from './services/amqp';
import { config } from './config';
import { ArrayApi } from './services/array-api';
import { ArrayHostRepository } from './services/host-repository';
import { HostController } from './controllers/host.controller';
import { TasksController } from './controllers/tasks.controller';
import logger from './lib/logger';
import os from 'os';

const amqp = new AmqpService();
const arrayApi = new ArrayApi({
  baseUrl: config.array.url,
  username: config.array.user,
  password: config.array.password,
  allowInsecureTls: config.array.insecureTls,
  timeoutMs: config.array.timeoutMs,
});

const hostController = new HostController(new ArrayHostRepository(arrayApi), logger.child('host'));
const tasksController = new TasksController(hostController, amqp, config.broker.service.agentId);
const pkg: { version?: string } = require('../package.json');

async function start(): Promise<void> {
  await amqp.init();

  await amqp.consumeTasks(async (task: TaskMessage) => {
    logger.info('task received', { taskId: task.taskId, action: task.action, data: task.data });
    return tasksController.handle(task);
  });

  const heartbeatPayload = () => ({
    agentId: config.broker.service.agentId,
    version: pkg.version ?? 'unknown',
    capabilities: ['san.host'],
    host: os.hostname(),
    ts: new Date().toISOString(),
  });

  // Initial heartbeat
  amqp.publishHeartbeat(heartbeatPayload());

  const heartbeatTimer = setInterval(() => {
    try {
      amqp.publishHeartbeat(heartbeatPayload());
    } catch (err) {
      logger.error('Failed to publish heartbeat', { err });
    }
  }, config.broker.heartbeatIntervalMs);

  const shutdown = async () => {
    clearInterval(heartbeatTimer);
    await amqp.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error('Shutdown failed', { err });
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

start().catch((err) => {
  logger.error('Failed to start', { err });
  process.exit(1);
});
