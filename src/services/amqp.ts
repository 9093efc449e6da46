import { connect, type ConsumeMessage, type Options } from "amqplib";
import { z } from "zod";
import { config } from "../config";
import rootLogger from "../lib/logger";

const logger = rootLogger.child("amqp");

const RMQ_URL = config.broker.url;
const JOBS_EX = config.broker.task.exchange;
const EVENTS_EX = config.broker.events.exchange;
const RES_EX = config.broker.results.exchange;
const AGENT_ID = config.broker.service.agentId;
const TASK_QUEUE = config.broker.task.queue;
const PREFETCH_COUNT = config.broker.prefetchCount;
const RECONNECT_DELAY_MS = config.broker.reconnectDelayMs;

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const taskMessageSchema = z.object({
  taskId: z.string().min(1),
  action: z.string().min(1),
  data: z.record(z.unknown()).default({}),
  tenantId: z.string().optional(),
});

export type TaskMessage = z.infer<typeof taskMessageSchema>;

export type TaskResult = {
  taskId: string;
  agentId: string;
  ok: boolean;
  result?: unknown;
  error?: string;
  errorKind?: string;
  finishedAt: string;
};

export type HostChangedEvent = {
  agentId: string;
  hostId?: string;
  name?: string;
  changed: boolean;
  ts: string;
};

export type Heartbeat = {
  agentId: string;
  version: string;
  capabilities: string[];
  host: string;
  ts: string;
};

/**
 * The publishing side the task controller depends on.
 */
export interface TaskPublisher {
  publishHostEvent(event: HostChangedEvent): void;
}

type TaskHandler = (task: TaskMessage) => Promise<TaskResult>;

export type Delivery = Pick<ConsumeMessage, "content">;

/**
 * The slice of an amqplib channel the service drives.
 */
export interface BrokerChannel {
  prefetch(count: number): Promise<unknown>;
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  consume(queue: string, onMessage: (msg: Delivery | null) => void): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  ack(msg: Delivery): void;
  close(): Promise<void>;
}

export interface BrokerConnection {
  on(event: "error" | "close", listener: (err?: unknown) => void): unknown;
  createChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
}

export type Connector = (url: string) => Promise<BrokerConnection>;

type Session = { conn: BrokerConnection; ch: BrokerChannel };

export function parseTaskMessage(content: string): TaskMessage | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    logger.warn("dropping task, body is not JSON", { err });
    return undefined;
  }
  const parsed = taskMessageSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("dropping malformed task", { issues: parsed.error.issues });
    return undefined;
  }
  return parsed.data;
}

export class AmqpService implements TaskPublisher {
  private session?: Session;
  private opening?: Promise<Session | undefined>;
  private handler?: TaskHandler;
  private retryTimer?: NodeJS.Timeout;
  private closed = false;

  constructor(private readonly connectTo: Connector = connect) {}

  async init(): Promise<void> {
    await this.open();
  }

  async consumeTasks(onTask: TaskHandler): Promise<void> {
    this.handler = onTask;
    if (this.session) {
      await this.subscribe(this.session.ch, onTask);
      return;
    }
    // a fresh session subscribes the registered handler itself
    await this.open();
  }

  publishResult(action: string, result: TaskResult): void {
    logger.debug("publishing result", { action, result });
    this.send(RES_EX, `task.${action}`, result, { correlationId: result.taskId });
  }

  publishHostEvent(event: HostChangedEvent): void {
    const routingKey = config.broker.events.hostRoutingKey;
    logger.info("publishing host event", { routingKey, event });
    this.send(EVENTS_EX, routingKey, event);
  }

  publishHeartbeat(payload: Heartbeat): void {
    const routingKey = `heartbeat.${payload.agentId}`;
    logger.debug("publishing heartbeat", { routingKey, payload });
    this.send(EVENTS_EX, routingKey, payload);
  }

  async close(): Promise<void> {
    this.closed = true;
    clearTimeout(this.retryTimer);
    this.retryTimer = undefined;
    const session = this.session;
    this.session = undefined;
    if (!session) return;
    await session.ch.close();
    await session.conn.close();
  }

  private send(exchange: string, routingKey: string, body: unknown, options: Options.Publish = {}): void {
    const ch = this.session?.ch;
    if (!ch) {
      logger.warn("dropping publish, channel unavailable", { exchange, routingKey });
      this.reopenLater();
      return;
    }
    ch.publish(exchange, routingKey, Buffer.from(JSON.stringify(body)), {
      contentType: "application/json",
      deliveryMode: 2,
      ...options,
    });
  }

  /**
   * Connects until it succeeds or the service is closed. Concurrent callers share one attempt.
   */
  private open(): Promise<Session | undefined> {
    this.opening ??= this.openWithRetry().finally(() => {
      this.opening = undefined;
    });
    return this.opening;
  }

  private async openWithRetry(): Promise<Session | undefined> {
    while (!this.closed) {
      try {
        return await this.openSession();
      } catch (err) {
        logger.error("failed to connect to AMQP, retrying", { err, delayMs: RECONNECT_DELAY_MS });
        await wait(RECONNECT_DELAY_MS);
      }
    }
    return undefined;
  }

  private async openSession(): Promise<Session> {
    logger.info("connecting to AMQP", { url: RMQ_URL.replace(/\/\/[^@]*@/, "//***@") });
    const conn = await this.connectTo(RMQ_URL);
    conn.on("error", (err) => {
      if (!this.closed) logger.error("AMQP connection error", { err });
    });
    conn.on("close", () => {
      if (this.closed) return;
      logger.warn("AMQP connection closed, scheduling reconnect", { delayMs: RECONNECT_DELAY_MS });
      this.session = undefined;
      this.reopenLater();
    });

    const ch = await conn.createChannel();
    await ch.prefetch(PREFETCH_COUNT);
    await ch.assertExchange(JOBS_EX, "direct", { durable: true });
    await ch.assertExchange(EVENTS_EX, "topic", { durable: true });
    await ch.assertExchange(RES_EX, "topic", { durable: true });
    if (this.handler) await this.subscribe(ch, this.handler);

    const session = { conn, ch };
    this.session = session;
    logger.info("AMQP ready", {
      exchanges: { jobs: JOBS_EX, events: EVENTS_EX, results: RES_EX },
      queue: TASK_QUEUE,
      prefetch: PREFETCH_COUNT,
    });
    return session;
  }

  private reopenLater(): void {
    if (this.retryTimer || this.closed || this.opening) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      this.open().catch((err: unknown) => {
        logger.error("AMQP reconnect failed", { err });
      });
    }, RECONNECT_DELAY_MS);
  }

  private async subscribe(ch: BrokerChannel, onTask: TaskHandler): Promise<void> {
    await ch.assertQueue(TASK_QUEUE, { durable: true });
    await ch.bindQueue(TASK_QUEUE, JOBS_EX, AGENT_ID);
    await ch.consume(TASK_QUEUE, (msg) => {
      if (!msg) return;
      this.deliver(ch, msg, onTask).catch((err: unknown) => {
        logger.error("task delivery failed", { err });
      });
    });
  }

  private async deliver(ch: BrokerChannel, msg: Delivery, onTask: TaskHandler): Promise<void> {
    const task = parseTaskMessage(msg.content.toString());
    if (task) {
      this.publishResult(task.action, await runTask(task, onTask));
    }
    acknowledge(ch, msg, task?.taskId);
  }
}

async function runTask(task: TaskMessage, onTask: TaskHandler): Promise<TaskResult> {
  try {
    return await onTask(task);
  } catch (err) {
    logger.error("task handler threw", { taskId: task.taskId, action: task.action, err });
    return {
      taskId: task.taskId,
      agentId: AGENT_ID,
      ok: false,
      error: err instanceof Error ? err.message : String(err),
      finishedAt: new Date().toISOString(),
    };
  }
}

/**
 * Acks on the channel the message came from. If that channel died meanwhile the
 * broker redelivers the message once the consumer is back.
 */
function acknowledge(ch: BrokerChannel, msg: Delivery, taskId?: string): void {
  try {
    ch.ack(msg);
  } catch (err) {
    logger.warn("could not ack task, channel is gone", { taskId, err });
  }
}
