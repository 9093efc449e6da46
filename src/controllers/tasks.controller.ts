import type { HostController } from './host.controller';
import type { TaskMessage, TaskPublisher, TaskResult } from '../services/amqp';
import type { HostError } from '../lib/errors';
import { parseHostSelector, parseHostSpec } from '../lib/host-spec';
import rootLogger from '../lib/logger';

const logger = rootLogger.child('tasks');

export class TasksController {
  constructor(
    private readonly hosts: HostController,
    private readonly publisher: TaskPublisher,
    private readonly agentId: string
  ) {}

  async handle(task: TaskMessage): Promise<TaskResult> {
    switch (task.action) {
      case 'host.reconcile':
        return this.handleReconcile(task);
      case 'host.get':
        return this.handleGet(task);
      default:
        return this.fail(task, `Unknown action '${task.action}'`);
    }
  }

  /**
   * host.reconcile flow:
   * - Validate the payload into a HostSpec
   * - Run one reconciliation pass
   * - Publish a host.changed event when the array was modified
   */
  private async handleReconcile(task: TaskMessage): Promise<TaskResult> {
    const spec = parseHostSpec(task.data);
    if (!spec.ok) {
      return this.failWith(task, spec.error);
    }

    const outcome = await this.hosts.reconcile(spec.value);
    if (!outcome.ok) {
      return this.failWith(task, outcome.error);
    }

    const { changed, hostDetails } = outcome.value;
    if (changed) {
      this.publisher.publishHostEvent({
        agentId: this.agentId,
        hostId: 'id' in hostDetails ? hostDetails.id : spec.value.id,
        name: 'name' in hostDetails ? hostDetails.name : spec.value.name,
        changed,
        ts: new Date().toISOString(),
      });
    }
    logger.info('host.reconcile done', { taskId: task.taskId, changed });
    return this.ok(task, { changed, hostDetails });
  }

  private async handleGet(task: TaskMessage): Promise<TaskResult> {
    const selector = parseHostSelector(task.data);
    if (!selector.ok) {
      return this.failWith(task, selector.error);
    }
    const outcome = await this.hosts.describe(selector.value);
    if (!outcome.ok) {
      return this.failWith(task, outcome.error);
    }
    return this.ok(task, { hostDetails: outcome.value });
  }

  private ok(task: TaskMessage, result: unknown): TaskResult {
    return {
      taskId: task.taskId,
      agentId: this.agentId,
      ok: true,
      result,
      finishedAt: new Date().toISOString(),
    };
  }

  private fail(task: TaskMessage, error: string, errorKind?: string): TaskResult {
    return {
      taskId: task.taskId,
      agentId: this.agentId,
      ok: false,
      error,
      ...(errorKind ? { errorKind } : {}),
      finishedAt: new Date().toISOString(),
    };
  }

  private failWith(task: TaskMessage, error: HostError): TaskResult {
    logger.warn(`${task.action} failed`, { taskId: task.taskId, kind: error.kind, error: error.message });
    return this.fail(task, error.message, error.kind);
  }
}
