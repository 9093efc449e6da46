import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { TasksController } from "../src/controllers/tasks.controller";
import { HostController } from "../src/controllers/host.controller";
import type { TaskMessage, TaskPublisher } from "../src/services/amqp";
import { InMemoryHostRepository } from "./support/in-memory-host-repository";

const AGENT_ID = "agent-test";

function task(action: string, data: Record<string, unknown>): TaskMessage {
  return { taskId: "task-1", action, data };
}

describe("TasksController", () => {
  let repo: InMemoryHostRepository;
  let publisher: { publishHostEvent: Mock<TaskPublisher["publishHostEvent"]> };
  let controller: TasksController;

  beforeEach(() => {
    repo = new InMemoryHostRepository();
    publisher = { publishHostEvent: vi.fn<TaskPublisher["publishHostEvent"]>() };
    controller = new TasksController(new HostController(repo), publisher, AGENT_ID);
  });

  it("reconciles a host and publishes a change event", async () => {
    const result = await controller.handle(
      task("host.reconcile", {
        name: "h1",
        osType: "Linux",
        initiators: ["iqn.2001-05.com.example:h1"],
        initiatorIntent: "present-in-host",
        desiredExistence: "present",
      })
    );

    expect(result.ok).toBe(true);
    expect(result.taskId).toBe("task-1");
    expect(result.agentId).toBe(AGENT_ID);
    expect(result.result).toMatchObject({ changed: true, hostDetails: { id: "host-1", name: "h1" } });
    expect(publisher.publishHostEvent).toHaveBeenCalledTimes(1);
    expect(publisher.publishHostEvent).toHaveBeenCalledWith({
      agentId: AGENT_ID,
      hostId: "host-1",
      name: "h1",
      changed: true,
      ts: expect.any(String),
    });
  });

  it("uses the request identity in the event when the host was deleted", async () => {
    repo.seed({ id: "h-1", name: "h1", osType: "Linux", connectivity: "Local_Only" });
    await controller.handle(task("host.reconcile", { name: "h1", desiredExistence: "absent" }));
    expect(publisher.publishHostEvent).toHaveBeenCalledWith(
      expect.objectContaining({ agentId: AGENT_ID, name: "h1", changed: true })
    );
  });

  it("publishes nothing when the host already matches", async () => {
    repo.seed({ id: "h-1", name: "h1", osType: "Linux", connectivity: "Local_Only" });
    const result = await controller.handle(
      task("host.reconcile", { name: "h1", osType: "Linux", desiredExistence: "present" })
    );
    expect(result.ok).toBe(true);
    expect(result.result).toMatchObject({ changed: false });
    expect(publisher.publishHostEvent).not.toHaveBeenCalled();
  });

  it("fails invalid payloads as configuration errors", async () => {
    const result = await controller.handle(task("host.reconcile", { name: "h1", id: "a1", desiredExistence: "present" }));
    expect(result.ok).toBe(false);
    expect(result.errorKind).toBe("configuration");
    expect(result.error).toBe("Invalid host request: parameters are mutually exclusive: name|id");
    expect(repo.lookups).toEqual([]);
  });

  it("reports the planner's error kind", async () => {
    repo.seed({ id: "h-1", name: "h1", osType: "Windows", connectivity: "Local_Only" });
    const result = await controller.handle(
      task("host.reconcile", { name: "h1", osType: "Solaris", desiredExistence: "present" })
    );
    expect(result.ok).toBe(false);
    expect(result.errorKind).toBe("immutable_field");
    expect(repo.calls).toEqual([]);
  });

  it("describes a host with host.get", async () => {
    const seeded = repo.seed({ id: "h-7", name: "db01", osType: "Linux", connectivity: "Local_Only" });
    const result = await controller.handle(task("host.get", { id: "h-7" }));
    expect(result).toMatchObject({ ok: true, result: { hostDetails: seeded } });
  });

  it("fails host.get for an unknown host", async () => {
    const result = await controller.handle(task("host.get", { name: "ghost" }));
    expect(result).toMatchObject({ ok: false, errorKind: "not_found", error: "Host 'ghost' not found" });
  });

  it("rejects unknown actions", async () => {
    const result = await controller.handle(task("host.explode", {}));
    expect(result.ok).toBe(false);
    expect(result.error).toBe("Unknown action 'host.explode'");
    expect(result).not.toHaveProperty("errorKind");
  });
});
