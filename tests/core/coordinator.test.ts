import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { LifecycleCoordinator } from "../../src/core/lifecycle";
import { CancelledError, PauseError, ResumeFailureError } from "../../src/errors";
import { FakeRuntime } from "../helpers/fake-runtime";
import { makeService } from "../helpers/topology";

const web = makeService("web");
const worker = makeService("worker");
const cache = makeService("cache");

describe("LifecycleCoordinator", () => {
  let runtime: FakeRuntime;
  let coordinator: LifecycleCoordinator;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    runtime = new FakeRuntime()
      .addContainer(web.containerName)
      .addContainer(worker.containerName)
      .addContainer(cache.containerName);
    coordinator = new LifecycleCoordinator(runtime, { stopTimeout: 10 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const stopsAndStarts = () => runtime.calls.filter((c) => /^(stop|start) /.test(c));

  test("stops, runs the body, then starts in reverse order", async () => {
    const result = await coordinator.withPaused([web, worker], async () => {
      expect(runtime.containers.get(web.containerName)?.running).toBe(false);
      expect(runtime.containers.get(worker.containerName)?.running).toBe(false);
      return "done";
    });

    expect(result).toBe("done");
    expect(stopsAndStarts()).toEqual([
      "stop service-web-1",
      "stop service-worker-1",
      "start service-worker-1",
      "start service-web-1",
    ]);
  });

  test("an empty pause set only runs the body", async () => {
    await expect(coordinator.withPaused([], async () => 42)).resolves.toBe(42);
    expect(runtime.calls).toEqual([]);
  });

  test("a service listed twice is stopped once", async () => {
    await coordinator.withPaused([web, web], async () => undefined);
    expect(runtime.count("stop service-web-1")).toBe(1);
    expect(runtime.count("start service-web-1")).toBe(1);
  });

  test("a service that was not running stays stopped", async () => {
    runtime.addContainer(cache.containerName, { running: false });

    await coordinator.withPaused([cache, web], async () => undefined);

    expect(stopsAndStarts()).toEqual(["stop service-web-1", "start service-web-1"]);
    expect(runtime.containers.get(cache.containerName)?.running).toBe(false);
  });

  test("resumes and rethrows when the body fails", async () => {
    const failure = new Error("archive failed");

    await expect(
      coordinator.withPaused([web], async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(runtime.count("stop service-web-1")).toBe(runtime.count("start service-web-1"));
    expect(runtime.containers.get(web.containerName)?.running).toBe(true);
  });

  test("a failed stop resumes the services already stopped", async () => {
    runtime.failOn("stop", cache.containerName, "daemon timeout");
    const body = vi.fn(async () => undefined);

    const error = await coordinator.withPaused([web, worker, cache], body).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PauseError);
    expect(body).not.toHaveBeenCalled();
    expect(stopsAndStarts()).toEqual([
      "stop service-web-1",
      "stop service-worker-1",
      "stop service-cache-1",
      "start service-worker-1",
      "start service-web-1",
    ]);
    for (const service of [web, worker, cache]) {
      expect(runtime.containers.get(service.containerName)?.running).toBe(true);
    }
  });

  test("resume failures carry the body's error as cause", async () => {
    runtime.failOn("start", web.containerName, "cannot start");
    const failure = new Error("dump failed");

    const error = await coordinator
      .withPaused([web, worker], async () => {
        throw failure;
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResumeFailureError);
    if (error instanceof ResumeFailureError) {
      expect(error.services).toEqual(["web"]);
      expect(error.cause).toBe(failure);
      expect(error.message).toBe("Failed to restart web: cannot start");
    }
    // Every stopped service gets a start attempt
    expect(runtime.count("start service-worker-1")).toBe(1);
    expect(runtime.count("start service-web-1")).toBe(1);
  });

  test("a resume failure after a successful body has no cause", async () => {
    runtime.failOn("start", web.containerName);

    const error = await coordinator.withPaused([web], async () => "ok").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResumeFailureError);
    if (error instanceof ResumeFailureError) {
      expect(error.cause).toBeUndefined();
    }
  });

  test("warns about auto-restart policies", async () => {
    runtime.addContainer(web.containerName, { restartPolicy: "unless-stopped" });

    await coordinator.withPaused([web], async () => undefined);

    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(String(vi.mocked(console.warn).mock.calls[0]?.[0])).toContain(
      'has restart policy "unless-stopped"',
    );
  });

  test("an aborted signal stops nothing", async () => {
    const controller = new AbortController();
    controller.abort();
    const body = vi.fn(async () => undefined);

    await expect(coordinator.withPaused([web], body, controller.signal)).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(body).not.toHaveBeenCalled();
    expect(runtime.calls).toEqual([]);
  });

  test("aborting inside the body still resumes", async () => {
    const controller = new AbortController();

    await expect(
      coordinator.withPaused(
        [web],
        async (signal) => {
          controller.abort();
          if (signal?.aborted) throw new CancelledError();
        },
        controller.signal,
      ),
    ).rejects.toBeInstanceOf(CancelledError);

    expect(stopsAndStarts()).toEqual(["stop service-web-1", "start service-web-1"]);
  });

  test("brackets on the same service never overlap", async () => {
    const events: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = coordinator.withPaused([web], async () => {
      events.push("first:start");
      await gate;
      events.push("first:end");
    });
    const second = coordinator.withPaused([web, worker], async () => {
      events.push("second:start");
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(events).toEqual(["first:start"]);

    release();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(runtime.count("stop service-web-1")).toBe(2);
    expect(runtime.count("start service-web-1")).toBe(2);
  });
});
