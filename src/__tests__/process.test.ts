/**
 * Unit tests for the Hoverfly process lifecycle
 */
import { describe, test, expect, vi, afterEach } from "vitest";
import { EventEmitter } from "events";
import type { ChildProcess, SpawnOptions } from "child_process";
import { existsSync } from "fs";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Hoverfly, type HoverflyDependencies } from "../hoverfly/process.js";
import { TempFileManager } from "../hoverfly/temp-files.js";
import type { HoverflyClientOptions, HoverflyConfigOptions, HoverflyMode } from "../types.js";
import {
  HoverflyClientError,
  HoverflyNotInstalledError,
  HoverflyStartError,
  PortInUseError,
} from "../errors.js";
import { dslSource } from "../simulation/source.js";
import { buildSimulation, emptySimulation } from "../simulation/document.js";
import { service } from "../dsl/stub-service-builder.js";
import { success } from "../dsl/response-builder.js";

class FakeChild extends EventEmitter {
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  constructor(
    private readonly events: string[],
    private readonly ignoreTerm = false
  ) {
    super();
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.events.push(`kill:${signal}`);
    if (signal === "SIGTERM" && this.ignoreTerm) {
      return true;
    }
    this.signalCode = signal;
    this.emit("exit", null, signal);
    return true;
  }
}

function setup(options: { ignoreTerm?: boolean; healthy?: boolean } = {}) {
  const events: string[] = [];
  const child = new FakeChild(events, options.ignoreTerm);
  const admin = {
    getHealth: vi.fn().mockResolvedValue(options.healthy ?? true),
    setSimulation: vi.fn().mockResolvedValue(undefined),
    getSimulation: vi.fn().mockResolvedValue(emptySimulation()),
    deleteSimulation: vi.fn().mockResolvedValue(undefined),
    setMode: vi.fn().mockResolvedValue(undefined),
    getMode: vi.fn().mockResolvedValue("simulate"),
  };
  const tempFileManager = new TempFileManager("hoverfly-process-test-");
  const purge = tempFileManager.purge.bind(tempFileManager);
  vi.spyOn(tempFileManager, "purge").mockImplementation(async () => {
    events.push("purge");
    await purge();
  });
  const sink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  const spawn = vi.fn(
    (_command: string, _args: readonly string[], _options: SpawnOptions) =>
      child as unknown as ChildProcess
  );
  const createClient = vi.fn((_options: HoverflyClientOptions) => admin);
  const findFreePort = vi.fn(async (_host: string) => 0);
  const isPortAvailable = vi.fn(async (_port: number, _host: string) => true);

  const deps: HoverflyDependencies = {
    spawn,
    createClient,
    tempFileManager,
    findFreePort,
    isPortAvailable,
    logSink: sink,
    env: {},
    pollInterval: 1,
    killTimeout: 10,
  };

  const create = (config: HoverflyConfigOptions = {}, mode?: HoverflyMode) =>
    new Hoverfly(config, mode, deps);

  return { events, child, admin, tempFileManager, sink, spawn, createClient, findFreePort, isPortAvailable, create };
}

describe("Hoverfly", () => {
  let hoverfly: Hoverfly | undefined;

  afterEach(async () => {
    await hoverfly?.close();
    hoverfly = undefined;
  });

  describe("start (local)", () => {
    test("spawns the binary with ports and in-memory storage", async () => {
      const { spawn, admin, create } = setup();
      hoverfly = create();

      await hoverfly.start();

      expect(spawn).toHaveBeenCalledWith(
        "hoverfly",
        ["-ap", "8888", "-pp", "8500", "-db", "memory"],
        { stdio: "ignore" }
      );
      expect(admin.setMode).toHaveBeenCalledWith("simulate");
      expect(hoverfly.isRunning()).toBe(true);
    });

    test("creates the admin client for the configured port", async () => {
      const { createClient, create } = setup();
      hoverfly = create({ adminPort: 9888, requestTimeout: 2000 });

      await hoverfly.start();

      expect(createClient).toHaveBeenCalledWith({ baseUrl: "http://localhost:9888", timeout: 2000 });
      expect(hoverfly.getAdminUrl()).toBe("http://localhost:9888");
      expect(hoverfly.getProxyUrl()).toBe("http://localhost:8500");
    });

    test("logs the started instance", async () => {
      const { sink, create } = setup();
      hoverfly = create();

      await hoverfly.start();

      expect(sink.info).toHaveBeenCalledWith(
        "[hoverfly] Hoverfly started in simulate mode (admin port 8888, proxy port 8500)"
      );
    });

    test("passes capture flags and the header whitelist in capture mode", async () => {
      const { spawn, admin, create } = setup();
      hoverfly = create({ captureHeaders: ["Authorization"], webserver: true, destination: "my-test.com" }, "capture");

      await hoverfly.start();

      expect(spawn.mock.calls[0][1]).toEqual([
        "-ap",
        "8888",
        "-pp",
        "8500",
        "-db",
        "memory",
        "-capture",
        "-webserver",
        "-destination",
        "my-test.com",
      ]);
      expect(admin.setMode).toHaveBeenCalledWith("capture", { headersWhitelist: ["Authorization"] });
    });

    test("picks free ports for ports configured as 0", async () => {
      const { spawn, findFreePort, create } = setup();
      findFreePort.mockResolvedValueOnce(40001).mockResolvedValueOnce(40002);
      hoverfly = create({ adminPort: 0, proxyPort: 0 });

      await hoverfly.start();

      expect(spawn.mock.calls[0][1].slice(0, 4)).toEqual(["-ap", "40001", "-pp", "40002"]);
      expect(hoverfly.getConfig().adminPort).toBe(40001);
      expect(hoverfly.getConfig().proxyPort).toBe(40002);
      expect(hoverfly.getProxyUrl()).toBe("http://localhost:40002");
      expect(hoverfly.getAdminUrl()).toBe("http://localhost:40001");
    });

    test("URLs of ports configured as 0 are unavailable before start", () => {
      const { create } = setup();
      hoverfly = create({ adminPort: 0, proxyPort: 0 });

      expect(hoverfly.getConfig().proxyPort).toBe(0);
      expect(() => hoverfly?.getProxyUrl()).toThrow(
        new HoverflyClientError("proxyPort is picked when Hoverfly starts; call start() first")
      );
      expect(() => hoverfly?.getAdminUrl()).toThrow(HoverflyClientError);
    });

    test("throws PortInUseError without spawning when a port is taken", async () => {
      const { spawn, isPortAvailable, create } = setup();
      isPortAvailable.mockImplementation(async (port: number) => port !== 8500);
      hoverfly = create();

      await expect(hoverfly.start()).rejects.toThrow(new PortInUseError(8500));
      expect(spawn).not.toHaveBeenCalled();
      expect(hoverfly.isRunning()).toBe(false);
    });

    test("warns on a second start", async () => {
      const { spawn, sink, create } = setup();
      hoverfly = create();

      await hoverfly.start();
      await hoverfly.start();

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(sink.warn).toHaveBeenCalledWith("[hoverfly] Local Hoverfly is already running");
    });

    test("overlapping starts spawn a single process", async () => {
      const { events, spawn, sink, create } = setup();
      hoverfly = create();

      await Promise.all([hoverfly.start(), hoverfly.start()]);

      expect(spawn).toHaveBeenCalledTimes(1);
      expect(sink.warn).toHaveBeenCalledWith("[hoverfly] Local Hoverfly is already running");
      expect(hoverfly.isRunning()).toBe(true);

      await hoverfly.stop();
      expect(events).toEqual(["kill:SIGTERM", "purge"]);
    });

    test("a start overlapping a failed start fails with it", async () => {
      const { spawn, admin, create } = setup({ healthy: false });
      hoverfly = create({ startupTimeout: 20 });

      const results = await Promise.allSettled([hoverfly.start(), hoverfly.start()]);

      expect(results.map((result) => result.status)).toEqual(["rejected", "rejected"]);
      expect(spawn).toHaveBeenCalledTimes(1);

      admin.getHealth.mockResolvedValue(true);
      await hoverfly.start();
      expect(spawn).toHaveBeenCalledTimes(2);
      expect(hoverfly.isRunning()).toBe(true);
    });

    test("reports a missing binary", async () => {
      const { child, events, spawn, admin, create } = setup({ healthy: false });
      spawn.mockImplementation(() => {
        setImmediate(() => {
          child.emit("error", Object.assign(new Error("spawn hoverfly ENOENT"), { code: "ENOENT" }));
        });
        return child as unknown as ChildProcess;
      });
      hoverfly = create();

      await expect(hoverfly.start()).rejects.toThrow(
        new HoverflyNotInstalledError("Hoverfly binary not found: hoverfly")
      );
      expect(events).toEqual(["purge"]);
      expect(admin.setMode).not.toHaveBeenCalled();
    });

    test("reports an exit during startup", async () => {
      const { child, spawn, create } = setup({ healthy: false });
      spawn.mockImplementation(() => {
        setImmediate(() => {
          child.emit("exit", 1, null);
        });
        return child as unknown as ChildProcess;
      });
      hoverfly = create();

      const error: unknown = await hoverfly.start().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HoverflyStartError);
      if (error instanceof HoverflyStartError) {
        expect(error.message).toBe("Hoverfly exited during startup (code 1)");
        expect(error.exitCode).toBe(1);
      }
    });

    test("stops the process when it never becomes healthy", async () => {
      const { events, create } = setup({ healthy: false });
      hoverfly = create({ startupTimeout: 20 });

      await expect(hoverfly.start()).rejects.toThrow("Hoverfly failed to start within 20ms");
      expect(events).toEqual(["kill:SIGTERM", "purge"]);
      expect(hoverfly.isRunning()).toBe(false);
    });

    test("copies the certificate and key into the temp directory", async () => {
      const { spawn, tempFileManager, create } = setup();
      const dir = await mkdtemp(join(tmpdir(), "hoverfly-cert-"));
      try {
        await writeFile(join(dir, "cert.pem"), "test-certificate");
        await writeFile(join(dir, "key.pem"), "test-key");
        hoverfly = create({
          sslCertificatePath: join(dir, "cert.pem"),
          sslKeyPath: join(dir, "key.pem"),
        });

        await hoverfly.start();

        const tempDir = tempFileManager.getTempDir();
        expect(tempDir).toBeDefined();
        if (tempDir !== undefined) {
          expect(spawn.mock.calls[0][1].slice(6)).toEqual([
            "-cert",
            join(tempDir, "ca.crt"),
            "-key",
            join(tempDir, "ca.key"),
          ]);
          expect(existsSync(join(tempDir, "ca.crt"))).toBe(true);

          await hoverfly.stop();
          expect(existsSync(tempDir)).toBe(false);
        }
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });

    test("reads ports from the injected environment only", async () => {
      const { spawn, create } = setup();
      const before = process.env.HOVERFLY_ADMIN_PORT;
      hoverfly = new Hoverfly({}, "simulate", {
        spawn,
        createClient: () => setup().admin,
        tempFileManager: new TempFileManager(),
        isPortAvailable: async () => true,
        logSink: setup().sink,
        env: { HOVERFLY_ADMIN_PORT: "9888" },
        pollInterval: 1,
      });

      await hoverfly.start();

      expect(spawn.mock.calls[0][1].slice(0, 2)).toEqual(["-ap", "9888"]);
      expect(process.env.HOVERFLY_ADMIN_PORT).toBe(before);
      expect(create().getConfig().adminPort).toBe(8888);
    });
  });

  describe("start (remote)", () => {
    test("connects to a healthy instance without spawning", async () => {
      const { spawn, admin, create } = setup();
      hoverfly = create({ remote: true, host: "hoverfly.local" }, "spy");

      await hoverfly.start();

      expect(spawn).not.toHaveBeenCalled();
      expect(admin.setMode).toHaveBeenCalledWith("spy");
      expect(hoverfly.isRunning()).toBe(true);
    });

    test("fails when the instance is not healthy", async () => {
      const { create } = setup({ healthy: false });
      hoverfly = create({ remote: true, host: "hoverfly.local" });

      await expect(hoverfly.start()).rejects.toThrow(
        "Remote Hoverfly at http://hoverfly.local:8888 is not healthy"
      );
    });
  });

  describe("stop", () => {
    test("terminates the process, waits for exit, then purges", async () => {
      const { events, child, sink, create } = setup();
      hoverfly = create();
      await hoverfly.start();
      child.on("exit", () => events.push("exit"));

      await hoverfly.stop();

      expect(events).toEqual(["kill:SIGTERM", "exit", "purge"]);
      expect(sink.info).toHaveBeenLastCalledWith("[hoverfly] Hoverfly stopped");
      expect(hoverfly.isRunning()).toBe(false);
    });

    test("escalates to SIGKILL when SIGTERM is ignored", async () => {
      const { events, create } = setup({ ignoreTerm: true });
      hoverfly = create();
      await hoverfly.start();

      await hoverfly.close();

      expect(events).toEqual(["kill:SIGTERM", "kill:SIGKILL", "purge"]);
    });

    test("is safe to call repeatedly", async () => {
      const { events, sink, create } = setup();
      hoverfly = create();
      await hoverfly.start();

      await hoverfly.stop();
      await hoverfly.stop();

      expect(events).toEqual(["kill:SIGTERM", "purge", "purge"]);
      expect(sink.info.mock.calls.filter(([line]) => line === "[hoverfly] Hoverfly stopped")).toHaveLength(1);
    });
  });

  describe("simulation operations", () => {
    test("importSimulation loads the source into Hoverfly", async () => {
      const { admin, create } = setup();
      hoverfly = create();
      await hoverfly.start();
      const bookings = service("www.my-test.com").get("/api/bookings").willReturn(success());

      await hoverfly.importSimulation(dslSource(bookings));

      expect(admin.setSimulation).toHaveBeenCalledWith(buildSimulation(bookings));
    });

    test("delegates export, reset and mode", async () => {
      const { admin, create } = setup();
      hoverfly = create();
      await hoverfly.start();

      expect(await hoverfly.getSimulation()).toEqual(emptySimulation());
      await hoverfly.resetSimulation();
      expect(await hoverfly.getMode()).toBe("simulate");
      expect(admin.deleteSimulation).toHaveBeenCalledTimes(1);
    });

    test("requires a started instance", async () => {
      const { create } = setup();
      hoverfly = create();

      await expect(hoverfly.importSimulation(dslSource())).rejects.toThrow(
        new HoverflyClientError("Hoverfly is not running; call start() first")
      );
      await expect(hoverfly.getMode()).rejects.toThrow(HoverflyClientError);
    });
  });
});
