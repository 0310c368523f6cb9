/**
 * Hoverfly process lifecycle: start, health-check, mode, shutdown
 *
 * @example
 * ```typescript
 * const hoverfly = new Hoverfly({ adminPort: 0, proxyPort: 0 }, "simulate");
 * await hoverfly.start();
 * await hoverfly.importSimulation(dslSource(service("www.my-test.com").get("/").willReturn(success())));
 * // route HTTP traffic through hoverfly.getProxyUrl()
 * await hoverfly.close();
 * ```
 */
import { spawn, type ChildProcess, type SpawnOptions } from "child_process";
import type { HoverflyClientOptions, HoverflyConfig, HoverflyConfigOptions, HoverflyMode, Simulation } from "../types.js";
import {
  HoverflyClientError,
  HoverflyNotInstalledError,
  HoverflyStartError,
  PortInUseError,
} from "../errors.js";
import { createLogger, type Logger, type LogSink } from "../utils/logger.js";
import type { SimulationSource } from "../simulation/source.js";
import { HoverflyClient } from "./client.js";
import { adminUrlOf, loadHoverflyConfig, proxyUrlOf } from "./config.js";
import { findFreePort, isPortAvailable } from "./ports.js";
import { TempFileManager } from "./temp-files.js";

/**
 * Admin API operations the lifecycle needs
 */
export type AdminClient = Pick<
  HoverflyClient,
  "getHealth" | "setSimulation" | "getSimulation" | "deleteSimulation" | "setMode" | "getMode"
>;

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

/**
 * Collaborators, replaceable in tests
 */
export interface HoverflyDependencies {
  spawn?: SpawnFunction;
  createClient?: (options: HoverflyClientOptions) => AdminClient;
  tempFileManager?: TempFileManager;
  findFreePort?: (host: string) => Promise<number>;
  isPortAvailable?: (port: number, host: string) => Promise<boolean>;
  logSink?: LogSink;
  env?: Record<string, string | undefined>;
  /** Health poll interval in ms (default: 100) */
  pollInterval?: number;
  /** Time between SIGTERM and SIGKILL in ms (default: 5000) */
  killTimeout?: number;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function isMissingBinary(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

/**
 * A local or remote Hoverfly instance
 */
export class Hoverfly {
  private readonly config: HoverflyConfig;
  private readonly logger: Logger;
  private readonly tempFileManager: TempFileManager;
  private readonly spawnProcess: SpawnFunction;
  private readonly createClient: (options: HoverflyClientOptions) => AdminClient;
  private readonly findFreePort: (host: string) => Promise<number>;
  private readonly isPortAvailable: (port: number, host: string) => Promise<boolean>;
  private readonly pollInterval: number;
  private readonly killTimeout: number;

  private client: AdminClient | undefined;
  private child: ChildProcess | undefined;
  private childError: Error | undefined;
  private childExit: { code: number | null; signal: NodeJS.Signals | null } | undefined;
  private running = false;
  private starting: Promise<void> | undefined;

  /**
   * @param options - Configuration, merged over `HOVERFLY_*` environment variables
   * @param mode - Mode set once Hoverfly is healthy (default: "simulate")
   * @param dependencies - Collaborator overrides
   */
  constructor(
    options: HoverflyConfigOptions = {},
    private readonly mode: HoverflyMode = "simulate",
    dependencies: HoverflyDependencies = {}
  ) {
    this.config = loadHoverflyConfig(options, dependencies.env);
    this.logger = createLogger("hoverfly", this.config.logLevel, dependencies.logSink);
    this.tempFileManager = dependencies.tempFileManager ?? new TempFileManager();
    this.spawnProcess = dependencies.spawn ?? spawn;
    this.createClient = dependencies.createClient ?? ((clientOptions) => new HoverflyClient(clientOptions));
    this.findFreePort = dependencies.findFreePort ?? findFreePort;
    this.isPortAvailable = dependencies.isPortAvailable ?? isPortAvailable;
    this.pollInterval = dependencies.pollInterval ?? 100;
    this.killTimeout = dependencies.killTimeout ?? 5000;
  }

  /**
   * Start Hoverfly, or connect to it when `remote` is set.
   * A second call logs a warning and returns; while the first is still
   * starting, it waits for that startup instead.
   *
   * @throws {PortInUseError} If a configured port is taken
   * @throws {HoverflyNotInstalledError} If the binary cannot be found
   * @throws {HoverflyStartError} If Hoverfly exits or is not healthy in time
   */
  async start(): Promise<void> {
    if (this.running || this.starting) {
      this.logger.warn("Local Hoverfly is already running");
      await this.starting;
      return;
    }

    this.starting = this.startOnce();
    try {
      await this.starting;
    } finally {
      this.starting = undefined;
    }
  }

  private async startOnce(): Promise<void> {
    if (this.config.remote) {
      await this.connectRemote();
    } else {
      await this.startLocal();
    }

    this.running = true;
    this.logger.info(
      `Hoverfly started in ${this.mode} mode (admin port ${this.config.adminPort}, proxy port ${this.config.proxyPort})`
    );
  }

  /**
   * Stop the process (SIGTERM, then SIGKILL after the grace period), wait for
   * it to exit, then delete temporary files. Safe to call repeatedly.
   */
  async stop(): Promise<void> {
    const wasRunning = this.running;
    this.running = false;
    this.client = undefined;

    const child = this.child;
    this.child = undefined;
    if (child) {
      await this.terminate(child);
    }

    await this.tempFileManager.purge();

    if (wasRunning) {
      this.logger.info("Hoverfly stopped");
    }
  }

  /**
   * Alias of {@link stop}
   */
  async close(): Promise<void> {
    await this.stop();
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Load a simulation into Hoverfly, replacing the current one
   */
  async importSimulation(source: SimulationSource): Promise<void> {
    const client = this.requireClient();
    this.logger.debug(`Importing simulation from ${source.description}`);
    await client.setSimulation(await source.load());
  }

  async getSimulation(): Promise<Simulation> {
    const client = this.requireClient();
    this.logger.debug("Exporting simulation");
    return client.getSimulation();
  }

  async resetSimulation(): Promise<void> {
    await this.requireClient().deleteSimulation();
  }

  async getMode(): Promise<HoverflyMode> {
    return this.requireClient().getMode();
  }

  /**
   * Resolved configuration. A port configured as 0 reads 0 until `start()`
   * picks a free one.
   */
  getConfig(): Readonly<HoverflyConfig> {
    return { ...this.config };
  }

  /**
   * @throws {HoverflyClientError} If the proxy port is still to be picked by `start()`
   */
  getProxyUrl(): string {
    this.requireResolvedPort("proxyPort");
    return proxyUrlOf(this.config);
  }

  /**
   * @throws {HoverflyClientError} If the admin port is still to be picked by `start()`
   */
  getAdminUrl(): string {
    this.requireResolvedPort("adminPort");
    return adminUrlOf(this.config);
  }

  private requireResolvedPort(port: "adminPort" | "proxyPort"): void {
    if (this.config[port] === 0) {
      throw new HoverflyClientError(`${port} is picked when Hoverfly starts; call start() first`, {
        port,
      });
    }
  }

  private requireClient(): AdminClient {
    if (!this.client) {
      throw new HoverflyClientError("Hoverfly is not running; call start() first");
    }
    return this.client;
  }

  private newClient(): AdminClient {
    return this.createClient({
      baseUrl: adminUrlOf(this.config),
      timeout: this.config.requestTimeout,
    });
  }

  private async connectRemote(): Promise<void> {
    const client = this.newClient();
    if (!(await client.getHealth())) {
      throw new HoverflyStartError(`Remote Hoverfly at ${adminUrlOf(this.config)} is not healthy`);
    }
    await this.applyMode(client);
    this.client = client;
  }

  private async startLocal(): Promise<void> {
    await this.resolvePorts();

    try {
      const args = await this.buildArgs();
      this.logger.debug(`Spawning ${this.config.binaryPath} ${args.join(" ")}`);
      this.spawnChild(args);

      const client = this.newClient();
      await this.waitForHealthy(client);
      await this.applyMode(client);
      this.client = client;
    } catch (error) {
      await this.stop();
      throw error;
    }
  }

  private async resolvePorts(): Promise<void> {
    const { host } = this.config;
    if (this.config.adminPort === 0) {
      this.config.adminPort = await this.findFreePort(host);
    }
    if (this.config.proxyPort === 0) {
      this.config.proxyPort = await this.findFreePort(host);
    }

    for (const port of [this.config.adminPort, this.config.proxyPort]) {
      if (!(await this.isPortAvailable(port, host))) {
        throw new PortInUseError(port);
      }
    }
  }

  private async buildArgs(): Promise<string[]> {
    const args = [
      "-ap",
      String(this.config.adminPort),
      "-pp",
      String(this.config.proxyPort),
      "-db",
      "memory",
    ];

    if (this.mode === "capture") {
      args.push("-capture");
    }
    if (this.config.webserver) {
      args.push("-webserver");
    }
    if (this.config.sslCertificatePath && this.config.sslKeyPath) {
      const cert = await this.tempFileManager.copyFile(this.config.sslCertificatePath, "ca.crt");
      const key = await this.tempFileManager.copyFile(this.config.sslKeyPath, "ca.key");
      args.push("-cert", cert, "-key", key);
    }
    if (this.config.destination) {
      args.push("-destination", this.config.destination);
    }

    return args;
  }

  private spawnChild(args: string[]): void {
    this.childError = undefined;
    this.childExit = undefined;

    const child = this.spawnProcess(this.config.binaryPath, args, { stdio: "ignore" });
    child.once("error", (error) => {
      this.childError = error;
    });
    child.once("exit", (code, signal) => {
      this.childExit = { code, signal };
    });
    this.child = child;
  }

  private async waitForHealthy(client: AdminClient): Promise<void> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.config.startupTimeout) {
      this.assertChildAlive();
      if (await client.getHealth()) {
        return;
      }
      await sleep(this.pollInterval);
    }

    this.assertChildAlive();
    throw new HoverflyStartError(
      `Hoverfly failed to start within ${this.config.startupTimeout}ms`
    );
  }

  private assertChildAlive(): void {
    if (this.childError) {
      if (isMissingBinary(this.childError)) {
        throw new HoverflyNotInstalledError(
          `Hoverfly binary not found: ${this.config.binaryPath}`
        );
      }
      throw new HoverflyStartError(`Unable to start Hoverfly: ${this.childError.message}`);
    }
    if (this.childExit) {
      const { code, signal } = this.childExit;
      throw new HoverflyStartError(
        `Hoverfly exited during startup (${signal ?? `code ${code}`})`,
        code ?? undefined
      );
    }
  }

  private async applyMode(client: AdminClient): Promise<void> {
    if (this.mode === "capture" && this.config.captureHeaders) {
      await client.setMode(this.mode, { headersWhitelist: this.config.captureHeaders });
    } else {
      await client.setMode(this.mode);
    }
  }

  private async terminate(child: ChildProcess): Promise<void> {
    if (child.exitCode !== null || child.signalCode !== null || this.childExit || this.childError) {
      return;
    }

    await new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        child.kill("SIGKILL");
      }, this.killTimeout);

      child.once("exit", () => {
        clearTimeout(killTimer);
        resolve();
      });
      child.kill("SIGTERM");
    });
  }
}
