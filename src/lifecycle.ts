import { ROUTES } from './codec';
import { InstallManager } from './install';
import {
  Application,
  BridgeError,
  PreconditionError,
  ProbeKind,
  ServerReadinessState,
  TestServer,
  TimeoutError,
  TransportError,
} from './types';
import { Bridge } from './utils/adb';
import { Transport } from './utils/http';
import { Logger } from './utils/logger';
import { Clock, RetryPolicy, RetryResult, retryUntil, systemClock } from './utils/retry';
import { DEFAULT_HARNESS_CLASS, DEFAULT_HARNESS_RUNNER } from './utils/config';

export const RESPONDING_POLICY: RetryPolicy = { maxAttempts: 30, intervalMs: 1000, timeoutMs: 30000 };
export const READY_POLICY: RetryPolicy = { maxAttempts: 10, intervalMs: 1000, timeoutMs: 10000 };
export const STOP_POLICY: RetryPolicy = { maxAttempts: 5, intervalMs: 1000 };

// Upper bound for a single probe request
export const PROBE_TIMEOUT_MS = 5000;

export interface StartOptions {
  /** Instrumentation arguments that override the defaults. */
  env?: Record<string, string>;
}

export interface StartResult {
  state: 'ready';
  respondingAttempts: number;
  readyAttempts: number;
}

export interface ServerLifecycleOptions {
  bridge: Bridge;
  transport: Transport;
  installer: InstallManager;
  server: TestServer;
  logger: Logger;
  clock?: Clock;
  harnessClass?: string;
  harnessRunner?: string;
}

type Liveness = 'responding' | 'not_responding' | 'unknown';

const isTransportError = (error: unknown): boolean => error instanceof TransportError;

function lastErrorMessage(result: RetryResult): string | undefined {
  if (result.satisfied || result.lastError === undefined) {
    return undefined;
  }
  return result.lastError instanceof Error ? result.lastError.message : String(result.lastError);
}

export function buildInstrumentCommand(
  runner: string,
  env: Record<string, string | number>
): string {
  const args = Object.entries(env).map(([key, value]) => `-e "${key}" "${value}"`);
  return ['am instrument', ...args, runner].join(' ');
}

/**
 * Launches the on-device test-server and walks it through
 * not_started → started → responding → ready.
 */
export class ServerLifecycle {
  private readonly bridge: Bridge;
  private readonly transport: Transport;
  private readonly installer: InstallManager;
  private readonly server: TestServer;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly harnessClass: string;
  private readonly harnessRunner: string;

  constructor(options: ServerLifecycleOptions) {
    this.bridge = options.bridge;
    this.transport = options.transport;
    this.installer = options.installer;
    this.server = options.server;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.harnessClass = options.harnessClass ?? DEFAULT_HARNESS_CLASS;
    this.harnessRunner = options.harnessRunner ?? DEFAULT_HARNESS_RUNNER;
  }

  async start(application: Application, options: StartOptions = {}): Promise<StartResult> {
    let state: ServerReadinessState = 'not_started';
    const transition = (next: ServerReadinessState) => {
      this.logger.debug(`Test-server state ${state} -> ${next}`);
      state = next;
    };

    const testServer = application.testServer;
    if (!testServer) {
      throw new PreconditionError(
        'NO_TEST_SERVER',
        'Invalid application. No test-server set.',
        { package: application.identifier },
        'Provide the test-server package for the application'
      );
    }

    const env: Record<string, string | number> = {
      class: this.harnessClass,
      target_package: application.identifier,
      ...(application.mainActivity ? { main_activity: application.mainActivity } : {}),
      ...options.env,
      test_server_port: this.server.testServerPort,
    };
    const targetPackage = String(env.target_package);

    if (!this.installer.isInstalled(targetPackage)) {
      throw new PreconditionError(
        'APP_NOT_INSTALLED',
        `The application '${targetPackage}' is not installed`,
        { package: targetPackage },
        'Install the application before starting the test-server'
      );
    }

    if (!this.installer.isInstalled(testServer.identifier)) {
      throw new PreconditionError(
        'TEST_SERVER_NOT_INSTALLED',
        `The test-server '${testServer.identifier}' is not installed`,
        { package: testServer.identifier },
        'Install the test-server before starting it'
      );
    }

    const command = buildInstrumentCommand(`${testServer.identifier}/${this.harnessRunner}`, env);
    this.logger.info(`Starting test server using: '${command}'`);

    try {
      this.bridge.shell(command);
    } catch (error) {
      if (!(error instanceof BridgeError)) {
        throw error;
      }
      this.logger.error('Could not start the application. adb shell output:', {
        stderr: error.stderr,
      });
      throw new BridgeError(
        'TEST_SERVER_START_FAILED',
        'Failed to start the application',
        { command, stdout: error.stdout, stderr: error.stderr },
        'Check that the test-server was built for this application'
      );
    }
    transition('started');

    this.portForward();

    const responding = await retryUntil({
      ...RESPONDING_POLICY,
      clock: this.clock,
      tolerate: isTransportError,
      probe: async ({ remainingMs }) => this.ping(this.probeTimeout(remainingMs)),
    });
    if (!responding.satisfied) {
      transition('failed');
      this.logger.error('Could not contact test-server');
      this.logger.error('For information, see the adb logcat');
      throw this.timeoutError('responding', 'started', responding);
    }
    transition('responding');

    const ready = await retryUntil({
      ...READY_POLICY,
      clock: this.clock,
      tolerate: isTransportError,
      probe: async ({ remainingMs }) => this.readyProbe(this.probeTimeout(remainingMs)),
    });
    if (!ready.satisfied) {
      transition('failed');
      this.logger.error('Test-server was never ready');
      this.logger.error('For information, see the adb logcat');
      throw this.timeoutError('ready', 'responding', ready);
    }
    transition('ready');

    return {
      state: 'ready',
      respondingAttempts: responding.attempts,
      readyAttempts: ready.attempts,
    };
  }

  async stop(): Promise<void> {
    const last: { error?: string; liveness?: Liveness } = {};
    const result = await retryUntil({
      ...STOP_POLICY,
      clock: this.clock,
      probe: async () => {
        try {
          await this.transport.get({ route: ROUTES.kill }, { retries: 1, intervalMs: 0 });
          return true;
        } catch (error) {
          if (!(error instanceof TransportError)) {
            throw error;
          }
          // The server may already be gone
          const liveness = await this.liveness();
          last.error = error.message;
          last.liveness = liveness;
          this.logger.debug('Kill request failed', { error: error.message, liveness });
          return liveness === 'not_responding';
        }
      },
    });

    if (!result.satisfied) {
      throw new TimeoutError(
        'TEST_SERVER_STOP_FAILED',
        'Could not kill the test-server',
        'kill',
        last.liveness === 'responding' ? 'responding' : 'failed',
        {
          attempts: result.attempts,
          elapsedMs: result.elapsedMs,
          exhausted: result.exhausted,
          lastError: last.error,
          lastLiveness: last.liveness,
        },
        'Check whether the instrumentation is still running with adb shell ps'
      );
    }
  }

  async isResponding(): Promise<boolean> {
    try {
      return await this.ping(PROBE_TIMEOUT_MS);
    } catch (error) {
      if (error instanceof TransportError) {
        return false;
      }
      throw error;
    }
  }

  async isReady(): Promise<boolean> {
    try {
      return await this.readyProbe(PROBE_TIMEOUT_MS);
    } catch (error) {
      if (error instanceof TransportError) {
        return false;
      }
      throw error;
    }
  }

  portForward(): string {
    const hostPort = this.server.endpoint.port || '80';
    return this.bridge.command(['forward', `tcp:${hostPort}`, `tcp:${this.server.testServerPort}`]);
  }

  private async ping(timeoutMs: number): Promise<boolean> {
    const response = await this.transport.get({ route: ROUTES.ping }, { retries: 1, timeoutMs });
    return response.body === 'pong';
  }

  private async readyProbe(timeoutMs: number): Promise<boolean> {
    const response = await this.transport.get({ route: ROUTES.ready }, { retries: 1, timeoutMs });
    return response.body === 'true';
  }

  // A refused connection means nothing is listening; other failures prove nothing
  private async liveness(): Promise<Liveness> {
    try {
      return (await this.ping(PROBE_TIMEOUT_MS)) ? 'responding' : 'not_responding';
    } catch (error) {
      if (error instanceof TransportError) {
        return error.kind === 'refused' ? 'not_responding' : 'unknown';
      }
      throw error;
    }
  }

  private probeTimeout(remainingMs: number | undefined): number {
    return remainingMs === undefined
      ? PROBE_TIMEOUT_MS
      : Math.max(1, Math.min(PROBE_TIMEOUT_MS, remainingMs));
  }

  private timeoutError(probe: ProbeKind, state: ServerReadinessState, result: RetryResult): TimeoutError {
    const exhausted = result.satisfied ? undefined : result.exhausted;
    const message =
      probe === 'responding' ? 'Could not contact test-server' : 'Test-server was never ready';
    return new TimeoutError(
      probe === 'responding' ? 'TEST_SERVER_NOT_RESPONDING' : 'TEST_SERVER_NOT_READY',
      `${message} after ${result.attempts} attempts (${result.elapsedMs}ms)`,
      probe,
      state,
      {
        attempts: result.attempts,
        elapsedMs: result.elapsedMs,
        exhausted,
        lastError: lastErrorMessage(result),
      },
      probe === 'responding'
        ? 'Check the port forward and the adb logcat output of the instrumentation'
        : 'The harness started but never finished initialising; see the adb logcat output'
    );
  }
}
