import {
  ActionResult,
  decodeActionResponse,
  decodeGestureResponse,
  decodeMapResponse,
  encodeActionRequest,
  encodeGestureRequest,
  encodeMapRequest,
  MethodRef,
} from './codec';
import * as gestures from './gestures';
import { InstallManager } from './install';
import { ServerLifecycle, StartOptions, StartResult } from './lifecycle';
import { Application, InstalledApp, Point, ScreenshotResult, TestServer } from './types';
import { AdbBridge, Bridge } from './utils/adb';
import { HttpTransport, Transport } from './utils/http';
import { Logger, silentLogger } from './utils/logger';
import { Clock, systemClock } from './utils/retry';
import { saveScreenshot } from './utils/screenshot';

export const DEFAULT_GESTURE_TIMEOUT_MS = 30000;
export const DEFAULT_LONG_PRESS_MS = 1000;
export const DEFAULT_SWIPE_MS = 1000;
const DEFAULT_TOUCH_POINT: Point = { x: 50, y: 50 };

export interface DeviceControllerOptions {
  serial: string;
  server: TestServer;
  bridge?: Bridge;
  createTransport?: (endpoint: URL) => Transport;
  logger?: Logger;
  clock?: Clock;
  adbPath?: string;
  harnessClass?: string;
  harnessRunner?: string;
}

export interface PointGestureOptions {
  /** Position inside the element, in percent of its size. */
  at?: Point;
  offset?: Point;
  timeoutMs?: number;
}

export interface LongPressOptions extends PointGestureOptions {
  durationMs?: number;
}

export interface SwipeOptions {
  durationMs?: number;
  timeoutMs?: number;
}

/**
 * Drives one device: package management through the bridge, the test-server
 * lifecycle, and RPCs against the running test-server.
 */
export class DeviceController {
  readonly identifier: string;
  private currentServer: TestServer;
  private readonly bridge: Bridge;
  private readonly createTransport: (endpoint: URL) => Transport;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly harnessClass?: string;
  private readonly harnessRunner?: string;
  private readonly installer: InstallManager;
  private transport: Transport;
  private lifecycle: ServerLifecycle;

  constructor(options: DeviceControllerOptions) {
    this.identifier = options.serial;
    this.currentServer = options.server;
    this.bridge = options.bridge ?? new AdbBridge(options.serial, { adbPath: options.adbPath });
    this.createTransport = options.createTransport ?? (endpoint => new HttpTransport(endpoint));
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.harnessClass = options.harnessClass;
    this.harnessRunner = options.harnessRunner;
    this.installer = new InstallManager(this.bridge, this.logger);
    this.transport = this.createTransport(this.currentServer.endpoint);
    this.lifecycle = this.buildLifecycle();
  }

  get server(): TestServer {
    return this.currentServer;
  }

  changeServer(server: TestServer): void {
    this.currentServer = server;
    this.transport = this.createTransport(server.endpoint);
    this.lifecycle = this.buildLifecycle();
  }

  // App lifecycle

  installApp(application: Application): void {
    this.installer.install(application);
  }

  ensureAppInstalled(application: Application): void {
    this.installer.ensureInstalled(application);
  }

  uninstallApp(application: Application): void {
    this.installer.uninstall(application);
  }

  clearAppData(application: Application): void {
    this.installer.clearData(application);
  }

  isAppInstalled(identifier: string): boolean {
    return this.installer.isInstalled(identifier);
  }

  installedPackages(): string[] {
    return this.installer.installedPackages();
  }

  installedApps(): InstalledApp[] {
    return this.installer.installedApps();
  }

  // Test-server lifecycle

  startApp(application: Application, options: StartOptions = {}): Promise<StartResult> {
    return this.lifecycle.start(application, options);
  }

  stopApp(): Promise<void> {
    return this.lifecycle.stop();
  }

  testServerResponding(): Promise<boolean> {
    return this.lifecycle.isResponding();
  }

  testServerReady(): Promise<boolean> {
    return this.lifecycle.isReady();
  }

  // RPC

  async performAction(action: string, ...args: unknown[]): Promise<ActionResult> {
    this.logger.info(`Action: ${action} - Arguments: ${args.map(arg => String(arg)).join(', ')}`);
    const response = await this.transport.get(encodeActionRequest(action, args));
    return decodeActionResponse(response.body, action);
  }

  enterText(text: string): Promise<ActionResult> {
    return this.performAction('keyboard_enter_text', text);
  }

  async mapRoute(query: string, methodName: string, ...methodRefs: MethodRef[]): Promise<unknown> {
    const response = await this.transport.get(encodeMapRequest(query, methodName, methodRefs));
    return decodeMapResponse(response.body, query, methodName);
  }

  tap(query: string, options: PointGestureOptions = {}): Promise<void> {
    const gesture = gestures.tap(options.at ?? DEFAULT_TOUCH_POINT, options.offset);
    return this.executeGesture(query, gesture, options.timeoutMs);
  }

  doubleTap(query: string, options: PointGestureOptions = {}): Promise<void> {
    const gesture = gestures.doubleTap(options.at ?? DEFAULT_TOUCH_POINT, options.offset);
    return this.executeGesture(query, gesture, options.timeoutMs);
  }

  longPress(query: string, options: LongPressOptions = {}): Promise<void> {
    const gesture = gestures.longPress(
      options.at ?? DEFAULT_TOUCH_POINT,
      options.offset,
      options.durationMs ?? DEFAULT_LONG_PRESS_MS
    );
    return this.executeGesture(query, gesture, options.timeoutMs);
  }

  pan(query: string, from: Point, to: Point, options: SwipeOptions = {}): Promise<void> {
    const gesture = gestures.swipe(from, to, options.durationMs ?? DEFAULT_SWIPE_MS);
    return this.executeGesture(query, gesture, options.timeoutMs);
  }

  flick(query: string, from: Point, to: Point, options: SwipeOptions = {}): Promise<void> {
    const gesture = gestures.flick(from, to, options.durationMs ?? DEFAULT_SWIPE_MS);
    return this.executeGesture(query, gesture, options.timeoutMs);
  }

  async executeGesture(
    query: string,
    gesture: gestures.GestureDescriptor,
    timeoutMs = DEFAULT_GESTURE_TIMEOUT_MS
  ): Promise<void> {
    const request = gestures.withParameters(gesture, { queryString: query, timeoutMs });
    const response = await this.transport.get(encodeGestureRequest(request), {
      timeoutMs: gestures.gestureRequestTimeoutMs(request),
    });
    decodeGestureResponse(response.body);
  }

  screenshot(filePath: string): ScreenshotResult {
    this.logger.info(`Taking screenshot to '${filePath}'`);
    const result = saveScreenshot(this.bridge, filePath);
    this.logger.info(`Saved screenshot as ${result.path}`);
    return result;
  }

  private buildLifecycle(): ServerLifecycle {
    return new ServerLifecycle({
      bridge: this.bridge,
      transport: this.transport,
      installer: this.installer,
      server: this.currentServer,
      logger: this.logger,
      clock: this.clock,
      harnessClass: this.harnessClass,
      harnessRunner: this.harnessRunner,
    });
  }
}
