import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
  CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { toMethodRef } from './codec';
import { DeviceController } from './device';
import {
  AndroidDevice,
  Application,
  ApplicationInputSchema,
  ApplicationToolSchema,
  ClearAppDataInputSchema,
  DeviceOnlyInputSchema,
  DeviceOnlyToolSchema,
  EnterTextInputSchema,
  EnterTextToolSchema,
  FormatError,
  ListDevicesInputSchema,
  ListDevicesToolSchema,
  LongPressInputSchema,
  LongPressToolSchema,
  MapRouteInputSchema,
  MapRouteToolSchema,
  PackageToolSchema,
  PerformActionInputSchema,
  PerformActionToolSchema,
  PointGestureInputSchema,
  PointGestureToolSchema,
  StartTestServerInputSchema,
  StartTestServerToolSchema,
  SwipeInputSchema,
  SwipeToolSchema,
  TakeScreenshotInputSchema,
  TakeScreenshotToolSchema,
  UninstallAppInputSchema,
} from './types';
import { defaultSerial, listConnectedDevices } from './utils/adb';
import { HarnessConfig, loadConfig } from './utils/config';
import { formatErrorForResponse } from './utils/error';
import { createLogger, Logger } from './utils/logger';

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface HarnessServerOptions {
  config?: HarnessConfig;
  logger?: Logger;
  listDevices?: () => AndroidDevice[];
  createController?: (serial: string) => DeviceController;
}

export const TOOLS: Tool[] = [
  {
    name: 'list_devices',
    description: 'List devices visible to adb',
    inputSchema: ListDevicesToolSchema,
  },
  {
    name: 'install_app',
    description: 'Install an application (and its test-server), reinstalling when present',
    inputSchema: ApplicationToolSchema,
  },
  {
    name: 'ensure_app_installed',
    description: 'Install an application (and its test-server) only when missing',
    inputSchema: ApplicationToolSchema,
  },
  {
    name: 'uninstall_app',
    description: 'Uninstall a package and verify it is gone',
    inputSchema: PackageToolSchema,
  },
  {
    name: 'clear_app_data',
    description: 'Clear the data of an installed package',
    inputSchema: PackageToolSchema,
  },
  {
    name: 'start_test_server',
    description: 'Launch the instrumentation test-server and wait until it is ready',
    inputSchema: StartTestServerToolSchema,
  },
  {
    name: 'stop_test_server',
    description: 'Shut the test-server down',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'test_server_status',
    description: 'Report whether the test-server is responding and ready',
    inputSchema: DeviceOnlyToolSchema,
  },
  {
    name: 'perform_action',
    description: 'Run a named harness action',
    inputSchema: PerformActionToolSchema,
  },
  {
    name: 'enter_text',
    description: 'Type text with the on-device keyboard',
    inputSchema: EnterTextToolSchema,
  },
  {
    name: 'map_route',
    description: 'Apply an operation to every element matching a query',
    inputSchema: MapRouteToolSchema,
  },
  {
    name: 'tap',
    description: 'Tap an element',
    inputSchema: PointGestureToolSchema,
  },
  {
    name: 'double_tap',
    description: 'Double-tap an element',
    inputSchema: PointGestureToolSchema,
  },
  {
    name: 'long_press',
    description: 'Press and hold an element',
    inputSchema: LongPressToolSchema,
  },
  {
    name: 'pan',
    description: 'Swipe between two points inside an element',
    inputSchema: SwipeToolSchema,
  },
  {
    name: 'flick',
    description: 'Flick between two points inside an element',
    inputSchema: SwipeToolSchema,
  },
  {
    name: 'take_screenshot',
    description: 'Capture the device screen to a PNG file',
    inputSchema: TakeScreenshotToolSchema,
  },
];

function textResponse(result: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result ?? null),
      },
    ],
  };
}

export function toApplication(input: z.infer<typeof ApplicationInputSchema>): Application {
  const { testServerPackage, testServerApkPath } = input;
  if ((testServerPackage === undefined) !== (testServerApkPath === undefined)) {
    throw new FormatError(
      'INVALID_TEST_SERVER',
      'testServerPackage and testServerApkPath must be given together',
      { testServerPackage, testServerApkPath }
    );
  }

  return {
    identifier: input.packageName,
    path: input.apkPath,
    mainActivity: input.mainActivity,
    testServer:
      testServerPackage !== undefined && testServerApkPath !== undefined
        ? { identifier: testServerPackage, path: testServerApkPath }
        : undefined,
  };
}

class HarnessMcpServer {
  private server: Server;
  private readonly config: HarnessConfig;
  private readonly logger: Logger;
  private readonly listDevices: () => AndroidDevice[];
  private readonly createController: (serial: string) => DeviceController;
  private readonly controllers = new Map<string, DeviceController>();

  constructor(options: HarnessServerOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    this.listDevices = options.listDevices ?? (() => listConnectedDevices(this.config.adbPath));
    this.createController =
      options.createController ??
      (serial =>
        new DeviceController({
          serial,
          server: { endpoint: this.config.endpoint, testServerPort: this.config.testServerPort },
          adbPath: this.config.adbPath,
          harnessClass: this.config.harnessClass,
          harnessRunner: this.config.harnessRunner,
          logger: this.logger,
        }));

    this.server = new Server(
      {
        name: 'android-harness-mcp',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  async callTool(name: string, args: unknown): Promise<ToolResponse> {
    try {
      return textResponse(await this.dispatch(name, args ?? {}));
    } catch (error) {
      this.logger.warn(`Tool ${name} failed`, { error: formatErrorForResponse(error) });
      return {
        content: [
          {
            type: 'text',
            text: formatErrorForResponse(error),
          },
        ],
        isError: true,
      };
    }
  }

  private async dispatch(name: string, args: unknown): Promise<unknown> {
    switch (name) {
      case 'list_devices':
        ListDevicesInputSchema.parse(args);
        return { devices: this.listDevices() };

      case 'install_app': {
        const input = ApplicationInputSchema.parse(args);
        this.controllerFor(input.deviceId).installApp(toApplication(input));
        return { installed: input.packageName };
      }

      case 'ensure_app_installed': {
        const input = ApplicationInputSchema.parse(args);
        this.controllerFor(input.deviceId).ensureAppInstalled(toApplication(input));
        return { installed: input.packageName };
      }

      case 'uninstall_app': {
        const input = UninstallAppInputSchema.parse(args);
        this.controllerFor(input.deviceId).uninstallApp({ identifier: input.packageName, path: '' });
        return { uninstalled: input.packageName };
      }

      case 'clear_app_data': {
        const input = ClearAppDataInputSchema.parse(args);
        this.controllerFor(input.deviceId).clearAppData({ identifier: input.packageName, path: '' });
        return { cleared: input.packageName };
      }

      case 'start_test_server': {
        const input = StartTestServerInputSchema.parse(args);
        return this.controllerFor(input.deviceId).startApp(toApplication(input), { env: input.env });
      }

      case 'stop_test_server': {
        const input = DeviceOnlyInputSchema.parse(args);
        await this.controllerFor(input.deviceId).stopApp();
        return { stopped: true };
      }

      case 'test_server_status': {
        const input = DeviceOnlyInputSchema.parse(args);
        const controller = this.controllerFor(input.deviceId);
        return {
          responding: await controller.testServerResponding(),
          ready: await controller.testServerReady(),
        };
      }

      case 'perform_action': {
        const input = PerformActionInputSchema.parse(args);
        return this.controllerFor(input.deviceId).performAction(input.action, ...input.arguments);
      }

      case 'enter_text': {
        const input = EnterTextInputSchema.parse(args);
        return this.controllerFor(input.deviceId).enterText(input.text);
      }

      case 'map_route': {
        const input = MapRouteInputSchema.parse(args);
        const methodRefs = input.arguments.map(toMethodRef);
        const results = await this.controllerFor(input.deviceId).mapRoute(
          input.query,
          input.methodName,
          ...methodRefs
        );
        return { results };
      }

      case 'tap':
      case 'double_tap': {
        const input = PointGestureInputSchema.parse(args);
        const controller = this.controllerFor(input.deviceId);
        const options = { at: input.at, offset: input.offset, timeoutMs: input.timeoutMs };
        await (name === 'tap'
          ? controller.tap(input.query, options)
          : controller.doubleTap(input.query, options));
        return { performed: name };
      }

      case 'long_press': {
        const input = LongPressInputSchema.parse(args);
        await this.controllerFor(input.deviceId).longPress(input.query, {
          at: input.at,
          offset: input.offset,
          timeoutMs: input.timeoutMs,
          durationMs: input.durationMs,
        });
        return { performed: name };
      }

      case 'pan':
      case 'flick': {
        const input = SwipeInputSchema.parse(args);
        const controller = this.controllerFor(input.deviceId);
        const options = { durationMs: input.durationMs, timeoutMs: input.timeoutMs };
        await (name === 'pan'
          ? controller.pan(input.query, input.from, input.to, options)
          : controller.flick(input.query, input.from, input.to, options));
        return { performed: name };
      }

      case 'take_screenshot': {
        const input = TakeScreenshotInputSchema.parse(args);
        return this.controllerFor(input.deviceId).screenshot(input.path);
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  }

  // One controller per device; controllers share nothing
  private controllerFor(deviceId?: string): DeviceController {
    const serial =
      deviceId ??
      this.config.serial ??
      defaultSerial(this.listDevices().map(device => device.id));

    let controller = this.controllers.get(serial);
    if (!controller) {
      controller = this.createController(serial);
      this.controllers.set(serial, controller);
    }
    return controller;
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('The android harness MCP server started');
  }
}

// Export the server class
export { HarnessMcpServer };
