import { z } from 'zod';

// Device information interfaces
export interface AndroidDevice {
  id: string;
  status: 'device' | 'offline' | 'unauthorized' | 'unknown';
  model?: string;
  product?: string;
  transportId?: string;
}

export interface Point {
  x: number;
  y: number;
}

/**
 * Host side of the test-server binding. `endpoint` is where requests are sent,
 * `testServerPort` is the port the harness listens on inside the device.
 */
export interface TestServer {
  endpoint: URL;
  testServerPort: number;
}

/**
 * An installable package. When `testServer` is set, both packages must be
 * installed before the application can be driven.
 */
export interface Application {
  identifier: string;
  path: string;
  mainActivity?: string;
  testServer?: Application;
}

export interface InstalledApp {
  package: string;
  path: string;
}

export type ServerReadinessState = 'not_started' | 'started' | 'responding' | 'ready' | 'failed';

export interface ScreenshotResult {
  path: string;
  width: number;
  height: number;
}

// Error handling interfaces
export interface HarnessErrorShape {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

export class HarnessError extends Error implements HarnessErrorShape {
  code: string;
  details?: Record<string, unknown>;
  suggestion?: string;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class BridgeError extends HarnessError {
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    code: string,
    message: string,
    details: Record<string, unknown> & { stdout?: string; stderr?: string } = {},
    suggestion?: string
  ) {
    super(code, message, details, suggestion);
    this.name = 'BridgeError';
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
  }
}

export class AdbNotFoundError extends BridgeError {
  constructor(adbPath: string) {
    super(
      'ADB_NOT_FOUND',
      `Android Debug Bridge (ADB) not found at '${adbPath}'`,
      { adbPath },
      'Install Android SDK Platform Tools and ensure ADB is in your PATH, or set ADB_PATH'
    );
    this.name = 'AdbNotFoundError';
  }
}

export class NoDevicesFoundError extends BridgeError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      'No devices visible on adb',
      {},
      'Connect a device or start an emulator and check that it is listed by `adb devices`'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export type TransportErrorKind = 'refused' | 'timeout' | 'network' | 'status';

export class TransportError extends HarnessError {
  readonly kind: TransportErrorKind;
  readonly status?: number;

  constructor(
    kind: TransportErrorKind,
    message: string,
    details: Record<string, unknown> & { status?: number } = {}
  ) {
    super('TRANSPORT_FAILED', message, { kind, ...details });
    this.name = 'TransportError';
    this.kind = kind;
    this.status = details.status;
  }
}

export class ProtocolError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ProtocolError';
  }
}

export class PreconditionError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(code, message, details, suggestion);
    this.name = 'PreconditionError';
  }
}

export class PostconditionError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PostconditionError';
  }
}

export type ProbeKind = 'responding' | 'ready' | 'kill';

export class TimeoutError extends HarnessError {
  readonly probe: ProbeKind;
  readonly state: ServerReadinessState;

  constructor(
    code: string,
    message: string,
    probe: ProbeKind,
    state: ServerReadinessState,
    details: Record<string, unknown> = {},
    suggestion?: string
  ) {
    super(code, message, { probe, state, ...details }, suggestion);
    this.name = 'TimeoutError';
    this.probe = probe;
    this.state = state;
  }
}

export class FormatError extends HarnessError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FormatError';
  }
}

export class ConfigError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, details, 'Check the environment variables passed to the server');
    this.name = 'ConfigError';
  }
}

// Tool input schemas
const DeviceIdField = z
  .string()
  .optional()
  .describe('Serial of the device to drive. Defaults to ANDROID_SERIAL or the only connected device.');

const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const ApplicationInputSchema = z.object({
  deviceId: DeviceIdField,
  packageName: z.string().min(1).describe('Package name of the application under test'),
  apkPath: z.string().min(1).describe('Path of the application package on the host'),
  mainActivity: z.string().optional().describe('Activity launched by the harness'),
  testServerPackage: z.string().min(1).optional().describe('Package name of the test-server'),
  testServerApkPath: z.string().min(1).optional().describe('Path of the test-server package on the host'),
});

export const ListDevicesInputSchema = z.object({});

export const UninstallAppInputSchema = z.object({
  deviceId: DeviceIdField,
  packageName: z.string().min(1),
});

export const ClearAppDataInputSchema = UninstallAppInputSchema;

export const StartTestServerInputSchema = ApplicationInputSchema.extend({
  env: z
    .record(z.string())
    .optional()
    .describe('Extra instrumentation arguments; test_server_port cannot be overridden'),
});

export const DeviceOnlyInputSchema = z.object({
  deviceId: DeviceIdField,
});

export const PerformActionInputSchema = z.object({
  deviceId: DeviceIdField,
  action: z.string().min(1),
  arguments: z.array(z.unknown()).default([]),
});

export const EnterTextInputSchema = z.object({
  deviceId: DeviceIdField,
  text: z.string(),
});

export const MapRouteInputSchema = z.object({
  deviceId: DeviceIdField,
  query: z.string(),
  methodName: z.string().min(1),
  arguments: z
    .array(z.unknown())
    .default([])
    .describe('Method references: a bare name, or an object with exactly one key mapping a name to its arguments'),
});

export const PointGestureInputSchema = z.object({
  deviceId: DeviceIdField,
  query: z.string(),
  at: PointSchema.optional(),
  offset: PointSchema.optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
});

export const LongPressInputSchema = PointGestureInputSchema.extend({
  durationMs: z.number().int().nonnegative().optional(),
});

export const SwipeInputSchema = z.object({
  deviceId: DeviceIdField,
  query: z.string(),
  from: PointSchema,
  to: PointSchema,
  durationMs: z.number().int().nonnegative().optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
});

export const TakeScreenshotInputSchema = z.object({
  deviceId: DeviceIdField,
  path: z.string().min(1).describe('Where to write the PNG on the host'),
});

// Tool JSON schemas
const deviceIdProperty = {
  type: 'string' as const,
  description: 'Serial of the device to drive. Defaults to ANDROID_SERIAL or the only connected device.',
};

const pointProperty = {
  type: 'object' as const,
  properties: {
    x: { type: 'number' as const },
    y: { type: 'number' as const },
  },
  required: ['x', 'y'],
};

const applicationProperties = {
  deviceId: deviceIdProperty,
  packageName: { type: 'string' as const, description: 'Package name of the application under test' },
  apkPath: { type: 'string' as const, description: 'Path of the application package on the host' },
  mainActivity: { type: 'string' as const, description: 'Activity launched by the harness' },
  testServerPackage: { type: 'string' as const, description: 'Package name of the test-server' },
  testServerApkPath: {
    type: 'string' as const,
    description: 'Path of the test-server package on the host',
  },
};

export const ListDevicesToolSchema = {
  type: 'object' as const,
  properties: {},
  required: [] as string[],
};

export const ApplicationToolSchema = {
  type: 'object' as const,
  properties: applicationProperties,
  required: ['packageName', 'apkPath'],
};

export const PackageToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    packageName: { type: 'string' as const },
  },
  required: ['packageName'],
};

export const StartTestServerToolSchema = {
  type: 'object' as const,
  properties: {
    ...applicationProperties,
    env: {
      type: 'object' as const,
      additionalProperties: { type: 'string' as const },
      description: 'Extra instrumentation arguments; test_server_port cannot be overridden',
    },
  },
  required: ['packageName', 'apkPath', 'testServerPackage', 'testServerApkPath'],
};

export const DeviceOnlyToolSchema = {
  type: 'object' as const,
  properties: { deviceId: deviceIdProperty },
  required: [] as string[],
};

export const PerformActionToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    action: { type: 'string' as const, description: 'Name of the harness action' },
    arguments: { type: 'array' as const, items: {} },
  },
  required: ['action'],
};

export const EnterTextToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    text: { type: 'string' as const },
  },
  required: ['text'],
};

export const MapRouteToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    query: { type: 'string' as const, description: 'Element query' },
    methodName: { type: 'string' as const, description: 'Map operation, e.g. query or setText' },
    arguments: {
      type: 'array' as const,
      items: {},
      description:
        'Method references: a bare name, or an object with exactly one key mapping a name to its arguments',
    },
  },
  required: ['query', 'methodName'],
};

export const PointGestureToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    query: { type: 'string' as const, description: 'Element query' },
    at: { ...pointProperty, description: 'Position within the element in percent' },
    offset: { ...pointProperty, description: 'Offset in pixels added to the position' },
    timeoutMs: { type: 'number' as const, description: 'How long to wait for the element' },
  },
  required: ['query'],
};

export const LongPressToolSchema = {
  ...PointGestureToolSchema,
  properties: {
    ...PointGestureToolSchema.properties,
    durationMs: { type: 'number' as const, description: 'Press duration in milliseconds' },
  },
};

export const SwipeToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    query: { type: 'string' as const, description: 'Element query' },
    from: pointProperty,
    to: pointProperty,
    durationMs: { type: 'number' as const },
    timeoutMs: { type: 'number' as const },
  },
  required: ['query', 'from', 'to'],
};

export const TakeScreenshotToolSchema = {
  type: 'object' as const,
  properties: {
    deviceId: deviceIdProperty,
    path: { type: 'string' as const, description: 'Where to write the PNG on the host' },
  },
  required: ['path'],
};
