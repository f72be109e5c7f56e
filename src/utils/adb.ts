import { execFileSync, ExecFileSyncOptions } from 'child_process';
import {
  AdbNotFoundError,
  AndroidDevice,
  BridgeError,
  NoDevicesFoundError,
} from '../types';

// Default timeout for ADB commands (5 seconds)
const DEFAULT_TIMEOUT = 5000;
const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024;
const DEVICE_LIST_HEADER = 'List of devices attached';

export interface BridgeCallOptions {
  timeoutMs?: number;
}

/**
 * Command channel to a single device. Calls block until the bridge exits and
 * raise {@link BridgeError} on a non-zero exit.
 */
export interface Bridge {
  readonly serial: string;
  shell(command: string, options?: BridgeCallOptions): string;
  command(args: readonly string[], options?: BridgeCallOptions): string;
  commandBinary(args: readonly string[], options?: BridgeCallOptions): Buffer;
}

export interface AdbBridgeOptions {
  adbPath?: string;
  defaultTimeoutMs?: number;
}

interface ExecFailure {
  code?: string;
  status?: number | null;
  stdout: string;
  stderr: string;
  message: string;
}

function outputToString(output: unknown): string {
  if (Buffer.isBuffer(output)) {
    return output.toString('utf-8');
  }
  return typeof output === 'string' ? output : '';
}

function describeExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return { stdout: '', stderr: '', message: String(error) };
  }

  const failure: ExecFailure = {
    stdout: 'stdout' in error ? outputToString(error.stdout) : '',
    stderr: 'stderr' in error ? outputToString(error.stderr) : '',
    message: error instanceof Error ? error.message : String(error),
  };
  if ('code' in error && typeof error.code === 'string') {
    failure.code = error.code;
  }
  if ('status' in error && (typeof error.status === 'number' || error.status === null)) {
    failure.status = error.status;
  }
  return failure;
}

function runAdb(adbPath: string, args: readonly string[], timeoutMs: number): Buffer {
  const execOptions: ExecFileSyncOptions = {
    stdio: 'pipe',
    timeout: timeoutMs,
    maxBuffer: DEFAULT_MAX_BUFFER,
  };

  try {
    const result = execFileSync(adbPath, args, execOptions);
    return Buffer.isBuffer(result) ? result : Buffer.from(result);
  } catch (error) {
    const failure = describeExecFailure(error);
    if (failure.code === 'ENOENT') {
      throw new AdbNotFoundError(adbPath);
    }

    const stderr = failure.stderr.trim();
    throw new BridgeError(
      'ADB_COMMAND_FAILED',
      `ADB command failed: ${stderr || failure.message}`,
      {
        command: [adbPath, ...args].join(' '),
        status: failure.status ?? null,
        stdout: failure.stdout,
        stderr: failure.stderr,
      }
    );
  }
}

export class AdbBridge implements Bridge {
  readonly serial: string;
  private readonly adbPath: string;
  private readonly defaultTimeoutMs: number;

  constructor(serial: string, options: AdbBridgeOptions = {}) {
    this.serial = serial;
    this.adbPath = options.adbPath ?? 'adb';
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT;
  }

  shell(command: string, options: BridgeCallOptions = {}): string {
    return this.command(['shell', command], options);
  }

  command(args: readonly string[], options: BridgeCallOptions = {}): string {
    return this.commandBinary(args, options).toString('utf-8');
  }

  commandBinary(args: readonly string[], options: BridgeCallOptions = {}): Buffer {
    return runAdb(
      this.adbPath,
      ['-s', this.serial, ...args],
      options.timeoutMs ?? this.defaultTimeoutMs
    );
  }
}

// Parse `adb devices -l` style output; lines before the header are daemon noise
export function parseDeviceList(output: string): AndroidDevice[] {
  const lines = output.split(/\r?\n/);
  const headerIndex = lines.findIndex(line => line.startsWith(DEVICE_LIST_HEADER));

  if (headerIndex === -1) {
    throw new BridgeError('UNPARSABLE_DEVICE_LIST', `Could not parse adb output: '${output}'`, {
      stdout: output,
    });
  }

  const devices: AndroidDevice[] = [];
  for (const rawLine of lines.slice(headerIndex + 1)) {
    const line = rawLine.trim();
    if (!line) continue;

    const [id, status, ...extra] = line.split(/\s+/);
    const device: AndroidDevice = {
      id,
      status: isDeviceStatus(status) ? status : 'unknown',
    };

    for (const part of extra) {
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('product:')) {
        device.product = part.substring(8);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      }
    }

    devices.push(device);
  }

  return devices;
}

function isDeviceStatus(value: string | undefined): value is AndroidDevice['status'] {
  return value === 'device' || value === 'offline' || value === 'unauthorized';
}

export function listSerials(output: string): string[] {
  return parseDeviceList(output).map(device => device.id);
}

export function defaultSerial(serials: readonly string[]): string {
  if (serials.length === 0) {
    throw new NoDevicesFoundError();
  }

  if (serials.length > 1) {
    throw new BridgeError(
      'MULTIPLE_DEVICES',
      'More than one device connected',
      { serials: [...serials] },
      'Set ANDROID_SERIAL or pass deviceId to select a device'
    );
  }

  return serials[0];
}

export function listConnectedDevices(adbPath = 'adb'): AndroidDevice[] {
  const output = runAdb(adbPath, ['devices', '-l'], DEFAULT_TIMEOUT).toString('utf-8');
  return parseDeviceList(output);
}
