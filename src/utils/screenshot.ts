import fs from 'fs';
import path from 'path';
import { BridgeError, ScreenshotResult } from '../types';
import { Bridge } from './adb';

const SCREENCAP_TIMEOUT_MS = 15000;

// Get image dimensions from PNG data
export function getPNGDimensions(pngData: Buffer): { width: number; height: number } {
  // PNG signature: 89 50 4E 47 0D 0A 1A 0A
  if (pngData.length < 24 || pngData.toString('hex', 0, 8) !== '89504e470d0a1a0a') {
    throw new Error('Invalid PNG data');
  }

  // IHDR is always the first chunk: width at bytes 16-19, height at 20-23 (big-endian)
  const width = pngData.readUInt32BE(16);
  const height = pngData.readUInt32BE(20);

  return { width, height };
}

export function captureScreenshot(bridge: Bridge): Buffer {
  return bridge.commandBinary(['exec-out', 'screencap', '-p'], { timeoutMs: SCREENCAP_TIMEOUT_MS });
}

export function saveScreenshot(bridge: Bridge, filePath: string): ScreenshotResult {
  const buffer = captureScreenshot(bridge);

  let dimensions: { width: number; height: number };
  try {
    dimensions = getPNGDimensions(buffer);
  } catch (error) {
    throw new BridgeError(
      'SCREENSHOT_CAPTURE_FAILED',
      `Failed to capture screenshot from device '${bridge.serial}'`,
      {
        deviceId: bridge.serial,
        bytes: buffer.length,
        error: error instanceof Error ? error.message : String(error),
      },
      'Please ensure the device is connected and screen is unlocked'
    );
  }

  const resolvedPath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  fs.writeFileSync(resolvedPath, buffer);

  return { path: resolvedPath, ...dimensions };
}
