import fs from 'fs';
import os from 'os';
import path from 'path';
import { getPNGDimensions, saveScreenshot } from '../../src/utils/screenshot';
import { BridgeError } from '../../src/types';
import { FakeBridge } from '../mocks/adb.mock';

// Minimal PNG header: signature + IHDR with width=100, height=200
const pngData = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, // PNG signature
  0x00, 0x00, 0x00, 0x0d, // IHDR chunk size (13 bytes)
  0x49, 0x48, 0x44, 0x52, // IHDR chunk type
  0x00, 0x00, 0x00, 0x64, // Width: 100
  0x00, 0x00, 0x00, 0xc8, // Height: 200
  0x08, 0x02, 0x00, 0x00, 0x00, // Bit depth, color type, compression, filter, interlace
  0x00, 0x00, 0x00, 0x00, // CRC (not checked)
]);

describe('Screenshot Utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harness-screenshot-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('getPNGDimensions', () => {
    it('should correctly extract dimensions from PNG data', () => {
      expect(getPNGDimensions(pngData)).toEqual({ width: 100, height: 200 });
    });

    it('should throw error for invalid PNG data', () => {
      expect(() => getPNGDimensions(Buffer.from([0x00, 0x01, 0x02, 0x03]))).toThrow('Invalid PNG data');
    });

    it('should throw error for PNG data that is too short', () => {
      expect(() => getPNGDimensions(Buffer.from([0x89, 0x50, 0x4e, 0x47]))).toThrow('Invalid PNG data');
    });
  });

  describe('saveScreenshot', () => {
    it('should write the capture and create missing directories', () => {
      const bridge = new FakeBridge();
      bridge.screencap = pngData;
      const target = path.join(tempDir, 'nested', 'screen.png');

      const result = saveScreenshot(bridge, target);

      expect(result).toEqual({ path: target, width: 100, height: 200 });
      expect(fs.readFileSync(target).equals(pngData)).toBe(true);
      expect(bridge.calls).toEqual([
        { kind: 'binary', args: ['exec-out', 'screencap', '-p'], timeoutMs: 15000 },
      ]);
    });

    it('should raise BridgeError and write nothing when the capture is not a PNG', () => {
      const bridge = new FakeBridge();
      bridge.screencap = Buffer.from('error: no devices/emulators found');
      const target = path.join(tempDir, 'screen.png');

      expect(() => saveScreenshot(bridge, target)).toThrow(BridgeError);
      expect(fs.existsSync(target)).toBe(false);
    });
  });
});
