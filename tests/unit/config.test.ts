import { loadConfig } from '../../src/utils/config';
import { ConfigError, PreconditionError } from '../../src/types';
import { createLogger, formatLogLine } from '../../src/utils/logger';
import { formatErrorForResponse } from '../../src/utils/error';
import { z } from 'zod';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const { endpoint, ...rest } = loadConfig({});

    expect(endpoint.href).toBe('http://127.0.0.1:34777/');
    expect(rest).toEqual({
      serial: undefined,
      adbPath: 'adb',
      testServerPort: 7102,
      harnessClass: 'sh.calaba.instrumentationbackend.InstrumentationBackend',
      harnessRunner: 'sh.calaba.instrumentationbackend.CalabashInstrumentationTestRunner',
      logLevel: 'info',
    });
  });

  it('should read and coerce environment values', () => {
    const config = loadConfig({
      ANDROID_SERIAL: 'emulator-5556',
      TEST_SERVER_ENDPOINT: 'http://127.0.0.1:40000',
      TEST_SERVER_PORT: '7200',
      LOG_LEVEL: 'debug',
      ADB_PATH: '',
    });

    expect(config.serial).toBe('emulator-5556');
    expect(config.endpoint.port).toBe('40000');
    expect(config.testServerPort).toBe(7200);
    expect(config.logLevel).toBe('debug');
    expect(config.adbPath).toBe('adb');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ TEST_SERVER_PORT: 'seventy' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});

describe('logger', () => {
  it('should format level, message and metadata', () => {
    expect(formatLogLine('warn', 'Kill request failed', { liveness: 'unknown' })).toBe(
      '[android-harness] WARN Kill request failed {"liveness":"unknown"}'
    );
    expect(formatLogLine('info', 'started', {})).toBe('[android-harness] INFO started');
  });

  it('should drop entries below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', line => lines.push(line));

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown');

    expect(lines).toEqual(['[android-harness] WARN shown', '[android-harness] ERROR also shown']);
  });
});

describe('formatErrorForResponse', () => {
  it('should include code and suggestion for harness errors', () => {
    const error = new PreconditionError('APP_NOT_INSTALLED', "The application 'a' is not installed", {}, 'Install it');

    expect(formatErrorForResponse(error)).toBe(
      "APP_NOT_INSTALLED: The application 'a' is not installed\n\nSuggestion: Install it"
    );
  });

  it('should list validation issues', () => {
    const result = z.object({ query: z.string() }).safeParse({});
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    expect(formatErrorForResponse(result.error)).toBe('INVALID_INPUT: query: Required');
  });

  it('should fall back to the message or the value', () => {
    expect(formatErrorForResponse(new Error('plain'))).toBe('plain');
    expect(formatErrorForResponse('text')).toBe('text');
  });
});
