import { z } from 'zod';
import { ConfigError } from '../types';

export const DEFAULT_TEST_SERVER_ENDPOINT = 'http://127.0.0.1:34777';
export const DEFAULT_TEST_SERVER_PORT = 7102;
export const DEFAULT_HARNESS_CLASS = 'sh.calaba.instrumentationbackend.InstrumentationBackend';
export const DEFAULT_HARNESS_RUNNER =
  'sh.calaba.instrumentationbackend.CalabashInstrumentationTestRunner';

const EnvSchema = z.object({
  ANDROID_SERIAL: z.string().min(1).optional(),
  ADB_PATH: z.string().min(1).default('adb'),
  TEST_SERVER_ENDPOINT: z.string().url().default(DEFAULT_TEST_SERVER_ENDPOINT),
  TEST_SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_TEST_SERVER_PORT),
  HARNESS_CLASS: z.string().min(1).default(DEFAULT_HARNESS_CLASS),
  HARNESS_RUNNER: z.string().min(1).default(DEFAULT_HARNESS_RUNNER),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type HarnessConfig = {
  serial?: string;
  adbPath: string;
  endpoint: URL;
  testServerPort: number;
  harnessClass: string;
  harnessRunner: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }

  const values = parsed.data;
  return {
    serial: values.ANDROID_SERIAL,
    adbPath: values.ADB_PATH,
    endpoint: new URL(values.TEST_SERVER_ENDPOINT),
    testServerPort: values.TEST_SERVER_PORT,
    harnessClass: values.HARNESS_CLASS,
    harnessRunner: values.HARNESS_RUNNER,
    logLevel: values.LOG_LEVEL,
  };
}
