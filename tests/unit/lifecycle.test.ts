import { InstallManager } from '../../src/install';
import { buildInstrumentCommand, ServerLifecycle } from '../../src/lifecycle';
import {
  Application,
  BridgeError,
  PreconditionError,
  TestServer,
  TimeoutError,
  TransportError,
} from '../../src/types';
import { silentLogger } from '../../src/utils/logger';
import { FakeBridge, FakeClock, FakeTransport, failingShell } from '../mocks/adb.mock';

const server: TestServer = { endpoint: new URL('http://127.0.0.1:34777'), testServerPort: 7102 };
const testServer: Application = { identifier: 'com.example.test', path: '/apks/test-server.apk' };
const app: Application = {
  identifier: 'com.example',
  path: '/apks/app.apk',
  mainActivity: 'com.example.MainActivity',
  testServer,
};

const refused = () => {
  throw new TransportError('refused', 'connect ECONNREFUSED 127.0.0.1:34777');
};

function createFixture(packages = ['com.example', 'com.example.test']) {
  const bridge = new FakeBridge('emulator-5554', packages);
  const transport = new FakeTransport();
  const clock = new FakeClock();
  const lifecycle = new ServerLifecycle({
    bridge,
    transport,
    installer: new InstallManager(bridge, silentLogger),
    server,
    logger: silentLogger,
    clock,
    harnessClass: 'org.example.harness.Backend',
    harnessRunner: 'org.example.harness.Runner',
  });
  return { bridge, transport, clock, lifecycle };
}

function failThenReply(failures: number, body: string) {
  let calls = 0;
  return () => {
    calls++;
    if (calls <= failures) {
      return refused();
    }
    return { status: 200, body };
  };
}

describe('buildInstrumentCommand', () => {
  it('should quote each instrumentation argument', () => {
    expect(buildInstrumentCommand('pkg/Runner', { class: 'a.B', test_server_port: 7102 })).toBe(
      'am instrument -e "class" "a.B" -e "test_server_port" "7102" pkg/Runner'
    );
  });
});

describe('ServerLifecycle', () => {
  describe('start', () => {
    it('should launch, forward and wait for the server', async () => {
      const { bridge, transport, lifecycle } = createFixture();
      transport.on('ping', failThenReply(3, 'pong')).on('ready', failThenReply(1, 'true'));

      const result = await lifecycle.start(app);

      expect(result).toEqual({ state: 'ready', respondingAttempts: 4, readyAttempts: 2 });
      const launches = bridge.calls.filter(call => call.args[0].startsWith('am instrument'));
      expect(launches.map(call => call.args[0])).toEqual([
        'am instrument -e "class" "org.example.harness.Backend" -e "target_package" "com.example" ' +
          '-e "main_activity" "com.example.MainActivity" -e "test_server_port" "7102" ' +
          'com.example.test/org.example.harness.Runner',
      ]);
      expect(bridge.calls.filter(call => call.kind === 'command')).toEqual([
        { kind: 'command', args: ['forward', 'tcp:34777', 'tcp:7102'], timeoutMs: undefined },
      ]);
    });

    it('should let callers override defaults but never the test-server port', async () => {
      const { bridge, transport, lifecycle } = createFixture();
      transport.reply('ping', 'pong').reply('ready', 'true');

      await lifecycle.start(app, {
        env: { main_activity: 'com.example.Other', test_server_port: '1', debug: 'true' },
      });

      const launch = bridge.calls.find(call => call.args[0].startsWith('am instrument'));
      expect(launch?.args[0]).toBe(
        'am instrument -e "class" "org.example.harness.Backend" -e "target_package" "com.example" ' +
          '-e "main_activity" "com.example.Other" -e "test_server_port" "7102" -e "debug" "true" ' +
          'com.example.test/org.example.harness.Runner'
      );
    });

    it('should probe with a single transport try per attempt', async () => {
      const { transport, lifecycle } = createFixture();
      transport.reply('ping', 'pong').reply('ready', 'true');

      await lifecycle.start(app);

      expect(transport.callsTo('ping')[0].options).toEqual({ retries: 1, timeoutMs: 5000 });
      expect(transport.callsTo('ready')[0].options).toEqual({ retries: 1, timeoutMs: 5000 });
    });

    it('should require a test-server', async () => {
      const { bridge, lifecycle } = createFixture();

      await expect(lifecycle.start({ identifier: 'com.example', path: '/apks/app.apk' })).rejects.toThrow(
        'Invalid application. No test-server set.'
      );
      expect(bridge.calls).toEqual([]);
    });

    it('should name the missing application', async () => {
      const { lifecycle } = createFixture(['com.example.test']);

      await expect(lifecycle.start(app)).rejects.toThrow("The application 'com.example' is not installed");
    });

    it('should name the missing test-server', async () => {
      const { bridge, lifecycle } = createFixture(['com.example']);

      const failure = lifecycle.start(app);

      await expect(failure).rejects.toBeInstanceOf(PreconditionError);
      await expect(failure).rejects.toThrow("The test-server 'com.example.test' is not installed");
      expect(bridge.calls.some(call => call.args[0].startsWith('am instrument'))).toBe(false);
    });

    it('should stop when the launch fails', async () => {
      const { bridge, transport, lifecycle } = createFixture();
      bridge.shellHandler = failingShell('Error: Unable to find instrumentation info');

      const failure = lifecycle.start(app);

      await expect(failure).rejects.toBeInstanceOf(BridgeError);
      await expect(failure).rejects.toMatchObject({
        code: 'TEST_SERVER_START_FAILED',
        stderr: 'Error: Unable to find instrumentation info',
      });
      expect(transport.calls).toEqual([]);
      expect(bridge.calls.some(call => call.args[0] === 'forward')).toBe(false);
    });

    it('should give up after 30 unanswered pings and never probe readiness', async () => {
      const { transport, clock, lifecycle } = createFixture();
      transport.on('ping', refused).reply('ready', 'true');

      const failure = lifecycle.start(app);

      await expect(failure).rejects.toBeInstanceOf(TimeoutError);
      await expect(failure).rejects.toMatchObject({
        code: 'TEST_SERVER_NOT_RESPONDING',
        probe: 'responding',
        state: 'started',
      });
      expect(transport.callsTo('ping')).toHaveLength(30);
      expect(transport.callsTo('ready')).toHaveLength(0);
      expect(clock.current).toBe(29000);
    });

    it('should keep polling while the server answers something other than pong', async () => {
      const { transport, lifecycle } = createFixture();
      let calls = 0;
      transport
        .on('ping', () => ({ status: 200, body: ++calls < 5 ? 'starting' : 'pong' }))
        .reply('ready', 'true');

      const result = await lifecycle.start(app);

      expect(result.respondingAttempts).toBe(5);
    });

    it('should give up after 10 readiness probes', async () => {
      const { transport, clock, lifecycle } = createFixture();
      transport.reply('ping', 'pong').reply('ready', 'false');

      const failure = lifecycle.start(app);

      await expect(failure).rejects.toMatchObject({
        code: 'TEST_SERVER_NOT_READY',
        probe: 'ready',
        state: 'responding',
      });
      expect(transport.callsTo('ready')).toHaveLength(10);
      expect(clock.current).toBe(9000);
    });

    it('should surface errors that are not transport failures', async () => {
      const { transport, lifecycle } = createFixture();
      transport.on('ping', () => {
        throw new Error('unexpected');
      });

      await expect(lifecycle.start(app)).rejects.toThrow('unexpected');
      expect(transport.callsTo('ping')).toHaveLength(1);
    });
  });

  describe('stop', () => {
    it('should send a single kill request', async () => {
      const { transport, lifecycle } = createFixture();
      transport.reply('kill', 'Affirmative!');

      await lifecycle.stop();

      expect(transport.calls).toEqual([
        { method: 'GET', request: { route: 'kill' }, options: { retries: 1, intervalMs: 0 } },
      ]);
    });

    it('should accept a failed kill when nothing is listening any more', async () => {
      const { transport, lifecycle } = createFixture();
      transport.on('kill', refused).on('ping', refused);

      await expect(lifecycle.stop()).resolves.toBeUndefined();
      expect(transport.callsTo('kill')).toHaveLength(1);
    });

    it('should retry while the server still answers pong', async () => {
      const { transport, lifecycle } = createFixture();
      transport.on('kill', failThenReply(2, 'ok')).reply('ping', 'pong');

      await lifecycle.stop();

      expect(transport.callsTo('kill')).toHaveLength(3);
    });

    it('should retry when the liveness check itself is inconclusive', async () => {
      const { transport, clock, lifecycle } = createFixture();
      transport.on('kill', refused).on('ping', () => {
        throw new TransportError('timeout', 'Test-server did not answer within 5000ms');
      });

      await expect(lifecycle.stop()).rejects.toMatchObject({
        code: 'TEST_SERVER_STOP_FAILED',
        probe: 'kill',
        state: 'failed',
        details: {
          attempts: 5,
          elapsedMs: 4000,
          exhausted: 'attempts',
          lastError: 'connect ECONNREFUSED 127.0.0.1:34777',
          lastLiveness: 'unknown',
        },
      });
      expect(transport.callsTo('kill')).toHaveLength(5);
      expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000]);
    });

    it('should report a server that keeps answering pong', async () => {
      const { transport, lifecycle } = createFixture();
      transport.on('kill', refused).reply('ping', 'pong');

      await expect(lifecycle.stop()).rejects.toMatchObject({
        state: 'responding',
        details: { lastLiveness: 'responding' },
      });
    });
  });

  describe('status probes', () => {
    it('should report a responding and ready server', async () => {
      const { transport, lifecycle } = createFixture();
      transport.reply('ping', 'pong').reply('ready', 'true');

      await expect(lifecycle.isResponding()).resolves.toBe(true);
      await expect(lifecycle.isReady()).resolves.toBe(true);
    });

    it('should treat transport errors as not responding', async () => {
      const { transport, lifecycle } = createFixture();
      transport.on('ping', refused).on('ready', refused);

      await expect(lifecycle.isResponding()).resolves.toBe(false);
      await expect(lifecycle.isReady()).resolves.toBe(false);
    });
  });
});
