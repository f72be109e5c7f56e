import {
  Application,
  BridgeError,
  InstalledApp,
  PostconditionError,
  PreconditionError,
} from './types';
import { Bridge } from './utils/adb';
import { Logger } from './utils/logger';

export const INSTALL_TIMEOUT_MS = 60000;

// The bridge reports the result of pm operations on the last line it prints
export function lastOutputLine(output: string): string {
  const lines = output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
  return lines.length > 0 ? lines[lines.length - 1] : '';
}

export function reportsSuccess(output: string): boolean {
  return lastOutputLine(output).toLowerCase() === 'success';
}

/**
 * Installs, removes and resets packages on one device. Installation state is
 * always read back from the device; nothing is cached between calls.
 */
export class InstallManager {
  constructor(
    private readonly bridge: Bridge,
    private readonly logger: Logger
  ) {}

  installedPackages(): string[] {
    return this.bridge
      .shell('pm list packages')
      .split(/\r?\n/)
      .map(line => line.trim().replace(/^package:/, ''))
      .filter(Boolean);
  }

  installedApps(): InstalledApp[] {
    // Lines look like package:/data/app/base.apk=com.example.app
    return this.bridge
      .shell('pm list packages -f')
      .split(/\r?\n/)
      .map(line => line.trim().replace(/^package:/, ''))
      .filter(Boolean)
      .map(info => {
        const separator = info.lastIndexOf('=');
        return separator === -1
          ? { package: info, path: '' }
          : { package: info.substring(separator + 1), path: info.substring(0, separator) };
      });
  }

  isInstalled(identifier: string): boolean {
    return this.installedPackages().includes(identifier);
  }

  install(application: Application): void {
    this.logger.info(`About to install ${application.path}`, { package: application.identifier });

    if (this.isInstalled(application.identifier)) {
      this.logger.info('Application is already installed. Uninstalling application.', {
        package: application.identifier,
      });
      this.uninstall(application);
    }

    this.installPackage(application);

    if (application.testServer) {
      this.logger.info('Installing the test-server as well', {
        package: application.testServer.identifier,
      });
      this.install(application.testServer);
    }
  }

  ensureInstalled(application: Application): void {
    this.logger.info(`Ensuring ${application.path} is installed`, { package: application.identifier });

    if (this.isInstalled(application.identifier)) {
      this.logger.info('Application is already installed. Will not install.', {
        package: application.identifier,
      });
    } else {
      this.installPackage(application);
    }

    if (application.testServer) {
      this.logger.info('Ensuring the test-server is installed as well', {
        package: application.testServer.identifier,
      });
      this.ensureInstalled(application.testServer);
    }
  }

  uninstall(application: Application): void {
    const packageName = application.identifier;
    this.logger.info(`Uninstalling ${packageName}`);

    const output = this.runReporting(() =>
      this.bridge.command(['uninstall', packageName], { timeoutMs: INSTALL_TIMEOUT_MS })
    );
    if (!reportsSuccess(output)) {
      throw new BridgeError(
        'APP_UNINSTALL_FAILED',
        `Could not uninstall app: ${output.trim()}`,
        { package: packageName, stdout: output }
      );
    }

    if (this.isInstalled(packageName)) {
      throw new PostconditionError(
        'APP_STILL_INSTALLED_AFTER_UNINSTALL',
        `App '${packageName}' was not uninstalled`,
        { package: packageName, output: output.trim() }
      );
    }
  }

  clearData(application: Application): void {
    const packageName = application.identifier;
    this.logger.info(`Clearing ${packageName}`);

    if (!this.isInstalled(packageName)) {
      throw new PreconditionError(
        'APP_NOT_INSTALLED',
        `Cannot clear app. '${packageName}' is not installed`,
        { package: packageName },
        'Install the application before clearing its data'
      );
    }

    const output = this.runReporting(() => this.bridge.shell(`pm clear ${packageName}`));
    if (!reportsSuccess(output)) {
      throw new BridgeError(
        'CLEAR_APP_DATA_FAILED',
        `Could not clear app: ${output.trim()}`,
        { package: packageName, stdout: output }
      );
    }
  }

  // A failing pm command exits non-zero; its output still carries the reason
  private runReporting(call: () => string): string {
    try {
      return call();
    } catch (error) {
      if (error instanceof BridgeError && error.code === 'ADB_COMMAND_FAILED') {
        const combined = [error.stdout.trim(), error.stderr.trim()].filter(Boolean).join('\n');
        if (combined) {
          return combined;
        }
      }
      throw error;
    }
  }

  private installPackage(application: Application): void {
    this.logger.info(`Installing ${application.path}`, { package: application.identifier });

    const output = this.runReporting(() =>
      this.bridge.command(['install', '-r', application.path], { timeoutMs: INSTALL_TIMEOUT_MS })
    );
    if (!reportsSuccess(output)) {
      throw new BridgeError(
        'APP_INSTALL_FAILED',
        `Could not install app: ${output.trim()}`,
        { package: application.identifier, path: application.path, stdout: output },
        /INSTALL_FAILED_NO_MATCHING_ABIS/i.test(output)
          ? 'The APK ABI does not match the device. Build an APK for the device architecture.'
          : undefined
      );
    }

    if (!this.isInstalled(application.identifier)) {
      throw new PostconditionError(
        'APP_NOT_INSTALLED_AFTER_INSTALL',
        `App '${application.identifier}' was not installed`,
        { package: application.identifier, path: application.path, output: output.trim() }
      );
    }
  }
}
