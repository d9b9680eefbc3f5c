#!/usr/bin/env node

import pkg from '../package.json';
import { loadConfig } from './config';
import { ProcessForeground } from './host';
import { createAutomationService } from './server';
import { AdbDevice, resolveDeviceId } from './utils/adb';
import { errorMessage, formatErrorForResponse, getErrorSuggestion } from './utils/error';
import { createLogger, setLogLevel } from './utils/logger';

const USAGE = `Usage: ui-automator-bridge [options]

Options:
  --port N              Port to listen on (default 8080)
  --host H              Address to bind (default 0.0.0.0)
  --device SERIAL       ADB serial of the target device (default: first available)
  --log-level L         debug | info | warn | error | silent (default info)
  --poll-interval MS    Wait condition poll interval (default 300)
  --command-timeout MS  Per ADB command timeout (default 10000)
  -v, --version         Print the version
  -h, --help            Print this help`;

async function main() {
  const args = process.argv.slice(2);
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    console.log(pkg.version);
    return;
  }
  if (args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return;
  }

  const logger = createLogger('cli');
  try {
    const config = loadConfig(args);
    setLogLevel(config.logLevel);

    const deviceId = await resolveDeviceId(config.deviceId);
    const device = new AdbDevice(deviceId, { commandTimeoutMs: config.commandTimeoutMs });

    const foreground = new ProcessForeground(async () => {
      await service.session.stop();
      process.exit(0);
    });
    const service = createAutomationService(device, {
      host: config.host,
      waitPollIntervalMs: config.waitPollIntervalMs,
      foreground,
    });

    const status = await service.session.start(config.port);
    logger.info('Automation session running', { device: deviceId, url: status.url });
    console.log(status.url);
  } catch (error) {
    const suggestion = getErrorSuggestion(error);
    console.error(
      `Failed to start ui-automator-bridge: ${suggestion ? errorMessage(error) : formatErrorForResponse(error)}`
    );
    if (suggestion) {
      console.error(`Suggestion: ${suggestion}`);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
