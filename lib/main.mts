#!/usr/bin/env node
/**
 * Process entry point
 *
 * Exit codes: 0 after a graceful shutdown (SIGINT/SIGTERM), 1 on
 * configuration errors, unusable credentials or a fatal AuthError.
 */

import dotenv from 'dotenv';
import { loadConfig } from './config.mjs';
import { LeapConnection } from './connection/LeapConnection.mjs';
import { createMqttTransport } from './connection/MqttTransport.mjs';
import { inspectCredentials, loadHubCredentials } from './crypto/Certificates.mjs';
import { describeError } from './errors.mjs';
import { EventBridge } from './EventBridge.mjs';
import { CLIENT_CONFIG, PROTOCOL_CONFIG } from './LeapProtocol.mjs';
import { createLogger, setLogLevel } from './utils/Logger.mjs';

const logger = createLogger('Main');

async function main(): Promise<number> {
  dotenv.config();

  const config = loadConfig();
  setLogLevel(config.logLevel);
  logger.info(`${CLIENT_CONFIG.NAME} ${CLIENT_CONFIG.VERSION} starting`);

  const credentials = loadHubCredentials(config.hub);
  inspectCredentials(credentials);

  const bridge = new EventBridge(config, {
    hubTransportFactory: () =>
      LeapConnection.open(config.hub, credentials, {
        connect: config.timing.connectTimeout,
        request: PROTOCOL_CONFIG.TIMEOUTS.REQUEST,
      }),
    brokerTransportFactory: createMqttTransport(config.broker),
  });

  return new Promise<number>((resolve) => {
    let exiting = false;
    const shutdown = (code: number) => {
      if (exiting) return;
      exiting = true;
      bridge.stop().then(
        () => resolve(code),
        (error: unknown) => {
          logger.error(`Shutdown failed: ${describeError(error)}`);
          resolve(1);
        }
      );
    };

    process.once('SIGINT', () => shutdown(0));
    process.once('SIGTERM', () => shutdown(0));
    bridge.setOnDiagnostic((diagnostic) => {
      logger.debug(`diagnostic ${diagnostic.code}${diagnostic.topic ? ` on ${diagnostic.topic}` : ''}`);
    });
    bridge.setOnFatal(() => shutdown(1));
    bridge.start();
  });
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    logger.error(`Startup failed: ${describeError(error)}`);
    process.exit(1);
  }
);
