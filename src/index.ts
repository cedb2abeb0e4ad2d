#!/usr/bin/env node
/**
 * solis-mqtt
 * ==========
 * Polls a Solis inverter's Wi-Fi data-logger stick and publishes its
 * readings to MQTT with Home Assistant discovery.
 *
 * Usage:
 *   solis-mqtt [--config <path>]
 *
 * Environment:
 *   CONFIG_PATH   configuration.yaml location (default ./configuration.yaml)
 *   LOG_LEVEL     overrides global.log_level
 *   LOG_FORMAT    'pretty' (default) or 'json'
 *   LOG_DIR       also write error.log / combined.log here
 */

import 'dotenv/config';
import { main } from './main';

// exitCode instead of exit() so file transports can flush
main({ argv: process.argv, env: process.env })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // Only reached when the logger itself could not be created
    console.error(err);
    process.exitCode = 1;
  });
