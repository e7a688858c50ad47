#!/usr/bin/env node
/**
 * Device Launcher
 * ---------------------------------------------
 * Purpose
 * - Start the sample device client with a complete, validated flag set.
 *
 * Usage
 * - `device-launcher [registry_name]` (registry defaults to `iotlab-registry`)
 *
 * Environment
 * - PROJECT_ID, MY_REGION: required; when either is empty nothing is started (exit 255).
 * - HOST: device id; defaults to the short local hostname.
 * - KEY_FILE: private key path for the client; defaults to /var/key/rsa_private.pem.
 * - SAMPLE_INTERPRETER / SAMPLE_SCRIPT: how the client is started (python3 my-sample.py).
 * A `.env` file in the working directory is loaded first; real environment wins.
 *
 * Exit status
 * - The client's own status, or 128+N when it was killed by signal N.
 * - 127 when the interpreter cannot be found, 1 on other launcher failures.
 */
import { EXIT_FAILURE, SERVICE } from './config.js';
import { run } from './run.js';

run(process.env, process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(`[${SERVICE}]`, e instanceof Error ? e.message : e);
    process.exitCode = EXIT_FAILURE;
  });
