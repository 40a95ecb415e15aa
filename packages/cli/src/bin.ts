#!/usr/bin/env tsx
import { errorMessage, initTelemetry, shutdownTelemetry } from '@bridgesim/core';

import { createProgram } from './bridgesim.js';

initTelemetry({ serviceName: 'bridgesim' });

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
} finally {
  await shutdownTelemetry();
}
