/**
 * instrument.ts
 *
 * Starts OpenTelemetry before any instrumented library is loaded. Preload it
 * with `node --import ./dist/server/src/instrument.js`; `index.ts` also
 * imports it first, so the SDK is shared when both happen. `telemetry` is
 * null unless `OTEL_ENABLED` is set.
 */

import {loadConfig} from './config.js';
import {startTelemetry} from './observability.js';

const {otel} = loadConfig();

export const telemetry = otel.enabled ? startTelemetry(otel) : null;
