/**
 * observability.ts
 *
 * Initialize the OpenTelemetry SDK for tracing and metrics. This module sets
 * up OTLP HTTP exporters for traces and metrics and enables automatic
 * instrumentation for Node.js libraries. `instrument.ts` starts it only when
 * `OTEL_ENABLED` is set, ahead of fastify and http, so local runs and tests
 * never try to reach a collector.
 */

import {NodeSDK, metrics} from '@opentelemetry/sdk-node';
import {getNodeAutoInstrumentations} from '@opentelemetry/auto-instrumentations-node';
import {OTLPTraceExporter} from '@opentelemetry/exporter-trace-otlp-http';
import {OTLPMetricExporter} from '@opentelemetry/exporter-metrics-otlp-http';
import type {AppConfig} from './config.js';

export function startTelemetry(otel: AppConfig['otel']): NodeSDK {
    const sdk = new NodeSDK({
        traceExporter: new OTLPTraceExporter({url: otel.tracesEndpoint}),
        metricReader: new metrics.PeriodicExportingMetricReader({
            exporter: new OTLPMetricExporter({url: otel.metricsEndpoint}),
            exportIntervalMillis: 10000,
        }),
        instrumentations: [getNodeAutoInstrumentations()],
    });
    sdk.start();
    return sdk;
}
