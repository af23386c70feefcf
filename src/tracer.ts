/**
 * @file Starts OpenTelemetry tracing for a CLI run. Spans are exported over
 * OTLP when `OTEL_EXPORTER_OTLP_ENDPOINT` is set and printed to the console
 * otherwise. Service identity comes from the standard `OTEL_SERVICE_NAME`
 * variable.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  SpanExporter,
} from '@opentelemetry/sdk-trace-node';
import type { Logger as WinstonLogger } from 'winston';
import { toError } from './common/AppError.js';

let sdk: NodeSDK | undefined;

/**
 * Starts the NodeSDK. Failures are logged and the run continues untraced.
 *
 * @returns true when tracing is active.
 */
export function initTracer(logger: WinstonLogger): boolean {
  if (sdk) {
    return true;
  }
  try {
    const useOtlp = Boolean(process.env.OTEL_EXPORTER_OTLP_ENDPOINT);
    const exporter: SpanExporter = useOtlp
      ? new OTLPTraceExporter()
      : new ConsoleSpanExporter();

    sdk = new NodeSDK({
      spanProcessors: [new BatchSpanProcessor(exporter)],
    });
    sdk.start();
    logger.info(
      `OpenTelemetry tracing started (${useOtlp ? 'OTLP' : 'console'} exporter)`
    );

    process.once('SIGTERM', () => {
      shutdownTracer(logger)
        .catch((error: unknown) =>
          logger.error(`Error shutting down OpenTelemetry tracing: ${toError(error).message}`)
        )
        .finally(() => process.exit(0));
    });
    return true;
  } catch (error) {
    sdk = undefined;
    logger.error(`Failed to start OpenTelemetry tracing: ${toError(error).message}`);
    return false;
  }
}

/**
 * Flushes buffered spans and stops the SDK. No-op when tracing never started.
 */
export async function shutdownTracer(logger: WinstonLogger): Promise<void> {
  const active = sdk;
  sdk = undefined;
  if (!active) {
    return;
  }
  await active.shutdown();
  logger.info('OpenTelemetry tracing terminated');
}
