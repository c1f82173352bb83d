import { NodeSDK } from "@opentelemetry/sdk-node";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { ConsoleSpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { Resource } from "@opentelemetry/resources";
import { SEMRESATTRS_DEPLOYMENT_ENVIRONMENT, SEMRESATTRS_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { config } from "./config";
import { logger } from "./logger";
import { SYSTEM_TRACE_ID } from "./trace/trace";

export type TelemetrySettings = {
  serviceName: string;
  environment: string;
};

export function telemetryResource(settings: TelemetrySettings): Resource {
  return new Resource({
    [SEMRESATTRS_SERVICE_NAME]: settings.serviceName,
    [SEMRESATTRS_DEPLOYMENT_ENVIRONMENT]: settings.environment
  });
}

let sdk: NodeSDK | null = null;

export async function startTelemetry(): Promise<void> {
  if (!config.telemetry.enabled) {
    logger.info({ traceId: SYSTEM_TRACE_ID }, "Telemetry disabled");
    return;
  }
  sdk = new NodeSDK({
    resource: telemetryResource({ serviceName: config.serviceName, environment: config.telemetry.environment }),
    spanProcessor: new SimpleSpanProcessor(new ConsoleSpanExporter()),
    instrumentations: [getNodeAutoInstrumentations()]
  });
  sdk.start();
}

export async function stopTelemetry(): Promise<void> {
  if (sdk) {
    await sdk.shutdown();
    sdk = null;
  }
}
