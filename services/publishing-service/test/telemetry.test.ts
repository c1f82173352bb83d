import { SEMRESATTRS_DEPLOYMENT_ENVIRONMENT, SEMRESATTRS_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import { expect, test } from "vitest";
import { telemetryResource } from "../src/telemetry";

test("the telemetry resource names the service and its environment", () => {
  const resource = telemetryResource({ serviceName: "publishing-service", environment: "staging" });

  expect(resource.attributes).toEqual({
    [SEMRESATTRS_SERVICE_NAME]: "publishing-service",
    [SEMRESATTRS_DEPLOYMENT_ENVIRONMENT]: "staging"
  });
});
