import Fastify from "fastify";
import request from "supertest";
import { afterAll, beforeAll, expect, test } from "vitest";
import { registerHealthRoutes } from "../src/health";

const app = Fastify();
let brokerUp = true;

beforeAll(async () => {
  await registerHealthRoutes(app, [
    { name: "db", check: async () => undefined },
    {
      name: "kafka",
      check: async () => {
        if (!brokerUp) {
          throw new Error("broker unreachable");
        }
      }
    }
  ]);
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

test("GET /health", async () => {
  const response = await request(app.server).get("/health");
  expect(response.status).toBe(200);
  expect(response.body).toEqual({ status: "ok" });
});

test("GET /ready when every dependency answers", async () => {
  brokerUp = true;
  const response = await request(app.server).get("/ready");
  expect(response.status).toBe(200);
  expect(response.body).toEqual({ status: "ready" });
});

test("GET /ready names the failing dependency", async () => {
  brokerUp = false;
  const response = await request(app.server).get("/ready");
  expect(response.status).toBe(503);
  expect(response.body).toEqual({ status: "unavailable", failures: ["kafka: broker unreachable"] });
});
