import { FastifyInstance } from "fastify";

export type ReadinessCheck = {
  name: string;
  check: () => Promise<void>;
};

export async function registerHealthRoutes(app: FastifyInstance, checks: ReadinessCheck[] = []): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async (_request, reply) => {
    const failures: string[] = [];
    await Promise.all(
      checks.map(async ({ name, check }) => {
        try {
          await check();
        } catch (error) {
          failures.push(`${name}: ${error instanceof Error ? error.message : String(error)}`);
        }
      })
    );
    if (failures.length > 0) {
      reply.code(503);
      return { status: "unavailable", failures: failures.sort() };
    }
    return { status: "ready" };
  });
}
