import type { ApiContext } from "../context.js";

export async function getStatus(_request: Request, ctx: ApiContext) {
  const probes = Object.entries(ctx.probes ?? {});
  const [storage, ...results] = await Promise.all([
    ctx.store.ping(),
    ...probes.map(([, probe]) => probe()),
  ]);
  const services: Record<string, boolean> = { storage };
  probes.forEach(([name], i) => {
    services[name] = results[i] ?? false;
  });

  const { queued, running, capacity, workers, accepting } = ctx.coordinator.stats();
  const healthy = accepting && Object.values(services).every(Boolean);
  return Response.json(
    {
      status: healthy ? "ok" : "degraded",
      queue: { queued, running, capacity },
      workers,
      services,
    },
    { status: healthy ? 200 : 503 },
  );
}
