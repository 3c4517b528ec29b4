export type ReadinessProbe = () => Promise<boolean>;

export function buildHealthRoutes(serviceName: string, probe: ReadinessProbe) {
  return {
    live: () => ({ ok: true, service: serviceName }),

    ready: async () => {
      const healthy = await probe();
      return {
        status: healthy ? 200 : 503,
        body: { ok: healthy, service: serviceName, checks: { database: healthy ? 'up' : 'down' } }
      };
    }
  };
}
