import type { FastifyPluginAsync } from 'fastify';

export interface HealthStatus {
  ok: boolean;
  uptimeSeconds: number;
  ts: string;
}

const routes: FastifyPluginAsync = async app => {
  app.get(
    '/',
    async (): Promise<HealthStatus> => ({
      ok: true,
      uptimeSeconds: Math.round(process.uptime()),
      ts: new Date().toISOString(),
    })
  );
};

export default routes;
