import { FastifyInstance } from 'fastify';
import { runDailyReport } from '../../reports/daily-report';
import type { RouteContext } from '../context';

export function registerCronRoutes(app: FastifyInstance, ctx: RouteContext) {
  app.post('/cron/daily-bff-report', async () => {
    const run = await runDailyReport(ctx.config.report, ctx.integrations);
    ctx.logger.info({ delivery: run.delivery.status, reason: run.delivery.reason }, 'daily report composed');
    return run;
  });
}
