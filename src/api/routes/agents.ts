import { FastifyInstance } from 'fastify';
import { dispatchAgentTask } from '../../agents/dispatch';
import { AGENTS } from '../../agents/registry';
import { parseAgentTask } from '../../agents/task-schema';
import type { RouteContext } from '../context';

export function registerAgentRoutes(app: FastifyInstance, ctx: RouteContext) {
  for (const agent of AGENTS) {
    app.post(`/gpt/${agent.id}`, async (req, reply) => {
      const parsed = parseAgentTask(agent.kind, req.body);
      if (!parsed.ok) return reply.code(400).send({ error: 'invalid_task', details: parsed.errors });
      return dispatchAgentTask(agent, parsed.value, ctx);
    });
  }
}
