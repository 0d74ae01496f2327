/**
 * A2A routes - agent card and forecast tasks
 */

import type { Router } from '../router.js';
import { sendJson } from '../router.js';
import { conflict, notFound } from '../middleware/error.js';
import type { createAuthMiddleware } from '../middleware/auth.js';
import type { AgentCard } from '../../types.js';
import type { TaskService } from '../../tasks/service.js';

export interface A2ARouteDeps {
  card: AgentCard;
  service: TaskService;
  authenticate: ReturnType<typeof createAuthMiddleware>;
}

export function registerA2ARoutes(router: Router, deps: A2ARouteDeps): void {
  const { card, service, authenticate } = deps;

  // GET /a2a/agent-card - Agent descriptor
  router.get('/a2a/agent-card', (_req, res) => {
    sendJson(res, card);
  });

  // POST /a2a/task - Submit a task; credentials are checked before the body is read
  router.post('/a2a/task', (_req, res, params) => {
    const result = service.submit(params.body, params.bodyError);

    switch (result.kind) {
      case 'conflict':
        throw conflict('task already exists');
      case 'input_required':
      case 'accepted':
      case 'duplicate':
        sendJson(res, result.body);
        return;
    }
  }, { guard: authenticate });

  // GET /a2a/task/:id - Task status
  router.get('/a2a/task/:id', (_req, res, params) => {
    const taskId = params.path[0] ?? '';
    const view = service.getView(taskId);

    if (!view) {
      throw notFound('no such task');
    }

    sendJson(res, view);
  });
}
