/**
 * Drill Template API Routes
 *
 * Endpoints:
 * - GET /templates - Visible templates, built-in first (?category=)
 * - GET /templates/:id - One template
 * - POST /templates - Add a custom template
 * - PATCH /templates/:id - Edit a custom or built-in template
 * - DELETE /templates/:id - Delete a custom template or hide a built-in one
 * - POST /templates/reset - Restore the built-in catalog
 */

import { Hono } from 'hono';
import type { DrillTemplateService } from '@/core/templates';
import { success, notFound, badRequest } from '../utils/response';
import { parseJsonBody } from '../utils/request';
import {
  createTemplateBodySchema,
  templateListQuerySchema,
  toValidationDetails,
  updateTemplateBodySchema,
} from '../types';

export function templatesRoutes(templates: DrillTemplateService): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    const parsed = templateListQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return badRequest(c, 'Invalid query parameters', toValidationDetails(parsed.error));
    }

    return success(c, { templates: await templates.listTemplates(parsed.data.category) });
  });

  /**
   * Registered before /:id so "reset" is not read as an id.
   */
  router.post('/reset', async (c) => {
    const restored = await templates.resetToDefaults();
    console.log(`[API] Restored ${restored.length} built-in drill templates`);
    return success(c, { templates: restored });
  });

  router.get('/:id', async (c) => {
    const id = c.req.param('id');
    const template = await templates.getTemplate(id);
    if (!template) {
      return notFound(c, 'Drill template', id);
    }
    return success(c, template);
  });

  router.post('/', async (c) => {
    const body = await parseJsonBody(c, createTemplateBodySchema);
    if (!body.success) {
      return body.response;
    }

    const template = await templates.addCustomTemplate(body.data);
    console.log(`[API] Added drill template ${template.id}`);
    return success(c, template, 201);
  });

  router.patch('/:id', async (c) => {
    const id = c.req.param('id');
    const body = await parseJsonBody(c, updateTemplateBodySchema);
    if (!body.success) {
      return body.response;
    }

    const template = await templates.updateTemplate(id, body.data);
    if (!template) {
      return notFound(c, 'Drill template', id);
    }
    return success(c, template);
  });

  router.delete('/:id', async (c) => {
    const id = c.req.param('id');
    if (!(await templates.removeTemplate(id))) {
      return notFound(c, 'Drill template', id);
    }
    return success(c, { id, deleted: true });
  });

  return router;
}
