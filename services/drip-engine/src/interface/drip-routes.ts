import {
  AddRuleCommandSchema,
  CreateDripCommandSchema,
  type Drip,
  type DripApplicationService,
  type Materializable,
  type Queryable,
  type QuerySetRule,
  type RuleValidationError,
  UpdateDripCommandSchema,
} from '@dripline/drip-domain';
import { ValidationError } from '@dripline/domain-kernel';
import { type Context, Hono } from 'hono';
import { z } from 'zod';
import type { Env } from './env.js';

/** A user collection the routes can narrow and read back. */
export type UserCollection<Q> = Queryable<Q> & Materializable<Record<string, unknown>>;

export interface DripRoutesDeps<Q extends UserCollection<Q>> {
  service: DripApplicationService;
  /** A fresh, unfiltered collection of every user. */
  users: () => Q;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const DripIdSchema = z.string().uuid();
const RuleInputSchema = AddRuleCommandSchema.omit({ dripId: true });
const DripChangesSchema = UpdateDripCommandSchema.omit({ dripId: true });
const EnabledSchema = z.object({ enabled: z.boolean() });
const ReorderSchema = z.object({ ruleIds: z.array(z.string().uuid()) });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function readBody(c: Context<Env>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}

function serializeRule(rule: QuerySetRule) {
  return {
    id: rule.id,
    method: rule.method,
    fieldName: rule.fieldName,
    lookup: rule.lookup,
    rawValue: rule.rawValue,
    order: rule.order,
  };
}

function serializeDrip(drip: Drip) {
  return {
    id: drip.id,
    name: drip.name,
    enabled: drip.enabled,
    fromEmail: drip.fromEmail,
    fromEmailName: drip.fromEmailName,
    replyTo: drip.replyTo,
    subjectTemplate: drip.subjectTemplate,
    bodyHtmlTemplate: drip.bodyHtmlTemplate,
    messageClass: drip.messageClass,
    rules: drip.queryRules.map(serializeRule),
    createdAt: drip.createdAt.toISOString(),
    lastChanged: drip.lastChanged.toISOString(),
  };
}

function serializeOutcome(error: RuleValidationError | null) {
  if (!error) return { valid: true };
  return {
    valid: false,
    error: {
      ruleId: error.ruleId,
      category: error.category,
      message: error.message,
    },
  };
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function dripRoutes<Q extends UserCollection<Q>>({
  service,
  users,
}: DripRoutesDeps<Q>): Hono<Env> {
  const routes = new Hono<Env>();

  // POST /api/v1/drips - Create a drip
  routes.post('/api/v1/drips', async (c) => {
    const input = CreateDripCommandSchema.parse(await readBody(c));
    const drip = await service.create(input);
    c.get('logger').info({ dripId: drip.id }, 'Drip created');
    return c.json(serializeDrip(drip), 201);
  });

  // GET /api/v1/drips/:id - Drip with its rules
  routes.get('/api/v1/drips/:id', async (c) => {
    const drip = await service.get(DripIdSchema.parse(c.req.param('id')));
    return c.json(serializeDrip(drip));
  });

  // PATCH /api/v1/drips/:id - Update name and message details
  routes.patch('/api/v1/drips/:id', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const changes = DripChangesSchema.parse(await readBody(c));
    const drip = await service.update({ ...changes, dripId });
    return c.json(serializeDrip(drip));
  });

  // PUT /api/v1/drips/:id/enabled - Enable or disable sending
  routes.put('/api/v1/drips/:id/enabled', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const { enabled } = EnabledSchema.parse(await readBody(c));
    const drip = await service.setEnabled(dripId, enabled);
    c.get('logger').info({ dripId, enabled }, 'Drip toggled');
    return c.json(serializeDrip(drip));
  });

  // POST /api/v1/drips/:id/rules - Append a rule once the rule set still applies
  routes.post('/api/v1/drips/:id/rules', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const input = RuleInputSchema.parse(await readBody(c));
    const rule = await service.addRule({ ...input, dripId }, users());
    return c.json(serializeRule(rule), 201);
  });

  // POST /api/v1/drips/:id/rules/validate - Dry-run a candidate rule
  routes.post('/api/v1/drips/:id/rules/validate', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const input = RuleInputSchema.parse(await readBody(c));
    const { result } = await service.previewRule({ ...input, dripId }, users());
    const error = result.isFailure ? result.getError() : null;
    if (error) {
      c.get('logger').warn(
        { dripId, ruleId: error.ruleId, category: error.category },
        'Candidate rule rejected',
      );
    }
    return c.json(serializeOutcome(error));
  });

  // PUT /api/v1/drips/:id/rules/order - Renumber rules
  routes.put('/api/v1/drips/:id/rules/order', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const { ruleIds } = ReorderSchema.parse(await readBody(c));
    const drip = await service.reorderRules(dripId, ruleIds);
    return c.json(serializeDrip(drip));
  });

  // DELETE /api/v1/drips/:id/rules/:ruleId - Remove a rule
  routes.delete('/api/v1/drips/:id/rules/:ruleId', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const drip = await service.removeRule(dripId, c.req.param('ruleId'));
    return c.json(serializeDrip(drip));
  });

  // GET /api/v1/drips/:id/validation - Check the saved rule set
  routes.get('/api/v1/drips/:id/validation', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const result = await service.validateRules(dripId, users());
    const error = result.isFailure ? result.getError() : null;
    if (error) {
      c.get('logger').warn(
        { dripId, ruleId: error.ruleId, category: error.category },
        'Saved rule set no longer applies',
      );
    }
    return c.json(serializeOutcome(error));
  });

  // GET /api/v1/drips/:id/recipients - Users the drip would go to next
  routes.get('/api/v1/drips/:id/recipients', async (c) => {
    const dripId = DripIdSchema.parse(c.req.param('id'));
    const selected = await service.selectRecipients(dripId, users());
    if (!selected) {
      return c.json({ dripId, enabled: false, recipients: [] });
    }

    const rows = await selected.all();
    const recipients = rows.map((row) => String(row.id));
    c.get('logger').info({ dripId, count: recipients.length }, 'Recipients selected');
    return c.json({ dripId, enabled: true, recipients });
  });

  return routes;
}
