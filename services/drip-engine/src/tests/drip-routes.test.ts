import {
  DripApplicationService,
  InMemoryQueryable,
  type RecordSchema,
} from '@dripline/drip-domain';
import {
  InMemoryDripRepository,
  InMemorySentDripRepository,
} from '@dripline/drip-domain/testing';
import pino from 'pino';
import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app.js';

type UserRow = {
  id: string;
  email: string;
  is_staff: boolean;
  date_joined: Date;
  orders: { id: string; total: number }[];
};

const SCHEMA: RecordSchema = {
  fields: ['id', 'email', 'is_staff', 'date_joined'],
  relations: { orders: { fields: ['id', 'total'] } },
};

const USERS: UserRow[] = [
  {
    id: 'u1',
    email: 'ada@example.com',
    is_staff: false,
    date_joined: new Date('2024-01-10T00:00:00Z'),
    orders: [{ id: 'o1', total: 10 }],
  },
  {
    id: 'u2',
    email: 'grace@example.com',
    is_staff: true,
    date_joined: new Date('2023-06-01T00:00:00Z'),
    orders: [],
  },
  {
    id: 'u3',
    email: 'linus@sample.org',
    is_staff: false,
    date_joined: new Date('2024-01-14T00:00:00Z'),
    orders: [
      { id: 'o2', total: 5 },
      { id: 'o3', total: 7 },
    ],
  },
];

const clock = () => new Date('2024-01-15T12:00:00Z');
const logger = pino({ level: 'silent' });
const MISSING_ID = '00000000-0000-4000-8000-000000000000';

const RuleBody = z.object({
  id: z.string(),
  method: z.string(),
  fieldName: z.string(),
  lookup: z.string(),
  rawValue: z.string(),
  order: z.number(),
});

const DripBody = z.object({
  id: z.string(),
  name: z.string(),
  enabled: z.boolean(),
  messageClass: z.string(),
  rules: z.array(RuleBody),
});

const ErrorBody = z.object({
  error: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
  requestId: z.string().optional(),
});

const OutcomeBody = z.object({
  valid: z.boolean(),
  error: z
    .object({ ruleId: z.string(), category: z.string(), message: z.string() })
    .optional(),
});

const RecipientsBody = z.object({
  dripId: z.string(),
  enabled: z.boolean(),
  recipients: z.array(z.string()),
});

async function read<T extends z.ZodTypeAny>(res: Response, schema: T): Promise<z.infer<T>> {
  return schema.parse(await res.json());
}

function json(body: unknown, headers: Record<string, string> = {}) {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

describe('drip routes', () => {
  let sentDrips: InMemorySentDripRepository;
  let service: DripApplicationService;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    sentDrips = new InMemorySentDripRepository();
    service = new DripApplicationService(new InMemoryDripRepository(), sentDrips, clock);
    app = createApp({
      service,
      users: () => InMemoryQueryable.of(USERS, SCHEMA),
      logger,
    });
  });

  async function createDrip(name: string): Promise<string> {
    const res = await app.request('/api/v1/drips', json({ name }));
    return (await read(res, DripBody)).id;
  }

  async function addRule(dripId: string, rule: Record<string, string>) {
    return app.request(`/api/v1/drips/${dripId}/rules`, json(rule));
  }

  it('reports health', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(
      await read(res, z.object({ status: z.string(), service: z.string() })),
    ).toEqual({ status: 'ok', service: 'drip-engine' });
  });

  describe('drips', () => {
    it('creates a disabled drip and reads it back', async () => {
      const res = await app.request('/api/v1/drips', json({ name: ' Welcome ' }));
      expect(res.status).toBe(201);
      const created = await read(res, DripBody);
      expect(created).toMatchObject({
        name: 'Welcome',
        enabled: false,
        messageClass: 'default',
        rules: [],
      });

      const fetched = await app.request(`/api/v1/drips/${created.id}`);
      expect(fetched.status).toBe(200);
      expect((await read(fetched, DripBody)).id).toBe(created.id);
    });

    it('rejects a second drip with the same name', async () => {
      await createDrip('Welcome');
      const res = await app.request('/api/v1/drips', json({ name: 'Welcome' }));
      expect(res.status).toBe(409);
      expect(await read(res, ErrorBody)).toMatchObject({
        error: 'CONFLICT',
        message: 'A drip named "Welcome" already exists',
      });
    });

    it('answers 404 for an unknown drip', async () => {
      const res = await app.request(`/api/v1/drips/${MISSING_ID}`);
      expect(res.status).toBe(404);
      expect((await read(res, ErrorBody)).error).toBe('NOT_FOUND');
    });

    it('answers 400 for a malformed id', async () => {
      const res = await app.request('/api/v1/drips/not-a-uuid');
      expect(res.status).toBe(400);
      expect((await read(res, ErrorBody)).error).toBe('VALIDATION_ERROR');
    });

    it('answers 400 for a body that is not JSON', async () => {
      const res = await app.request('/api/v1/drips', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{name',
      });
      expect(res.status).toBe(400);
      expect(await read(res, ErrorBody)).toMatchObject({
        error: 'VALIDATION_ERROR',
        message: 'Request body must be valid JSON',
      });
    });

    it('renames a drip', async () => {
      const id = await createDrip('Welcome');
      const res = await app.request(`/api/v1/drips/${id}`, {
        ...json({ name: 'Welcome back' }),
        method: 'PATCH',
      });
      expect(res.status).toBe(200);
      expect((await read(res, DripBody)).name).toBe('Welcome back');
    });
  });

  describe('rules', () => {
    it('appends a rule with default method', async () => {
      const id = await createDrip('Welcome');
      const res = await addRule(id, {
        fieldName: 'date_joined',
        lookup: 'gte',
        rawValue: 'now-7 days',
      });
      expect(res.status).toBe(201);
      expect(await read(res, RuleBody)).toMatchObject({
        method: 'filter',
        fieldName: 'date_joined',
        lookup: 'gte',
        rawValue: 'now-7 days',
        order: 0,
      });
    });

    it('refuses a rule that cannot be applied', async () => {
      const id = await createDrip('Welcome');
      const res = await addRule(id, { fieldName: 'shoe_size', rawValue: '9' });
      expect(res.status).toBe(422);
      const body = await read(res, ErrorBody);
      expect(body.error).toBe('RULE_VALIDATION_ERROR');
      expect(body.details?.category).toBe('unknown_field');

      const drip = await read(await app.request(`/api/v1/drips/${id}`), DripBody);
      expect(drip.rules).toEqual([]);
    });

    it('rejects lookups outside the supported set', async () => {
      const id = await createDrip('Welcome');
      const res = await addRule(id, {
        fieldName: 'email',
        lookup: 'isnull',
        rawValue: 'True',
      });
      expect(res.status).toBe(400);
      expect((await read(res, ErrorBody)).error).toBe('VALIDATION_ERROR');
    });

    it('dry-runs a candidate rule', async () => {
      const id = await createDrip('Welcome');

      const ok = await app.request(
        `/api/v1/drips/${id}/rules/validate`,
        json({ fieldName: 'email', lookup: 'endswith', rawValue: '.org' }),
      );
      expect(await read(ok, OutcomeBody)).toEqual({ valid: true });

      const bad = await app.request(
        `/api/v1/drips/${id}/rules/validate`,
        json({ fieldName: 'date_joined', lookup: 'gte', rawValue: 'now-soon' }),
      );
      expect(bad.status).toBe(200);
      const body = await read(bad, OutcomeBody);
      expect(body.valid).toBe(false);
      expect(body.error).toMatchObject({
        category: 'duration',
        message:
          'DurationParseError raised trying to apply rule: Could not parse duration "-soon"',
      });
      expect(typeof body.error?.ruleId).toBe('string');

      const drip = await read(await app.request(`/api/v1/drips/${id}`), DripBody);
      expect(drip.rules).toEqual([]);
    });

    it('removes and reorders rules', async () => {
      const id = await createDrip('Welcome');
      const first = await read(
        await addRule(id, { fieldName: 'is_staff', rawValue: 'False' }),
        RuleBody,
      );
      const second = await read(
        await addRule(id, { fieldName: 'email', lookup: 'contains', rawValue: '@' }),
        RuleBody,
      );

      const reordered = await app.request(`/api/v1/drips/${id}/rules/order`, {
        ...json({ ruleIds: [second.id, first.id] }),
        method: 'PUT',
      });
      expect(
        (await read(reordered, DripBody)).rules.map((rule) => rule.id),
      ).toEqual([second.id, first.id]);

      const removed = await app.request(`/api/v1/drips/${id}/rules/${first.id}`, {
        method: 'DELETE',
      });
      expect((await read(removed, DripBody)).rules).toHaveLength(1);
    });

    it('validates the saved rule set', async () => {
      const id = await createDrip('Welcome');
      await addRule(id, { fieldName: 'orders__count', lookup: 'gte', rawValue: '1' });

      const res = await app.request(`/api/v1/drips/${id}/validation`);
      expect(await read(res, OutcomeBody)).toEqual({ valid: true });
    });
  });

  describe('recipients', () => {
    it('selects nobody while the drip is disabled', async () => {
      const id = await createDrip('Welcome');
      const res = await app.request(`/api/v1/drips/${id}/recipients`);
      expect(await read(res, RecipientsBody)).toEqual({
        dripId: id,
        enabled: false,
        recipients: [],
      });
    });

    it('applies rules in order and skips users already sent to', async () => {
      const id = await createDrip('Welcome');
      await app.request(`/api/v1/drips/${id}/enabled`, {
        ...json({ enabled: true }),
        method: 'PUT',
      });
      await addRule(id, {
        fieldName: 'date_joined',
        lookup: 'gte',
        rawValue: 'now-7 days',
      });

      let res = await app.request(`/api/v1/drips/${id}/recipients`);
      expect((await read(res, RecipientsBody)).recipients).toEqual(['u1', 'u3']);

      await service.recordSent({
        dripId: id,
        userId: 'u1',
        subject: 'Hello',
        body: '<p>Hello</p>',
      });
      res = await app.request(`/api/v1/drips/${id}/recipients`);
      expect((await read(res, RecipientsBody)).recipients).toEqual(['u3']);
    });

    it('counts related rows through annotated rules', async () => {
      const id = await createDrip('Welcome');
      await service.setEnabled(id, true);
      await addRule(id, { fieldName: 'orders__count', lookup: 'gte', rawValue: '2' });
      await addRule(id, {
        method: 'exclude',
        fieldName: 'is_staff',
        rawValue: 'True',
      });

      const res = await app.request(`/api/v1/drips/${id}/recipients`);
      expect((await read(res, RecipientsBody)).recipients).toEqual(['u3']);
    });
  });

  it('hides unexpected failures behind a 500', async () => {
    const failing = createApp({
      service,
      users: (): InMemoryQueryable<UserRow> => {
        throw new Error('user store unavailable');
      },
      logger,
    });
    const id = await createDrip('Welcome');

    const res = await failing.request(`/api/v1/drips/${id}/recipients`, {
      headers: { 'X-Request-Id': 'req-1' },
    });
    expect(res.status).toBe(500);
    expect(res.headers.get('X-Request-Id')).toBe('req-1');
    expect(await read(res, ErrorBody)).toEqual({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      requestId: 'req-1',
    });
  });
});
