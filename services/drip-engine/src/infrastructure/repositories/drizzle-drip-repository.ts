import {
  Drip,
  type DripRepository,
  QuerySetRule,
} from '@dripline/drip-domain';
import { drips, querysetRules } from '@dripline/drip-domain/drizzle';
import { and, asc, eq, inArray, notInArray } from 'drizzle-orm';
import type { NeonHttpDatabase } from 'drizzle-orm/neon-http';

type DripRow = typeof drips.$inferSelect;
type RuleRow = typeof querysetRules.$inferSelect;

export class DrizzleDripRepository implements DripRepository {
  constructor(private readonly db: NeonHttpDatabase) {}

  async findById(id: string): Promise<Drip | null> {
    const [row] = await this.db.select().from(drips).where(eq(drips.id, id));
    if (!row) return null;
    const [drip] = await this.load([row]);
    return drip ?? null;
  }

  async findByName(name: string): Promise<Drip | null> {
    const [row] = await this.db
      .select()
      .from(drips)
      .where(eq(drips.name, name));
    if (!row) return null;
    const [drip] = await this.load([row]);
    return drip ?? null;
  }

  async save(drip: Drip): Promise<void> {
    const props = drip.toProps();
    await this.db
      .insert(drips)
      .values(props)
      .onConflictDoUpdate({
        target: drips.id,
        set: {
          name: props.name,
          enabled: props.enabled,
          fromEmail: props.fromEmail,
          fromEmailName: props.fromEmailName,
          replyTo: props.replyTo,
          subjectTemplate: props.subjectTemplate,
          bodyHtmlTemplate: props.bodyHtmlTemplate,
          messageClass: props.messageClass,
          lastChanged: props.lastChanged,
        },
      });

    const rules = drip.queryRules;
    const ruleIds = rules.map((rule) => rule.id);
    await this.db
      .delete(querysetRules)
      .where(
        ruleIds.length > 0
          ? and(
              eq(querysetRules.dripId, drip.id),
              notInArray(querysetRules.id, ruleIds),
            )
          : eq(querysetRules.dripId, drip.id),
      );

    for (const rule of rules) {
      const row = toRuleRow(rule);
      await this.db
        .insert(querysetRules)
        .values(row)
        .onConflictDoUpdate({
          target: querysetRules.id,
          set: {
            methodType: row.methodType,
            fieldName: row.fieldName,
            lookupType: row.lookupType,
            fieldValue: row.fieldValue,
            sortOrder: row.sortOrder,
            lastChanged: row.lastChanged,
          },
        });
    }
  }

  private async load(rows: DripRow[]): Promise<Drip[]> {
    if (rows.length === 0) return [];

    const ruleRows = await this.db
      .select()
      .from(querysetRules)
      .where(
        inArray(
          querysetRules.dripId,
          rows.map((row) => row.id),
        ),
      )
      .orderBy(asc(querysetRules.sortOrder));

    return rows.map((row) =>
      Drip.reconstitute(
        row,
        ruleRows
          .filter((rule) => rule.dripId === row.id)
          .map((rule) => fromRuleRow(rule)),
      ),
    );
  }
}

function fromRuleRow(row: RuleRow): QuerySetRule {
  return QuerySetRule.reconstitute({
    id: row.id,
    dripId: row.dripId,
    method: row.methodType,
    fieldName: row.fieldName,
    lookup: row.lookupType,
    rawValue: row.fieldValue,
    order: row.sortOrder,
    createdAt: row.createdAt,
    lastChanged: row.lastChanged,
  });
}

function toRuleRow(rule: QuerySetRule): RuleRow {
  const props = rule.toProps();
  return {
    id: props.id,
    dripId: props.dripId,
    methodType: props.method,
    fieldName: props.fieldName,
    lookupType: props.lookup,
    fieldValue: props.rawValue,
    sortOrder: props.order,
    createdAt: props.createdAt,
    lastChanged: props.lastChanged,
  };
}
