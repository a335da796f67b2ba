import { randomUUID } from 'node:crypto';
import { InvariantViolation, NotFoundError } from '@dripline/domain-kernel';
import { z } from 'zod';
import { RuleSet } from '../services/rule-set.js';
import { QuerySetRule, type QuerySetRuleInput } from './queryset-rule.js';

export const DripPropsSchema = z.object({
  id: z.string().uuid(),
  name: z.string().min(1).max(255),
  enabled: z.boolean(),
  fromEmail: z.string().email().nullable(),
  fromEmailName: z.string().max(150).nullable(),
  replyTo: z.string().email().nullable(),
  subjectTemplate: z.string().nullable(),
  bodyHtmlTemplate: z.string().nullable(),
  messageClass: z.string().max(120),
  createdAt: z.coerce.date(),
  lastChanged: z.coerce.date(),
});

export type DripProps = z.infer<typeof DripPropsSchema>;

export interface DripContent {
  fromEmail?: string | null;
  fromEmailName?: string | null;
  replyTo?: string | null;
  subjectTemplate?: string | null;
  bodyHtmlTemplate?: string | null;
  messageClass?: string;
}

/**
 * A one-time message campaign. The drip owns its query rules; removing the
 * drip removes them.
 */
export class Drip {
  private constructor(
    private props: DripProps,
    private rules: QuerySetRule[],
  ) {}

  // ---- Factory methods ----

  static create(input: { name: string; enabled?: boolean } & DripContent): Drip {
    if (!input.name || input.name.trim().length === 0) {
      throw new InvariantViolation('Drip name is required');
    }

    const now = new Date();
    return new Drip(
      DripPropsSchema.parse({
        id: randomUUID(),
        name: input.name.trim(),
        enabled: input.enabled ?? false,
        fromEmail: input.fromEmail || null,
        fromEmailName: input.fromEmailName || null,
        replyTo: input.replyTo || null,
        subjectTemplate: input.subjectTemplate || null,
        bodyHtmlTemplate: input.bodyHtmlTemplate || null,
        messageClass: input.messageClass || 'default',
        createdAt: now,
        lastChanged: now,
      }),
      [],
    );
  }

  static reconstitute(props: DripProps, rules: QuerySetRule[] = []): Drip {
    const parsed = DripPropsSchema.parse(props);
    const foreign = rules.find((rule) => rule.dripId !== parsed.id);
    if (foreign) {
      throw new InvariantViolation(
        `Rule ${foreign.id} belongs to drip ${foreign.dripId}, not ${parsed.id}`,
      );
    }
    return new Drip(parsed, [...rules]);
  }

  // ---- Accessors ----

  get id(): string {
    return this.props.id;
  }
  get name(): string {
    return this.props.name;
  }
  get enabled(): boolean {
    return this.props.enabled;
  }
  get fromEmail(): string | null {
    return this.props.fromEmail;
  }
  get fromEmailName(): string | null {
    return this.props.fromEmailName;
  }
  get replyTo(): string | null {
    return this.props.replyTo;
  }
  get subjectTemplate(): string | null {
    return this.props.subjectTemplate;
  }
  get bodyHtmlTemplate(): string | null {
    return this.props.bodyHtmlTemplate;
  }
  get messageClass(): string {
    return this.props.messageClass;
  }
  get createdAt(): Date {
    return this.props.createdAt;
  }
  get lastChanged(): Date {
    return this.props.lastChanged;
  }

  /** Rules in application order. */
  get queryRules(): QuerySetRule[] {
    return [...this.rules].sort((a, b) => a.order - b.order);
  }

  get ruleSet(): RuleSet {
    return new RuleSet(this.rules);
  }

  // ---- Domain methods ----

  update(input: { name?: string } & DripContent): void {
    const next: DripProps = { ...this.props, lastChanged: new Date() };
    if (input.name !== undefined) {
      if (input.name.trim().length === 0) {
        throw new InvariantViolation('Drip name must not be empty');
      }
      next.name = input.name.trim();
    }
    if (input.fromEmail !== undefined) next.fromEmail = input.fromEmail || null;
    if (input.fromEmailName !== undefined) {
      next.fromEmailName = input.fromEmailName || null;
    }
    if (input.replyTo !== undefined) next.replyTo = input.replyTo || null;
    if (input.subjectTemplate !== undefined) {
      next.subjectTemplate = input.subjectTemplate || null;
    }
    if (input.bodyHtmlTemplate !== undefined) {
      next.bodyHtmlTemplate = input.bodyHtmlTemplate || null;
    }
    if (input.messageClass !== undefined) {
      next.messageClass = input.messageClass || 'default';
    }
    this.props = DripPropsSchema.parse(next);
  }

  enable(): void {
    this.props.enabled = true;
    this.props.lastChanged = new Date();
  }

  disable(): void {
    this.props.enabled = false;
    this.props.lastChanged = new Date();
  }

  /** Builds a rule positioned after the existing ones without attaching it. */
  draftRule(input: QuerySetRuleInput): QuerySetRule {
    const last = Math.max(-1, ...this.rules.map((rule) => rule.order));
    return QuerySetRule.create({ ...input, dripId: this.id, order: last + 1 });
  }

  /** The rule set this drip would have with `rule` attached. */
  ruleSetWith(rule: QuerySetRule): RuleSet {
    return new RuleSet([...this.rules, rule]);
  }

  addRule(rule: QuerySetRule): void {
    if (rule.dripId !== this.id) {
      throw new InvariantViolation(`Rule ${rule.id} belongs to another drip`);
    }
    if (this.rules.some((existing) => existing.id === rule.id)) {
      throw new InvariantViolation(`Rule ${rule.id} is already attached`);
    }
    this.rules = [...this.rules, rule];
    this.props.lastChanged = new Date();
  }

  removeRule(ruleId: string): void {
    if (!this.rules.some((rule) => rule.id === ruleId)) {
      throw new NotFoundError('Rule', ruleId);
    }
    this.rules = this.rules.filter((rule) => rule.id !== ruleId);
    this.props.lastChanged = new Date();
  }

  /** Renumbers rules 0..n-1 following `ruleIds`, which must name every rule. */
  reorderRules(ruleIds: string[]): void {
    const known = new Set(this.rules.map((rule) => rule.id));
    if (
      ruleIds.length !== known.size ||
      new Set(ruleIds).size !== ruleIds.length ||
      !ruleIds.every((id) => known.has(id))
    ) {
      throw new InvariantViolation('Reorder must list every rule exactly once');
    }
    ruleIds.forEach((id, index) => {
      this.rules.find((rule) => rule.id === id)?.moveTo(index);
    });
    this.props.lastChanged = new Date();
  }

  /** Return a plain object suitable for persistence. */
  toProps(): Readonly<DripProps> {
    return Object.freeze({ ...this.props });
  }
}
