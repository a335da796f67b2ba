import {
  ConflictError,
  NotFoundError,
  type Result,
} from '@dripline/domain-kernel';
import {
  type AddRuleCommand,
  addRuleCommand,
  type CreateDripCommand,
  createDripCommand,
  type UpdateDripCommand,
  updateDripCommand,
} from '../commands/index.js';
import { Drip } from '../entities/drip.js';
import type { QuerySetRule } from '../entities/queryset-rule.js';
import { SentDrip } from '../entities/sent-drip.js';
import type { RuleValidationError } from '../errors/rule-errors.js';
import type { Queryable } from '../queryable/queryable.js';
import type { DripRepository } from '../repositories/drip-repository.js';
import type { SentDripRepository } from '../repositories/sent-drip-repository.js';
import type { Clock } from '../services/value-parser.js';

export class DripApplicationService {
  constructor(
    private readonly repository: DripRepository,
    private readonly sentDrips: SentDripRepository,
    private readonly clock: Clock,
  ) {}

  async get(dripId: string): Promise<Drip> {
    return this.requireDrip(dripId);
  }

  async create(input: CreateDripCommand): Promise<Drip> {
    const command = createDripCommand(input);
    await this.assertNameAvailable(command.name);

    const drip = Drip.create(command);
    await this.repository.save(drip);
    return drip;
  }

  async update(input: UpdateDripCommand): Promise<Drip> {
    const { dripId, ...changes } = updateDripCommand(input);
    const drip = await this.requireDrip(dripId);
    if (changes.name !== undefined && changes.name.trim() !== drip.name) {
      await this.assertNameAvailable(changes.name);
    }

    drip.update(changes);
    await this.repository.save(drip);
    return drip;
  }

  async setEnabled(dripId: string, enabled: boolean): Promise<Drip> {
    const drip = await this.requireDrip(dripId);
    if (enabled) {
      drip.enable();
    } else {
      drip.disable();
    }
    await this.repository.save(drip);
    return drip;
  }

  /**
   * Dry-runs a candidate rule after the drip's existing rules without
   * saving anything.
   */
  async previewRule<Q extends Queryable<Q>>(
    input: AddRuleCommand,
    sample: Q,
  ): Promise<{ rule: QuerySetRule; result: Result<void, RuleValidationError> }> {
    const { dripId, ...ruleInput } = addRuleCommand(input);
    const drip = await this.requireDrip(dripId);
    const rule = drip.draftRule(ruleInput);
    return { rule, result: drip.ruleSetWith(rule).validate(sample, this.clock) };
  }

  /**
   * Appends a rule once the whole rule set still applies cleanly to
   * `sample`.
   *
   * @throws RuleValidationError naming the rule that failed
   */
  async addRule<Q extends Queryable<Q>>(
    input: AddRuleCommand,
    sample: Q,
  ): Promise<QuerySetRule> {
    const { dripId, ...ruleInput } = addRuleCommand(input);
    const drip = await this.requireDrip(dripId);
    const rule = drip.draftRule(ruleInput);

    const result = drip.ruleSetWith(rule).validate(sample, this.clock);
    if (result.isFailure) {
      throw result.getError();
    }

    drip.addRule(rule);
    await this.repository.save(drip);
    return rule;
  }

  async removeRule(dripId: string, ruleId: string): Promise<Drip> {
    const drip = await this.requireDrip(dripId);
    drip.removeRule(ruleId);
    await this.repository.save(drip);
    return drip;
  }

  async reorderRules(dripId: string, ruleIds: string[]): Promise<Drip> {
    const drip = await this.requireDrip(dripId);
    drip.reorderRules(ruleIds);
    await this.repository.save(drip);
    return drip;
  }

  async validateRules<Q extends Queryable<Q>>(
    dripId: string,
    sample: Q,
  ): Promise<Result<void, RuleValidationError>> {
    const drip = await this.requireDrip(dripId);
    return drip.ruleSet.validate(sample, this.clock);
  }

  /**
   * Narrows `base` to the users the drip should go to next: its rules
   * applied in order, minus everyone who already received it. Returns null
   * for a disabled drip.
   */
  async selectRecipients<Q extends Queryable<Q>>(
    dripId: string,
    base: Q,
  ): Promise<Q | null> {
    const drip = await this.requireDrip(dripId);
    if (!drip.enabled) return null;

    const targeted = drip.ruleSet.apply(base, this.clock);
    const alreadySent = await this.sentDrips.findRecipientIds(drip.id);
    if (alreadySent.length === 0) return targeted;

    return targeted.exclude({
      key: 'id__in',
      field: 'id',
      lookup: 'in',
      value: { kind: 'list', values: alreadySent },
    });
  }

  async recordSent(input: {
    dripId: string;
    userId: string;
    subject: string;
    body: string;
  }): Promise<SentDrip> {
    const drip = await this.requireDrip(input.dripId);
    const sentDrip = SentDrip.create({
      ...input,
      fromEmail: drip.fromEmail,
      fromEmailName: drip.fromEmailName,
      replyTo: drip.replyTo,
      name: drip.name,
    });
    await this.sentDrips.save(sentDrip);
    return sentDrip;
  }

  private async requireDrip(dripId: string): Promise<Drip> {
    const drip = await this.repository.findById(dripId);
    if (!drip) {
      throw new NotFoundError('Drip', dripId);
    }
    return drip;
  }

  private async assertNameAvailable(name: string): Promise<void> {
    const existing = await this.repository.findByName(name.trim());
    if (existing) {
      throw new ConflictError(`A drip named "${name.trim()}" already exists`);
    }
  }
}
