import { ConflictError, ValidationError } from '@dripline/domain-kernel';
import {
  type Aggregation,
  type Materializable,
  PATH_SEPARATOR,
  type Predicate,
  type PredicateValue,
  type Queryable,
  sameAggregation,
  toIsoDate,
  UnknownFieldError,
} from '@dripline/drip-domain';
import { and, getTableColumns, type SQL, sql } from 'drizzle-orm';
import type { NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { PgDialect, type PgColumn, type PgTable } from 'drizzle-orm/pg-core';

/** A to-many relation reached through a foreign key back to the base table. */
export interface DrizzleRelation {
  table: PgTable;
  foreignKey: PgColumn;
  /** Identifies a related row for `count`. */
  key: PgColumn;
}

export interface DrizzleSource {
  db: NeonHttpDatabase;
  table: PgTable;
  primaryKey: PgColumn;
  relations?: Readonly<Record<string, DrizzleRelation>>;
}

type Expression = PgColumn | SQL;

interface Annotation {
  aggregation: Aggregation;
  expression: SQL;
}

const dialect = new PgDialect();

/**
 * Queryable that compiles predicates into a Postgres WHERE clause over one
 * table. Conditions are built when an operation is added, so unknown columns
 * fail immediately; nothing runs until `all()`.
 */
export class DrizzleQueryable
  implements Queryable<DrizzleQueryable>, Materializable<Record<string, unknown>>
{
  private constructor(
    private readonly source: DrizzleSource,
    private readonly conditions: readonly SQL[],
    private readonly aliases: ReadonlyMap<string, Annotation>,
  ) {}

  static of(source: DrizzleSource): DrizzleQueryable {
    return new DrizzleQueryable(source, [], new Map());
  }

  filter(predicate: Predicate): DrizzleQueryable {
    return this.where(this.condition(predicate));
  }

  // A NULL comparison counts as not matching, so the row stays.
  exclude(predicate: Predicate): DrizzleQueryable {
    return this.where(sql`not coalesce((${this.condition(predicate)}), false)`);
  }

  annotate(alias: string, aggregation: Aggregation): DrizzleQueryable {
    const existing = this.aliases.get(alias);
    if (existing) {
      if (sameAggregation(existing.aggregation, aggregation)) return this;
      throw new ConflictError(`Annotation "${alias}" is already defined`);
    }
    if (columnNamed(this.source.table, alias)) {
      throw new ConflictError(`Annotation "${alias}" conflicts with a field`);
    }

    const relation = this.relation(aggregation.relation, aggregation.relation);
    const counted = aggregation.distinct
      ? sql`count(distinct ${relation.key})`
      : sql`count(${relation.key})`;
    const expression = sql`(select ${counted} from ${relation.table} where ${relation.foreignKey} = ${this.source.primaryKey})`;

    const aliases = new Map(this.aliases);
    aliases.set(alias, { aggregation, expression });
    return new DrizzleQueryable(this.source, this.conditions, aliases);
  }

  /** The accumulated WHERE clause as parameterized SQL. */
  toSQL(): { sql: string; params: unknown[] } {
    const query = dialect.sqlToQuery(this.whereClause());
    return { sql: query.sql, params: query.params };
  }

  async all(): Promise<Record<string, unknown>[]> {
    const rows = await this.source.db
      .select()
      .from(this.source.table)
      .where(this.whereClause());
    return rows;
  }

  private where(condition: SQL): DrizzleQueryable {
    return new DrizzleQueryable(
      this.source,
      [...this.conditions, condition],
      this.aliases,
    );
  }

  private whereClause(): SQL {
    return and(...this.conditions) ?? sql`true`;
  }

  // ---- Path resolution ----

  private condition(predicate: Predicate): SQL {
    const annotation = this.aliases.get(predicate.field);
    if (annotation) {
      return this.comparison(annotation.expression, predicate);
    }

    const [head, tail, ...rest] = predicate.field.split(PATH_SEPARATOR);
    if (tail === undefined) {
      return this.comparison(this.column(predicate.field), predicate);
    }
    if (rest.length > 0) {
      throw new UnknownFieldError(predicate.field, 'cannot be traversed by this store');
    }

    // Any related row matching is enough, as for a join.
    const relation = this.relation(head, predicate.field);
    const column = columnNamed(relation.table, tail);
    if (!column) {
      throw new UnknownFieldError(predicate.field);
    }
    return sql`exists (select 1 from ${relation.table} where ${relation.foreignKey} = ${this.source.primaryKey} and ${this.comparison(column, predicate)})`;
  }

  private column(name: string): Expression {
    const annotation = this.aliases.get(name);
    if (annotation) return annotation.expression;

    const column = columnNamed(this.source.table, name);
    if (!column) {
      throw new UnknownFieldError(name);
    }
    return column;
  }

  private relation(name: string, path: string): DrizzleRelation {
    const relation = this.source.relations?.[name];
    if (!relation) {
      throw new UnknownFieldError(path, 'does not follow a known relation');
    }
    return relation;
  }

  // ---- Lookups ----

  private comparison(target: Expression, predicate: Predicate): SQL {
    const { lookup, value } = predicate;

    if (value.kind === 'list') {
      if (lookup !== 'in') {
        throw new ValidationError(`Lookup "${lookup}" does not take a list`);
      }
      return value.values.length === 0
        ? sql`false`
        : sql`${target} in (${sql.join(
            value.values.map((item) => sql`${item}`),
            sql`, `,
          )})`;
    }
    if (lookup === 'in') {
      throw new ValidationError('Lookup "in" takes a list');
    }

    const operand = this.operand(value);
    switch (lookup) {
      case 'exact':
        return sql`${target} = ${operand}`;
      case 'iexact':
        return sql`upper(${target}::text) = upper(${operand}::text)`;
      case 'contains':
        return sql`${target}::text like ${this.pattern(value, '%', '%')}`;
      case 'icontains':
        return sql`${target}::text ilike ${this.pattern(value, '%', '%')}`;
      case 'startswith':
        return sql`${target}::text like ${this.pattern(value, '', '%')}`;
      case 'istartswith':
        return sql`${target}::text ilike ${this.pattern(value, '', '%')}`;
      case 'endswith':
        return sql`${target}::text like ${this.pattern(value, '%', '')}`;
      case 'iendswith':
        return sql`${target}::text ilike ${this.pattern(value, '%', '')}`;
      case 'regex':
        return sql`${target}::text ~ ${operand}`;
      case 'iregex':
        return sql`${target}::text ~* ${operand}`;
      case 'gt':
        return sql`${target} > ${operand}`;
      case 'gte':
        return sql`${target} >= ${operand}`;
      case 'lt':
        return sql`${target} < ${operand}`;
      case 'lte':
        return sql`${target} <= ${operand}`;
    }
  }

  private operand(value: Exclude<PredicateValue, { kind: 'list' }>): Expression | string | boolean {
    switch (value.kind) {
      case 'field':
        return this.column(value.field);
      case 'timestamp':
        return value.value.toISOString();
      case 'date':
        return toIsoDate(value.value);
      case 'boolean':
        return value.value;
      case 'scalar':
        return value.value;
    }
  }

  private pattern(
    value: Exclude<PredicateValue, { kind: 'list' }>,
    prefix: string,
    suffix: string,
  ): SQL | string {
    if (value.kind === 'field') {
      return sql`${prefix} || ${escapedText(this.column(value.field))} || ${suffix}`;
    }
    return `${prefix}${escapeLike(String(this.operand(value)))}${suffix}`;
  }
}

function columnNamed(table: PgTable, name: string): PgColumn | undefined {
  const columns: Record<string, PgColumn> = getTableColumns(table);
  return Object.values(columns).find((column) => column.name === name);
}

function escapedText(expression: Expression): SQL {
  return sql`replace(replace(replace(${expression}::text, '\\', '\\\\'), '%', '\\%'), '_', '\\_')`;
}

function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, '\\$&');
}
