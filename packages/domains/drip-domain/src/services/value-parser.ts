import { Duration } from '../value-objects/duration.js';
import type { RuleValue } from '../value-objects/rule-value.js';

/** Source of the current instant. Always injected, never read ambiently. */
export type Clock = () => Date;

const NOW_PREFIX = 'now';
const TODAY_PREFIX = 'today';
const FIELD_PREFIX = 'F_';

interface ValueGrammar {
  matches(raw: string): boolean;
  parse(raw: string, now: Clock): RuleValue;
}

// Tried in order; the first grammar that matches wins.
const GRAMMARS: readonly ValueGrammar[] = [
  {
    matches: (raw) => raw.startsWith(NOW_PREFIX),
    parse: (raw, now) => ({
      kind: 'timestamp',
      value: Duration.parse(raw.slice(NOW_PREFIX.length)).addTo(now()),
    }),
  },
  {
    matches: (raw) => raw.startsWith(TODAY_PREFIX),
    parse: (raw, now) => {
      const duration = Duration.parse(raw.slice(TODAY_PREFIX.length));
      const today = startOfUtcDay(now());
      today.setUTCDate(today.getUTCDate() + duration.days);
      return { kind: 'date', value: today };
    },
  },
  {
    matches: (raw) => raw.startsWith(FIELD_PREFIX),
    parse: (raw) => ({ kind: 'field', field: raw.slice(FIELD_PREFIX.length) }),
  },
  {
    matches: (raw) => raw === 'True' || raw === 'False',
    parse: (raw) => ({ kind: 'boolean', value: raw === 'True' }),
  },
];

/**
 * Interprets a rule's raw value: `now±duration`, `today±duration`,
 * `F_<field>`, `True`/`False`, or anything else verbatim.
 *
 * @throws DurationParseError when a `now`/`today` offset is malformed
 */
export function parseRuleValue(raw: string, now: Clock): RuleValue {
  const grammar = GRAMMARS.find((g) => g.matches(raw));
  return grammar ? grammar.parse(raw, now) : { kind: 'scalar', value: raw };
}

function startOfUtcDay(instant: Date): Date {
  return new Date(
    Date.UTC(
      instant.getUTCFullYear(),
      instant.getUTCMonth(),
      instant.getUTCDate(),
    ),
  );
}
