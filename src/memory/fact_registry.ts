/**
 * @fileoverview Fact layer
 *
 * An immutable registry of architectural facts. A fact names an expected
 * value and how an observed value is compared to it; `validate` reports the
 * verdict as data and never throws, so callers can gate on it or just log it.
 *
 * Records are frozen on registration. Deprecation swaps in a new frozen
 * record rather than mutating the old one.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { stableStringify } from '../utils/hashing.js';
import { keywordScore } from './in_memory_store.js';
import type { MemoryLayer } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export const FACT_OPERATORS = ['eq', 'gte', 'lte', 'gt', 'lt', 'in', 'matches'] as const;
export type FactOperator = (typeof FACT_OPERATORS)[number];

export const FACT_STATUSES = ['active', 'deprecated'] as const;
export type FactStatus = (typeof FACT_STATUSES)[number];

export const FactDefinitionSchema = z.object({
  key: z.string().min(1, 'key must not be empty'),
  value: z.unknown(),
  category: z.string().min(1, 'category must not be empty'),
  rationale: z.string().default(''),
  status: z.enum(FACT_STATUSES).default('active'),
  operator: z.enum(FACT_OPERATORS).default('eq'),
  deprecatedReason: z.string().optional(),
});

export type FactDefinition = z.input<typeof FactDefinitionSchema>;

/** Custom comparison; takes precedence over the fact's operator. */
export type FactValidator = (actual: unknown, fact: Fact) => boolean;

export interface Fact {
  readonly key: string;
  readonly value: unknown;
  readonly category: string;
  readonly rationale: string;
  readonly status: FactStatus;
  readonly operator: FactOperator;
  readonly deprecatedReason?: string;
  readonly validator?: FactValidator;
}

export type FactDraft = Omit<FactDefinition, 'key'> & { validator?: FactValidator };

export interface FactValidation {
  isValid: boolean;
  expected: unknown;
  actual: unknown;
  message: string;
}

export interface FactQuery {
  category?: string;
  status?: FactStatus;
  text?: string;
}

export interface FactSummary {
  total: number;
  active: number;
  deprecated: number;
  byCategory: Record<string, number>;
}

export type FactLayerTypes = {
  add: FactDraft;
  added: Fact;
  read: Fact | undefined;
  query: FactQuery;
  hit: Fact;
  check: unknown;
  verdict: FactValidation;
};

// ============================================================================
// COMPARISON
// ============================================================================

const OPERATOR_LABELS: Record<FactOperator, string> = {
  eq: '=',
  gte: '>=',
  lte: '<=',
  gt: '>',
  lt: '<',
  in: 'one of',
  matches: 'matching',
};

function format(value: unknown): string {
  return typeof value === 'string' ? value : stableStringify(value);
}

type Comparison = { ok: true; satisfied: boolean } | { ok: false; reason: string };

function compare(operator: FactOperator, expected: unknown, actual: unknown): Comparison {
  switch (operator) {
    case 'eq':
      return { ok: true, satisfied: stableStringify(expected) === stableStringify(actual) };
    case 'gte':
    case 'lte':
    case 'gt':
    case 'lt': {
      if (typeof expected !== 'number' || typeof actual !== 'number' || Number.isNaN(actual)) {
        return { ok: false, reason: `operator ${operator} needs numbers, got ${typeof actual}` };
      }
      const satisfied =
        operator === 'gte' ? actual >= expected
        : operator === 'lte' ? actual <= expected
        : operator === 'gt' ? actual > expected
        : actual < expected;
      return { ok: true, satisfied };
    }
    case 'in': {
      if (!Array.isArray(expected)) {
        return { ok: false, reason: 'operator in needs a list of allowed values' };
      }
      const wanted = stableStringify(actual);
      return { ok: true, satisfied: expected.some((item) => stableStringify(item) === wanted) };
    }
    case 'matches': {
      if (typeof expected !== 'string' || typeof actual !== 'string') {
        return { ok: false, reason: `operator matches needs strings, got ${typeof actual}` };
      }
      try {
        return { ok: true, satisfied: new RegExp(expected).test(actual) };
      } catch (error) {
        return { ok: false, reason: `invalid pattern: ${getErrorMessage(error)}` };
      }
    }
  }
}

function freezeValue(value: unknown): unknown {
  return Array.isArray(value) ? Object.freeze([...value]) : value;
}

// ============================================================================
// REGISTRY
// ============================================================================

export class FactRegistry implements MemoryLayer<FactLayerTypes> {
  readonly layer = 'fact' as const;
  private readonly facts = new Map<string, Fact>();

  constructor(definitions: readonly FactDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  /** Register a fact under `key`. A key may be registered once. */
  add(key: string, draft: FactDraft): Fact {
    if (this.facts.has(key)) {
      throw new ConfigurationError(`Fact '${key}' is already registered`);
    }
    const parsed = FactDefinitionSchema.safeParse({ ...draft, key });
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid fact '${key}'`,
        parsed.error.errors.map((issue) => `${issue.path.join('.') || 'fact'}: ${issue.message}`),
      );
    }
    const fact: Fact = {
      ...parsed.data,
      value: freezeValue(parsed.data.value),
      ...(draft.validator ? { validator: draft.validator } : {}),
    };
    this.facts.set(key, Object.freeze(fact));
    return fact;
  }

  register(definition: FactDefinition & { validator?: FactValidator }): Fact {
    const { key, ...draft } = definition;
    return this.add(key, draft);
  }

  get(key: string): Fact | undefined {
    return this.facts.get(key);
  }

  /** Facts matching every given criterion, ordered by key. */
  search(query: FactQuery = {}): Fact[] {
    const text = query.text?.trim() ?? '';
    return [...this.facts.values()]
      .filter((fact) => query.category === undefined || fact.category === query.category)
      .filter((fact) => query.status === undefined || fact.status === query.status)
      .filter(
        (fact) => text.length === 0 || keywordScore(text, `${fact.key} ${fact.category} ${fact.rationale}`) > 0,
      )
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  deprecate(key: string, reason: string): Fact {
    const current = this.facts.get(key);
    if (!current) {
      throw new ConfigurationError(`Fact '${key}' is not registered`);
    }
    const replacement: Fact = { ...current, status: 'deprecated', deprecatedReason: reason };
    this.facts.set(key, Object.freeze(replacement));
    return replacement;
  }

  /** Compare an observed value to the fact. Never throws. */
  validate(key: string, actual: unknown): FactValidation {
    const fact = this.facts.get(key);
    if (!fact) {
      return { isValid: false, expected: undefined, actual, message: `Fact '${key}' is not registered` };
    }
    const verdict = (isValid: boolean, message: string): FactValidation => ({
      isValid,
      expected: fact.value,
      actual,
      message,
    });

    if (fact.status === 'deprecated') {
      const reason = fact.deprecatedReason ? `: ${fact.deprecatedReason}` : '';
      return verdict(false, `Fact '${key}' is deprecated${reason}`);
    }

    if (fact.validator) {
      try {
        return fact.validator(actual, fact)
          ? verdict(true, `Fact '${key}' holds`)
          : verdict(false, `Fact '${key}' violated by ${format(actual)}`);
      } catch (error) {
        return verdict(false, `Validator for fact '${key}' threw: ${getErrorMessage(error)}`);
      }
    }

    const comparison = compare(fact.operator, fact.value, actual);
    if (!comparison.ok) {
      return verdict(false, `Fact '${key}' cannot be checked: ${comparison.reason}`);
    }
    return comparison.satisfied
      ? verdict(true, `Fact '${key}' holds`)
      : verdict(
          false,
          `Fact '${key}' violated: expected ${OPERATOR_LABELS[fact.operator]} ${format(fact.value)}, got ${format(actual)}`,
        );
  }

  summary(): FactSummary {
    const byCategory: Record<string, number> = {};
    let active = 0;
    for (const fact of this.facts.values()) {
      byCategory[fact.category] = (byCategory[fact.category] ?? 0) + 1;
      if (fact.status === 'active') active++;
    }
    return { total: this.facts.size, active, deprecated: this.facts.size - active, byCategory };
  }

  get size(): number {
    return this.facts.size;
  }
}
