import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFactRegistryFromFile, loadFactsFile, loadFactsFromYaml } from '../fact_loader.js';
import { FactRegistry } from '../fact_registry.js';
import { ConfigurationError } from '../../core/errors.js';

function registry(): FactRegistry {
  return new FactRegistry([
    { key: 'test-coverage', category: 'quality', operator: 'gte', value: 80, rationale: 'Coverage gate for merges' },
    { key: 'database', category: 'architecture', value: 'postgres', rationale: 'Single relational store' },
    { key: 'test-runner', category: 'quality', operator: 'in', value: ['vitest', 'jest'] },
  ]);
}

describe('FactRegistry', () => {
  it('reports a satisfied threshold', () => {
    expect(registry().validate('test-coverage', 85)).toEqual({
      isValid: true,
      expected: 80,
      actual: 85,
      message: "Fact 'test-coverage' holds",
    });
  });

  it('reports a violated threshold as data', () => {
    expect(registry().validate('test-coverage', 50)).toEqual({
      isValid: false,
      expected: 80,
      actual: 50,
      message: "Fact 'test-coverage' violated: expected >= 80, got 50",
    });
  });

  it('explains values the operator cannot compare', () => {
    expect(registry().validate('test-coverage', 'high').message).toBe(
      "Fact 'test-coverage' cannot be checked: operator gte needs numbers, got string",
    );
  });

  it('compares by equality and membership', () => {
    const facts = registry();
    expect(facts.validate('database', 'postgres').isValid).toBe(true);
    expect(facts.validate('database', 'mysql').message).toBe("Fact 'database' violated: expected = postgres, got mysql");
    expect(facts.validate('test-runner', 'jest').isValid).toBe(true);
    expect(facts.validate('test-runner', 'mocha').message).toBe(
      'Fact \'test-runner\' violated: expected one of ["vitest","jest"], got mocha',
    );
  });

  it('treats an object referenced twice as equal to two separate copies', () => {
    const facts = new FactRegistry();
    facts.add('pair', { category: 'shape', value: [{ a: 1 }, { a: 1 }] });
    facts.add('limits', { category: 'shape', operator: 'in', value: [[{ a: 1 }, { a: 1 }]] });
    const shared = { a: 1 };
    expect(facts.validate('pair', [shared, shared]).isValid).toBe(true);
    expect(facts.validate('limits', [shared, shared]).isValid).toBe(true);
    expect(facts.validate('pair', [shared, { a: 2 }]).message).toBe(
      'Fact \'pair\' violated: expected = [{"a":1},{"a":1}], got [{"a":1},{"a":2}]',
    );
  });

  it('matches patterns and reports broken ones', () => {
    const facts = new FactRegistry();
    facts.add('version-tag', { category: 'release', operator: 'matches', value: '^v\\d+$' });
    facts.add('broken', { category: 'release', operator: 'matches', value: '(' });
    expect(facts.validate('version-tag', 'v12').isValid).toBe(true);
    expect(facts.validate('version-tag', 'latest').isValid).toBe(false);
    expect(facts.validate('broken', 'x').message).toMatch(/^Fact 'broken' cannot be checked: invalid pattern: /);
  });

  it('prefers a custom validator over the operator', () => {
    const facts = new FactRegistry();
    facts.add('semver', {
      category: 'release',
      value: 'semver',
      validator: (actual) => typeof actual === 'string' && /^\d+\.\d+\.\d+$/.test(actual),
    });
    facts.add('fragile', {
      category: 'release',
      value: null,
      validator: () => {
        throw new Error('nope');
      },
    });
    expect(facts.validate('semver', '1.2.3').message).toBe("Fact 'semver' holds");
    expect(facts.validate('semver', '1.2').message).toBe("Fact 'semver' violated by 1.2");
    expect(facts.validate('fragile', 1)).toMatchObject({
      isValid: false,
      message: "Validator for fact 'fragile' threw: nope",
    });
  });

  it('answers unknown keys without throwing', () => {
    expect(registry().validate('nope', 1)).toEqual({
      isValid: false,
      expected: undefined,
      actual: 1,
      message: "Fact 'nope' is not registered",
    });
  });

  it('keeps records immutable and replaces them on deprecation', () => {
    const facts = registry();
    const before = facts.get('database');
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(facts.get('test-runner')?.value)).toBe(true);

    const after = facts.deprecate('database', 'moved to a managed service');
    expect(before?.status).toBe('active');
    expect(after.status).toBe('deprecated');
    expect(facts.validate('database', 'postgres')).toMatchObject({
      isValid: false,
      message: "Fact 'database' is deprecated: moved to a managed service",
    });
    expect(() => facts.deprecate('nope', 'x')).toThrow("Fact 'nope' is not registered");
  });

  it('refuses duplicate and malformed facts', () => {
    const facts = registry();
    expect(() => facts.add('database', { category: 'architecture', value: 'sqlite' })).toThrow(
      "Fact 'database' is already registered",
    );
    expect(() => facts.add('x', { category: '', value: 1 })).toThrow(
      new ConfigurationError("Invalid fact 'x'", ['category: category must not be empty']),
    );
  });

  it('searches by category, status and text', () => {
    const facts = registry();
    facts.deprecate('test-runner', 'decided per package');
    expect(facts.search({ category: 'quality' }).map((f) => f.key)).toEqual(['test-coverage', 'test-runner']);
    expect(facts.search({ status: 'active' }).map((f) => f.key)).toEqual(['database', 'test-coverage']);
    expect(facts.search({ text: 'relational' }).map((f) => f.key)).toEqual(['database']);
  });

  it('summarises the registry', () => {
    const facts = registry();
    facts.deprecate('database', 'legacy');
    expect(facts.summary()).toEqual({
      total: 3,
      active: 2,
      deprecated: 1,
      byCategory: { quality: 2, architecture: 1 },
    });
    expect(facts.size).toBe(3);
  });
});

describe('fact loading', () => {
  const yaml = [
    'facts:',
    '  - key: test-coverage',
    '    category: quality',
    '    operator: gte',
    '    value: 80',
    '    rationale: Coverage gate for merges',
    '  - key: database',
    '    category: architecture',
    '    value: postgres',
    '',
  ].join('\n');

  it('reads a facts document with defaults applied', () => {
    const loaded = loadFactsFromYaml(yaml);
    expect(loaded.ok).toBe(true);
    if (!loaded.ok) return;
    expect(loaded.value).toEqual([
      {
        key: 'test-coverage',
        category: 'quality',
        operator: 'gte',
        value: 80,
        rationale: 'Coverage gate for merges',
        status: 'active',
      },
      {
        key: 'database',
        category: 'architecture',
        operator: 'eq',
        value: 'postgres',
        rationale: '',
        status: 'active',
      },
    ]);
  });

  it('accepts a bare list and an empty document', () => {
    const list = loadFactsFromYaml('- key: a\n  category: c\n  value: 1\n');
    expect(list.ok && list.value.map((f) => f.key)).toEqual(['a']);
    const empty = loadFactsFromYaml('');
    expect(empty.ok && empty.value).toEqual([]);
  });

  it('reports duplicate keys', () => {
    const loaded = loadFactsFromYaml('- {key: a, category: c, value: 1}\n- {key: a, category: c, value: 2}\n', 'facts.yaml');
    expect(loaded.ok ? undefined : loaded.error.message).toBe("Duplicate fact key 'a' in facts.yaml");
  });

  it('reports YAML and schema problems', () => {
    const broken = loadFactsFromYaml('facts: [', 'facts.yaml');
    expect(broken.ok ? undefined : broken.error.message).toMatch(/^Could not parse facts\.yaml as YAML: /);

    const invalid = loadFactsFromYaml('facts:\n  - key: a\n    value: 1\n', 'facts.yaml');
    expect(invalid.ok ? undefined : invalid.error.message).toMatch(/^Invalid fact definitions in facts\.yaml: /);
  });

  describe('from disk', () => {
    let dir = '';

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'loomwork-facts-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('builds a registry from a file', async () => {
      const path = join(dir, 'facts.yaml');
      await writeFile(path, yaml, 'utf-8');
      const facts = await createFactRegistryFromFile(path);
      expect(facts.size).toBe(2);
      expect(facts.validate('test-coverage', 90).isValid).toBe(true);
    });

    it('reports unreadable files', async () => {
      const path = join(dir, 'missing.yaml');
      const loaded = await loadFactsFile(path);
      expect(loaded.ok ? undefined : loaded.error.message).toMatch(/^Could not read fact file .*missing\.yaml: /);
      await expect(createFactRegistryFromFile(path)).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
