import { describe, it, expect } from 'vitest';

import { DialectPolicyFactory, SqlGenerator, UnsupportedConstructError } from '@metaquery/core';

import { HIVE_POLICY, isHiveJoinCondition } from '../index';

describe('isHiveJoinCondition', () => {
  it.each([
    'a.id = b.a_id',
    'a.id = b.a_id AND a.region = b.region',
    "a.code = 'X'",
  ])('should keep %s in ON', (predicate) => {
    expect(isHiveJoinCondition(predicate)).toBe(true);
  });

  it.each([
    'a.id != b.id',
    'a.v > b.v',
    'a.v >= b.v',
    'a.v < b.v',
    'a.v <> b.v',
    'b.deleted_at IS NULL',
    'b.deleted_at is null',
    'b.deleted_at Is Not Null',
  ])('should defer %s to WHERE', (predicate) => {
    expect(isHiveJoinCondition(predicate)).toBe(false);
  });
});

describe('HIVE_POLICY', () => {
  it('should disable every optional construct', () => {
    expect(HIVE_POLICY.name).toBe('hive');
    expect(HIVE_POLICY.supportsOuterJoin).toBe(false);
    expect(HIVE_POLICY.supportsAliasedSelection).toBe(false);
    expect(HIVE_POLICY.supportsMultiTableCommaFrom).toBe(false);
    expect(Object.isFrozen(HIVE_POLICY)).toBe(true);
  });

  it('should register itself on import', () => {
    expect(DialectPolicyFactory.isSupported('hive')).toBe(true);
    expect(DialectPolicyFactory.getPolicy('HIVE')).toBe(HIVE_POLICY);
  });

  it('should be usable as a generator default by name', () => {
    const generator = new SqlGenerator({ defaultPolicy: 'hive' });

    expect(generator.defaultPolicy).toBe(HIVE_POLICY);
  });

  it('should report its name on unsupported constructs', () => {
    const error = new UnsupportedConstructError('outer-join', HIVE_POLICY.name);

    expect(error.message).toBe('Construct "outer-join" is not supported by dialect "hive"');
  });
});
