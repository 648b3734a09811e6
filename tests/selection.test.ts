import { describe, it, expect } from 'vitest';
import { isRuleEnabled, selectRules } from '../src/selection';

describe('isRuleEnabled', () => {
  it('enables every rule by default', () => {
    expect(isRuleEnabled('PMC001', {})).toBe(true);
    expect(isRuleEnabled('PMC007', { select: [] })).toBe(true);
  });

  it('matches select entries by prefix', () => {
    expect(isRuleEnabled('PMC004', { select: ['PMC00'] })).toBe(true);
    expect(isRuleEnabled('PMC004', { select: ['PMC001'] })).toBe(false);
  });

  it('drops ignored rules', () => {
    expect(isRuleEnabled('PMC005', { ignore: ['PMC005'] })).toBe(false);
    expect(isRuleEnabled('PMC006', { ignore: ['PMC005'] })).toBe(true);
  });

  it('lets the more specific entry win', () => {
    expect(isRuleEnabled('PMC007', { select: ['PMC007'], ignore: ['PMC'] })).toBe(true);
    expect(isRuleEnabled('PMC007', { select: ['PMC'], ignore: ['PMC007'] })).toBe(false);
  });

  it('lets ignore win over an equally specific select', () => {
    expect(isRuleEnabled('PMC003', { select: ['PMC003'], ignore: ['PMC003'] })).toBe(false);
  });
});

describe('selectRules', () => {
  it('keeps rule order', () => {
    const ids = selectRules({ select: ['PMC007', 'PMC002'] }).map((r) => r.id);
    expect(ids).toEqual(['PMC002', 'PMC007']);
  });

  it('combines a select prefix with an ignored id', () => {
    const ids = selectRules({ select: ['PMC00'], ignore: ['PMC007'] }).map((r) => r.id);
    expect(ids).toEqual(['PMC001', 'PMC002', 'PMC003', 'PMC004', 'PMC005', 'PMC006']);
  });

  it('returns nothing when nothing is selected', () => {
    expect(selectRules({ select: ['E501'] })).toEqual([]);
  });
});
