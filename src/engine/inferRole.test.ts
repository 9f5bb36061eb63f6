import { describe, expect, it } from 'vitest';
import { inferRole } from './inferRole';

describe('inferRole', () => {
  it.each([
    ['Female', 'Yes', 'mother'],
    ['Male', 'Yes', 'father'],
    ['Gender Neutral', 'Yes', 'parent'],
    ['Female', 'No', 'individual'],
    ['Male', 'No', 'individual'],
    ['Gender Neutral', 'No', 'individual']
  ] as const)('%s with kids=%s is %s', (gender, hasKids, role) => {
    expect(inferRole(gender, hasKids)).toBe(role);
  });
});
