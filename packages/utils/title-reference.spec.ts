import { describe, it, expect } from 'vitest';
import { parseTitleReference } from './title-reference.js';

describe('parseTitleReference', () => {
  it('splits a trailing docket reference', () => {
    expect(parseTitleReference('Commonwealth v. Emilio Delarosa, SJC-13444', 'SJC-\\d+')).toEqual({
      name: 'Commonwealth v. Emilio Delarosa',
      reference: 'SJC-13444',
    });
  });

  it('keeps the whole title when there is no reference', () => {
    expect(parseTitleReference('Annual State of the Judiciary', 'SJC-\\d+')).toEqual({
      name: 'Annual State of the Judiciary',
    });
  });

  it('only matches the reference at the end of the title', () => {
    expect(parseTitleReference('SJC-12345, a retrospective', 'SJC-\\d+')).toEqual({
      name: 'SJC-12345, a retrospective',
    });
  });

  it('does nothing without a pattern', () => {
    expect(parseTitleReference('Doe v. Roe, SJC-1')).toEqual({ name: 'Doe v. Roe, SJC-1' });
  });
});
