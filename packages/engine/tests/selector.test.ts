import { describe, it, expect } from 'vitest';
import { createSelector, hasCandidateService, isCandidate, selectServices } from '../src/selector/index.js';
import { makeFile, makeService } from './fixtures.js';

describe('isCandidate', () => {
  it('selects services ending in Cache', () => {
    expect(isCandidate(makeService('OrderCache'))).toBe(true);
  });

  it('selects a service named exactly Cache', () => {
    expect(isCandidate(makeService('Cache'))).toBe(true);
  });

  it('rejects services where Cache is not the suffix', () => {
    expect(isCandidate(makeService('OrderService'))).toBe(false);
    expect(isCandidate(makeService('CacheService'))).toBe(false);
  });

  it('is case-sensitive', () => {
    expect(isCandidate(makeService('Ordercache'))).toBe(false);
    expect(isCandidate(makeService('ORDERCACHE'))).toBe(false);
  });

  it('honours an overridden suffix', () => {
    expect(isCandidate(makeService('OrderMemo'), 'Memo')).toBe(true);
    expect(isCandidate(makeService('OrderCache'), 'Memo')).toBe(false);
  });
});

describe('createSelector', () => {
  it('binds the suffix', () => {
    const selector = createSelector('Store');
    expect(selector(makeService('UserStore'))).toBe(true);
    expect(selector(makeService('UserCache'))).toBe(false);
  });

  it('defaults to Cache', () => {
    expect(createSelector()(makeService('UserCache'))).toBe(true);
  });
});

describe('file selection', () => {
  const file = makeFile([makeService('AService'), makeService('BCache'), makeService('CCache')]);

  it('keeps candidates in declaration order', () => {
    expect(selectServices(file, createSelector()).map(s => s.name)).toEqual(['BCache', 'CCache']);
  });

  it('reports whether any candidate exists', () => {
    expect(hasCandidateService(file, createSelector())).toBe(true);
    expect(hasCandidateService(makeFile([makeService('AService')]), createSelector())).toBe(false);
    expect(hasCandidateService(makeFile([]), createSelector())).toBe(false);
  });
});
