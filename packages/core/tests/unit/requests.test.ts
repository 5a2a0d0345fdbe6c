import { describe, it, expect } from '@jest/globals';
import { BULLET_TAGS, REQUESTS, supportedRequests } from '../../src/converter/requests.js';
import { isFontMacro } from '../../src/services/FontInterpreter.js';

describe('requests', () => {
  it('should list the structural requests', () => {
    expect(supportedRequests()).toEqual(expect.arrayContaining(['TH', 'SH', 'SS', 'TP', 'IP', 'RS', 'RE', 'TS', 'so']));
    expect(REQUESTS.get('LP')).toBe('paragraph');
    expect(REQUESTS.get('EX')).toBe('no-fill');
    expect(REQUESTS.get('XX')).toBeUndefined();
  });

  it('should route every font macro to the font handler', () => {
    const fontRequests = supportedRequests().filter(name => REQUESTS.get(name) === 'font');
    expect(fontRequests.every(isFontMacro)).toBe(true);
    expect(fontRequests).toHaveLength(10);
  });

  it('should know the usual bullet tags', () => {
    expect(BULLET_TAGS.has('\\(bu')).toBe(true);
    expect(BULLET_TAGS.has('\\[bu]')).toBe(true);
    expect(BULLET_TAGS.has('-n')).toBe(false);
  });
});
