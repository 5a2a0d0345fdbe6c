import { describe, it, expect } from '@jest/globals';
import { parse } from 'yaml';
import {
  FrontMatterStrategy,
  HtmlStrategy,
  RawStrategy,
  createOutputStrategy,
  describeSection,
  isOutputStrategyName,
} from '../../src/services/OutputStrategies.js';
import { ManError } from '../../src/utils/errors.js';

describe('OutputStrategies', () => {
  describe('HtmlStrategy', () => {
    it('should wrap the body in a complete document', () => {
      const markup = new HtmlStrategy().renderTitle({ name: 'LS', section: '1' });

      expect(markup.header).toEqual([
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        '<meta http-equiv="Content-Type" content="text/html; charset=UTF-8">',
        '<title>LS(1)</title>',
        '</head>',
        '<body>',
      ]);
      expect(markup.trailer).toEqual(['</body>', '</html>']);
    });

    it('should omit the section when there is none', () => {
      const markup = new HtmlStrategy().renderTitle({ name: 'intro', section: '' });
      expect(markup.header[4]).toBe('<title>intro</title>');
    });
  });

  describe('FrontMatterStrategy', () => {
    it('should write every supplied field in order', () => {
      const strategy = new FrontMatterStrategy({ permalink: '/man/ls.html' });
      const markup = strategy.renderTitle({
        name: 'ls',
        section: '1',
        date: 'March 2024',
        source: 'coreutils',
      });

      expect(markup.header[0]).toBe('---');
      expect(markup.header[markup.header.length - 1]).toBe('---');
      expect(markup.trailer).toEqual([]);

      const fields: Record<string, unknown> = parse(markup.header.slice(1, -1).join('\n'));
      expect(fields).toEqual({
        permalink: '/man/ls.html',
        layout: 'manpage',
        title: 'ls(1)',
        package: 'coreutils',
        date: 'March 2024',
        section: '1 (User Commands)',
      });
      expect(Object.keys(fields)).toEqual(['permalink', 'layout', 'title', 'package', 'date', 'section']);
    });

    it('should leave out fields that were not supplied', () => {
      const markup = new FrontMatterStrategy().renderTitle({ name: 'notes', section: '' });
      expect(markup.header).toEqual(['---', 'layout: manpage', 'title: notes', '---']);
    });
  });

  describe('RawStrategy', () => {
    it('should add nothing around the body', () => {
      expect(new RawStrategy().renderTitle({ name: 'x', section: '1' })).toEqual({ header: [], trailer: [] });
    });
  });

  describe('createOutputStrategy()', () => {
    it('should build each strategy by name', () => {
      expect(createOutputStrategy('html')).toBeInstanceOf(HtmlStrategy);
      expect(createOutputStrategy('frontmatter', { permalink: '/x' })).toBeInstanceOf(FrontMatterStrategy);
      expect(createOutputStrategy('raw').name).toBe('raw');
    });

    it('should reject unknown names', () => {
      expect(() => createOutputStrategy('pdf')).toThrow(
        'unknown output format "pdf" (expected one of: html, frontmatter, raw)'
      );
      expect(() => createOutputStrategy('pdf')).toThrow(ManError);
    });
  });

  it('should describe well-known sections', () => {
    expect(describeSection('3')).toBe('3 (Library Functions)');
    expect(describeSection('8')).toBe('8 (System Administration)');
    expect(describeSection('3p')).toBe('3p');
    expect(describeSection('constructor')).toBe('constructor');
  });

  it('should recognise strategy names', () => {
    expect(isOutputStrategyName('frontmatter')).toBe(true);
    expect(isOutputStrategyName('markdown')).toBe(false);
  });
});
