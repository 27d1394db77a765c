import { describe, it, expect } from 'vitest';
import {
  findChild,
  findFirstDescendant,
  findXmlSyntaxIssue,
  getAttribute,
} from '../../src/core/XmlTree.js';
import { element } from '../helpers/xml.js';

describe('XmlTree', () => {
  describe('parseDocumentElement', () => {
    it('should build elements with unprefixed attributes and ordered children', () => {
      const root = element('<root a="1"><first /><second b="2" /><first /></root>');

      expect(root.tagName).toBe('root');
      expect(root.attributes).toEqual({ a: '1' });
      expect(root.children.map((child) => child.tagName)).toEqual(['first', 'second', 'first']);
      expect(root.children[1].attributes).toEqual({ b: '2' });
    });

    it('should skip the XML declaration', () => {
      const root = element('<?xml version="1.0" encoding="UTF-8"?><mxfile host="x" />');

      expect(root.tagName).toBe('mxfile');
      expect(root.attributes).toEqual({ host: 'x' });
    });

    it('should keep attribute values verbatim', () => {
      const root = element('<mxCell value=" padded " x="10.50" />');

      expect(root.attributes).toEqual({ value: ' padded ', x: '10.50' });
    });

    it('should collect text content separately from children', () => {
      const root = element('<diagram id="p1">abc<inner />def</diagram>');

      expect(root.text).toBe('abcdef');
      expect(root.children.map((child) => child.tagName)).toEqual(['inner']);
    });
  });

  describe('findChild', () => {
    it('should only look at direct children', () => {
      const root = element('<a><b><c id="deep" /></b><c id="direct" /></a>');

      expect(findChild(root, 'c')?.attributes.id).toBe('direct');
      expect(findChild(root, 'd')).toBeUndefined();
    });
  });

  describe('findFirstDescendant', () => {
    it('should return the first match in document order across the subtree', () => {
      const root = element('<a><b><c id="deep" /></b><c id="direct" /></a>');

      expect(findFirstDescendant(root, 'c')?.attributes.id).toBe('deep');
    });

    it('should not match the element itself', () => {
      const root = element('<c id="self"><d /></c>');

      expect(findFirstDescendant(root, 'c')).toBeUndefined();
    });
  });

  describe('getAttribute', () => {
    it('should distinguish missing from empty attributes', () => {
      const el = element('<object label="" />');

      expect(getAttribute(el, 'label')).toBe('');
      expect(getAttribute(el, 'id')).toBeUndefined();
    });
  });

  describe('findXmlSyntaxIssue', () => {
    it('should accept well-formed markup', () => {
      expect(findXmlSyntaxIssue('<a><b /></a>')).toBeUndefined();
    });

    it('should report mismatched tags with a line number', () => {
      const issue = findXmlSyntaxIssue('<a>\n<b>\n</a>');

      expect(issue).toBeDefined();
      expect(issue?.line).toBeGreaterThan(0);
    });
  });
});
