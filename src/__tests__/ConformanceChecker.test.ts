/**
 * Unit tests for ExtensionConformanceChecker.
 */

import { describe, it, expect } from 'vitest';

import { ExtensionConformanceChecker } from '../ConformanceChecker';
import { WGS84E_3D_SRS_NAME } from '../ExtensionTypes';
import { MalformedInputError, UnknownTypeError } from '../errors';
import { createNode, createPoint } from './fragmentFactory';

describe('ExtensionConformanceChecker', () => {
  const checker = new ExtensionConformanceChecker();

  describe('Point_WGS84E_3D', () => {
    it('accepts the fixed srsName with a single pos', () => {
      const fragment = createPoint([createNode('pos', {}, [], '1 2 3')]);

      expect(checker.check(fragment, 'Point_WGS84E_3D')).toEqual({ ok: true, violations: [] });
    });

    it('accepts the fixed srsName with a single coordinates', () => {
      const fragment = createPoint([createNode('coordinates', {}, [], '1,2,3')]);

      expect(checker.check(fragment, 'Point_WGS84E_3D').ok).toBe(true);
    });

    it('reports a foreign CRS as a single FixedValueMismatch', () => {
      const fragment = createPoint([createNode('coordinates', {}, [], '1,2,3')], { srsName: 'EPSG:4326' });

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.ok).toBe(false);
      expect(verdict.violations).toEqual([
        {
          kind: 'FixedValueMismatch',
          message: `Attribute 'srsName' is 'EPSG:4326'; expected '${WGS84E_3D_SRS_NAME}'`,
          path: '/Point_WGS84E_3D/@srsName',
          attribute: 'srsName',
          expected: [WGS84E_3D_SRS_NAME],
          actual: 'EPSG:4326'
        }
      ]);
    });

    it('reports a missing srsName', () => {
      const fragment = createPoint([createNode('pos', {}, [], '1 2 3')], {});

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations).toHaveLength(1);
      expect(verdict.violations[0].kind).toBe('FixedValueMismatch');
      expect(verdict.violations[0].actual).toBeNull();
      expect(verdict.violations[0].message).toBe(
        `Required attribute 'srsName' is missing; expected '${WGS84E_3D_SRS_NAME}'`
      );
    });

    it('compares srsName case-sensitively and without trimming', () => {
      const upper = createPoint([createNode('pos')], { srsName: WGS84E_3D_SRS_NAME.toUpperCase() });
      const padded = createPoint([createNode('pos')], { srsName: ` ${WGS84E_3D_SRS_NAME}` });

      expect(checker.check(upper, 'Point_WGS84E_3D').violations.map(v => v.kind)).toEqual(['FixedValueMismatch']);
      expect(checker.check(padded, 'Point_WGS84E_3D').violations.map(v => v.kind)).toEqual(['FixedValueMismatch']);
    });

    it('reports both coordinate forms at the second one', () => {
      const fragment = createPoint([createNode('pos', {}, [], '1 2 3'), createNode('coordinates', {}, [], '1,2,3')]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.ok).toBe(false);
      expect(verdict.violations).toHaveLength(1);
      expect(verdict.violations[0]).toMatchObject({
        kind: 'ExclusiveChoiceViolated',
        path: '/Point_WGS84E_3D/coordinates[1]',
        element: 'coordinates',
        actual: 'pos,coordinates'
      });
    });

    it('reports a missing coordinate form at the root', () => {
      const fragment = createPoint([createNode('identifier', {}, [], 'pt-1')]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations).toEqual([
        {
          kind: 'ExclusiveChoiceViolated',
          message: "Expected exactly one of 'pos' or 'coordinates', found none",
          path: '/Point_WGS84E_3D',
          expected: ['pos', 'coordinates'],
          actual: null
        }
      ]);
    });

    it('treats a repeated pos as breaking the exclusive choice', () => {
      const fragment = createPoint([createNode('pos'), createNode('pos')]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations.map(v => [v.kind, v.path])).toEqual([
        ['ExclusiveChoiceViolated', '/Point_WGS84E_3D/pos[2]']
      ]);
    });

    it('leaves inherited GML properties unrestricted', () => {
      const fragment = createPoint([
        createNode('identifier', { codeSpace: 'urn:test' }, [], 'pt-1'),
        createNode('name', {}, [], 'first'),
        createNode('name', {}, [], 'second'),
        createNode('description', {}, [], 'a point'),
        createNode('pos', {}, [], '1 2 3')
      ]);

      expect(checker.check(fragment, 'Point_WGS84E_3D')).toEqual({ ok: true, violations: [] });
    });

    it('allows each resolution and presentation element once', () => {
      const fragment = createPoint([
        createNode('pos', {}, [], '1 2 3'),
        createNode('coordinateResolution', {}, [], '0.1'),
        createNode('horizontalAccuracy', {}, [], '5'),
        createNode('verticalAccuracy', {}, [], '7'),
        createNode('sexagesimal'),
        createNode('gridMetre'),
        createNode('zoneMetre'),
        createNode('quadrangle'),
        createNode('numericBit')
      ]);

      expect(checker.check(fragment, 'Point_WGS84E_3D').ok).toBe(true);
    });

    it('reports a repeated presentation element at the first surplus occurrence', () => {
      const fragment = createPoint([
        createNode('pos'),
        createNode('gridMetre'),
        createNode('gridMetre'),
        createNode('gridMetre')
      ]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations).toEqual([
        {
          kind: 'CardinalityViolated',
          message: "Element 'gridMetre' occurs 3 times; at most 1 allowed",
          path: '/Point_WGS84E_3D/gridMetre[2]',
          element: 'gridMetre',
          actual: '3'
        }
      ]);
    });

    it('accepts unknown base-type content under the lenient reading', () => {
      const fragment = createPoint([createNode('metaDataProperty'), createNode('pos')]);

      expect(checker.check(fragment, 'Point_WGS84E_3D').ok).toBe(true);
    });

    it('rejects content the restriction drops under the strict reading', () => {
      const strict = new ExtensionConformanceChecker({ strict: true });
      const fragment = createPoint([createNode('metaDataProperty'), createNode('pos'), createNode('descriptionReference')]);

      const verdict = strict.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations).toEqual([
        {
          kind: 'UndeclaredContent',
          message: "Element 'metaDataProperty' is not permitted by PointType_WGS84E_3D",
          path: '/Point_WGS84E_3D/metaDataProperty[1]',
          element: 'metaDataProperty'
        },
        {
          kind: 'UndeclaredContent',
          message: "Element 'descriptionReference' is not permitted by PointType_WGS84E_3D",
          path: '/Point_WGS84E_3D/descriptionReference[1]',
          element: 'descriptionReference'
        }
      ]);
    });
  });

  describe('violation ordering', () => {
    it('puts attribute checks ahead of child-structure checks on the same node', () => {
      const fragment = createPoint([createNode('sexagesimal'), createNode('sexagesimal')], {});

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations.map(v => v.kind)).toEqual([
        'FixedValueMismatch',
        'ExclusiveChoiceViolated',
        'CardinalityViolated'
      ]);
    });

    it('follows document order across rules', () => {
      const fragment = createPoint([
        createNode('sexagesimal'),
        createNode('sexagesimal'),
        createNode('pos'),
        createNode('coordinates')
      ]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations.map(v => v.path)).toEqual([
        '/Point_WGS84E_3D/sexagesimal[2]',
        '/Point_WGS84E_3D/coordinates[1]'
      ]);
    });

    it('counts nested descendants when placing siblings in document order', () => {
      const fragment = createPoint([
        createNode('quadrangle', {}, [createNode('sheet'), createNode('cell')]),
        createNode('pos'),
        createNode('pos'),
        createNode('quadrangle')
      ]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations.map(v => v.path)).toEqual([
        '/Point_WGS84E_3D/pos[2]',
        '/Point_WGS84E_3D/quadrangle[2]'
      ]);
    });

    it('reports every independent violation in one pass', () => {
      const fragment = createPoint([], { srsName: 'EPSG:4979' });

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations.map(v => v.kind)).toEqual(['FixedValueMismatch', 'ExclusiveChoiceViolated']);
    });
  });

  describe('GEOLOCInstance', () => {
    it('accepts zero remarks', () => {
      expect(checker.check(createNode('GEOLOCInstance'), 'GEOLOCInstance')).toEqual({ ok: true, violations: [] });
    });

    it('accepts one remarks alongside unknown inherited content', () => {
      const fragment = createNode('GEOLOCInstance', { id: 'loc-1' }, [
        createNode('locationName', {}, [], 'Test site'),
        createNode('remarks', {}, [], 'free text')
      ]);

      expect(checker.check(fragment, 'GEOLOCInstance').ok).toBe(true);
    });

    it('reports repeated remarks once', () => {
      const fragment = createNode('GEOLOCInstance', {}, [
        createNode('remarks', {}, [], 'one'),
        createNode('remarks', {}, [], 'two'),
        createNode('remarks', {}, [], 'three')
      ]);

      const verdict = checker.check(fragment, 'GEOLOCInstance');

      expect(verdict.ok).toBe(false);
      expect(verdict.violations).toHaveLength(1);
      expect(verdict.violations[0]).toMatchObject({
        kind: 'CardinalityViolated',
        path: '/GEOLOCInstance/remarks[2]',
        message: "Element 'remarks' occurs 3 times; at most 1 allowed"
      });
    });

    it('keeps open content even under the strict reading', () => {
      const strict = new ExtensionConformanceChecker({ strict: true });
      const fragment = createNode('GEOLOCInstance', {}, [createNode('anything'), createNode('remarks')]);

      expect(strict.check(fragment, 'GEOLOCInstance').ok).toBe(true);
    });
  });

  describe('verdict properties', () => {
    it('returns an identical verdict when run twice', () => {
      const fragment = createPoint([createNode('pos'), createNode('coordinates')], { srsName: 'EPSG:4326' });

      expect(checker.check(fragment, 'Point_WGS84E_3D')).toEqual(checker.check(fragment, 'Point_WGS84E_3D'));
    });

    it('does not mutate the fragment', () => {
      const fragment = createPoint([createNode('coordinates'), createNode('pos')]);
      const before = JSON.stringify(fragment);

      checker.check(fragment, 'Point_WGS84E_3D');

      expect(JSON.stringify(fragment)).toBe(before);
    });

    it('carries node locations onto violations', () => {
      const fragment = createPoint([createNode('pos')], { srsName: 'EPSG:4326' });
      fragment.location = { uri: 'file:///tmp/point.xml', line: 2, column: 1 };

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations[0].location).toEqual({ uri: 'file:///tmp/point.xml', line: 2, column: 1 });
    });

    it('handles deeply nested content under an allowed element', () => {
      const quadrangle = createNode('quadrangle');
      let parent = quadrangle;
      for (let depth = 0; depth < 20000; depth++) {
        const cell = createNode('c');
        parent.children.push(cell);
        parent = cell;
      }
      const fragment = createPoint([quadrangle, createNode('pos'), createNode('pos')]);

      const verdict = checker.check(fragment, 'Point_WGS84E_3D');

      expect(verdict.violations.map(v => [v.kind, v.path])).toEqual([
        ['ExclusiveChoiceViolated', '/Point_WGS84E_3D/pos[2]']
      ]);
    });
  });

  describe('errors', () => {
    it('rejects an unknown type name', () => {
      expect(() => checker.check(createPoint([createNode('pos')]), 'Bogus')).toThrow(UnknownTypeError);
    });

    it('checks the type name before the fragment shape', () => {
      expect(() => checker.check(JSON.parse('{"name": 42}'), 'Bogus')).toThrow(UnknownTypeError);
    });

    it('rejects a fragment that is not a tree', () => {
      const pos = createNode('pos');
      pos.children.push(pos);

      expect(() => checker.check(createPoint([pos]), 'Point_WGS84E_3D')).toThrow(MalformedInputError);
    });

    it('rejects a fragment without a children array', () => {
      const input = JSON.parse('{"name": "Point_WGS84E_3D", "namespace": null, "attributes": {}, "text": ""}');

      expect(() => checker.check(input, 'Point_WGS84E_3D')).toThrow('Malformed input at /Point_WGS84E_3D: children must be an array');
    });
  });
});
