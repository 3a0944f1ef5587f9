import { afterEach, describe, expect, it, vi } from 'vitest';
import fc from 'fast-check';
import { ReportListError } from '../reports/errors.js';
import { Logger } from '../utils/logger.js';
import { createConstraintWithSets, type CreateConstraintSettings } from './commands.js';
import { exportWithSet } from './constraint.js';
import { reportsThrownBy, sampleCib } from './testing.js';
import { getConstraints } from './tools.js';
import { element } from './tree.js';

const settings: CreateConstraintSettings = {
  logger: new Logger({ component: 'test', level: 'error' }),
};

describe('createConstraintWithSets', () => {
  describe('order', () => {
    it('should append an order constraint with a generated id', () => {
      const cib = sampleCib();
      const constraint = createConstraintWithSets(
        cib,
        'order',
        [{ ids: ['A', 'B'], options: { sequential: 'false' } }],
        { kind: 'mandatory' },
        settings
      );

      expect(constraint.tag).toBe('rsc_order');
      expect(constraint.attributes()).toEqual({ kind: 'Mandatory', id: 'ha_order_set_A_B' });
      expect(exportWithSet(constraint).resourceSets).toEqual([
        { ids: ['A', 'B'], options: { id: 'ha_rsc_set_A_B', sequential: 'false' } },
      ]);
      expect(getConstraints(cib).children).toEqual([constraint]);
    });

    it('should normalize symmetrical', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'order',
        [{ ids: ['A'], options: {} }],
        { symmetrical: 'FALSE' },
        settings
      );
      expect(constraint.getAttribute('symmetrical')).toBe('false');
    });

    it('should report an invalid kind with the value as given', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'order', [{ ids: ['A'], options: {} }], { kind: 'never' }, settings)
      );
      expect(reports).toEqual([
        {
          kind: 'InvalidOptionValue',
          severity: 'ERROR',
          forceCode: null,
          payload: {
            optionName: 'kind',
            optionValue: 'never',
            allowedValues: ['Optional', 'Mandatory', 'Serialize'],
          },
        },
      ]);
    });

    it('should refuse options of another constraint type', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'order', [{ ids: ['A'], options: {} }], { score: '10' }, settings)
      );
      expect(reports[0]?.payload).toEqual({
        optionNames: ['score'],
        allowed: ['id', 'kind', 'symmetrical'],
        optionType: 'constraint',
        allowedPatterns: [],
      });
    });
  });

  describe('colocation', () => {
    it('should default the score to INFINITY', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'colocation',
        [{ ids: ['A', 'B'], options: {} }],
        {},
        settings
      );
      expect(constraint.attributes()).toEqual({ id: 'ha_colocation_set_A_B', score: 'INFINITY' });
    });

    it('should keep a given score or score attribute', () => {
      const scored = createConstraintWithSets(
        sampleCib(),
        'colocation',
        [{ ids: ['A'], options: {} }],
        { score: '-100' },
        settings
      );
      const byAttribute = createConstraintWithSets(
        sampleCib(),
        'colocation',
        [{ ids: ['A'], options: {} }],
        { 'score-attribute': 'pingd' },
        settings
      );

      expect(scored.getAttribute('score')).toBe('-100');
      expect(byAttribute.getAttribute('score')).toBeUndefined();
    });

    it('should report an invalid score', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'colocation', [{ ids: ['A'], options: {} }], { score: 'high' }, settings)
      );
      expect(reports).toEqual([
        { kind: 'InvalidScore', severity: 'ERROR', forceCode: null, payload: { score: 'high' } },
      ]);
    });
  });

  describe('ticket', () => {
    it('should create a ticket constraint', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'ticket',
        [{ ids: ['A'], options: { role: 'Started' } }],
        { ticket: 'T1', 'loss-policy': 'stop' },
        settings
      );
      expect(constraint.tag).toBe('rsc_ticket');
      expect(constraint.attributes()).toEqual({ ticket: 'T1', 'loss-policy': 'stop', id: 'ha_ticket_set_A' });
    });

    it('should require a valid ticket and loss policy', () => {
      const missing = reportsThrownBy(() =>
        createConstraintWithSets(
          sampleCib(),
          'ticket',
          [{ ids: ['A'], options: {} }],
          { 'loss-policy': 'explode' },
          settings
        )
      );
      expect(missing.map((item) => item.payload)).toEqual([
        { optionNames: ['ticket'], optionType: 'ticket constraint' },
        {
          optionName: 'loss-policy',
          optionValue: 'explode',
          allowedValues: ['fence', 'stop', 'freeze', 'demote'],
        },
      ]);

      const invalid = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'ticket', [{ ids: ['A'], options: {} }], { ticket: 'T 1' }, settings)
      );
      expect(invalid[0]?.payload).toEqual({
        id: 'T 1',
        idDescription: 'ticket',
        invalidCharacter: ' ',
        isFirstChar: false,
      });
    });
  });

  describe('resource resolution', () => {
    it('should refuse a resource inside a clone by default', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'order', [{ ids: ['A', 'R'], options: {} }], {}, settings)
      );
      expect(reports.map((item) => item.kind)).toEqual(['ResourceInClone']);
    });

    it('should reference the clone when repairing', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'order',
        [{ ids: ['A', 'R'], options: {} }],
        {},
        { ...settings, canRepairToClone: true }
      );
      expect(constraint.id).toBe('ha_order_set_A_C-clone');
      expect(exportWithSet(constraint).resourceSets?.[0]?.ids).toEqual(['A', 'C-clone']);
    });

    it('should reference the resource when allowed', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'order',
        [{ ids: ['A', 'R'], options: {} }],
        {},
        { ...settings, inCloneAllowed: true }
      );
      expect(constraint.id).toBe('ha_order_set_A_R');
    });

    it('should report resource problems before option problems', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'order', [{ ids: ['X'], options: {} }], { bogus: '1' }, settings)
      );
      expect(reports.map((item) => item.kind)).toEqual(['ResourceNotFound']);
    });

    it('should refuse an empty set', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'order', [{ ids: [], options: {} }], {}, settings)
      );
      expect(reports.map((item) => item.kind)).toEqual(['EmptyResourceSet']);
    });
  });

  describe('ids', () => {
    it('should use a configured prefix', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'order',
        [{ ids: ['A'], options: {} }],
        {},
        { ...settings, idPrefix: 'east' }
      );
      expect(constraint.id).toBe('east_order_set_A');
      expect(constraint.children[0]?.id).toBe('east_rsc_set_A');
    });

    it('should accept a requested id', () => {
      const constraint = createConstraintWithSets(
        sampleCib(),
        'order',
        [{ ids: ['A'], options: {} }],
        { id: 'my-order' },
        settings
      );
      expect(constraint.id).toBe('my-order');
    });

    it('should refuse a requested id already in use', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'order', [{ ids: ['A'], options: {} }], { id: 'B' }, settings)
      );
      expect(reports).toEqual([
        { kind: 'IdAlreadyExists', severity: 'ERROR', forceCode: null, payload: { id: 'B' } },
      ]);
    });

    it('should describe an invalid requested id', () => {
      const reports = reportsThrownBy(() =>
        createConstraintWithSets(sampleCib(), 'colocation', [{ ids: ['A'], options: {} }], { id: '1st' }, settings)
      );
      expect(reports[0]?.payload).toEqual({
        id: '1st',
        idDescription: 'colocation constraint id',
        invalidCharacter: '1',
        isFirstChar: true,
      });
    });
  });

  describe('duplicates', () => {
    it('should refuse a duplicate and leave the tree unchanged', () => {
      const cib = sampleCib();
      const first = createConstraintWithSets(cib, 'order', [{ ids: ['A', 'B'], options: {} }], {}, settings);

      try {
        createConstraintWithSets(cib, 'order', [{ ids: ['A', 'B'], options: {} }], {}, settings);
        expect.unreachable('duplicate constraint should be refused');
      } catch (error) {
        expect(error).toBeInstanceOf(ReportListError);
        if (error instanceof ReportListError) {
          expect(error.reports).toEqual([
            {
              kind: 'DuplicateConstraints',
              severity: 'ERROR',
              forceCode: 'FORCE_CONSTRAINT_DUPLICATE',
              payload: { constraintType: 'rsc_order', constraints: [exportWithSet(first)] },
            },
          ]);
        }
      }
      expect(getConstraints(cib).children).toEqual([first]);
    });

    it('should accept sets in another order or with other resources', () => {
      const cib = sampleCib();
      createConstraintWithSets(cib, 'order', [{ ids: ['A', 'B'], options: {} }], {}, settings);
      createConstraintWithSets(cib, 'order', [{ ids: ['B', 'A'], options: {} }], {}, settings);
      createConstraintWithSets(cib, 'order', [{ ids: ['A', 'C'], options: {} }], {}, settings);

      expect(getConstraints(cib).children.map((node) => node.id)).toEqual([
        'ha_order_set_A_B',
        'ha_order_set_B_A',
        'ha_order_set_A_C',
      ]);
    });

    it('should create a forced duplicate with a fresh id', () => {
      const cib = sampleCib();
      createConstraintWithSets(cib, 'order', [{ ids: ['A', 'B'], options: {} }], {}, settings);
      const forced = createConstraintWithSets(
        cib,
        'order',
        [{ ids: ['A', 'B'], options: {} }],
        {},
        { ...settings, duplicationAllowed: true }
      );

      expect(forced.id).toBe('ha_order_set_A_B-1');
      expect(forced.children[0]?.id).toBe('ha_rsc_set_A_B-1');
    });

    it('should never leave a refused constraint behind', () => {
      fc.assert(
        fc.property(
          fc.array(fc.subarray(['A', 'B', 'C'], { minLength: 1 }), { minLength: 1, maxLength: 6 }),
          (requests) => {
            const cib = sampleCib();
            const seen = new Set<string>();
            for (const ids of requests) {
              const key = ids.join(',');
              try {
                createConstraintWithSets(cib, 'order', [{ ids, options: {} }], {}, settings);
                expect(seen.has(key)).toBe(false);
              } catch (error) {
                expect(error).toBeInstanceOf(ReportListError);
                expect(seen.has(key)).toBe(true);
              }
              seen.add(key);
            }
            expect(getConstraints(cib).children).toHaveLength(seen.size);
          }
        )
      );
    });
  });

  describe('logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should log creation only at debug level', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const request = [{ ids: ['A'], options: {} }];

      createConstraintWithSets(sampleCib(), 'order', request, {}, {
        logger: new Logger({ component: 'test' }),
      });
      expect(write).not.toHaveBeenCalled();

      createConstraintWithSets(sampleCib(), 'order', request, {}, {
        logger: new Logger({ component: 'test', level: 'debug' }),
      });
      expect(write).toHaveBeenCalledTimes(1);
      const line = String(write.mock.calls[0]?.[0]);
      expect(JSON.parse(line)).toMatchObject({
        level: 'debug',
        component: 'ConstraintBuilder',
        event: 'constraint_created',
        data: { tag: 'rsc_order', id: 'ha_order_set_A', sets: [['A']] },
      });
    });
  });

  it('should report a tree without a constraints section', () => {
    const cib = element('cib', {}, [element('resources', {}, [element('primitive', { id: 'A' })])]);
    expect(
      reportsThrownBy(() => createConstraintWithSets(cib, 'order', [{ ids: ['A'], options: {} }], {}, settings))
    ).toEqual([
      {
        kind: 'CibSectionMissing',
        severity: 'ERROR',
        forceCode: null,
        payload: { section: 'constraints' },
      },
    ]);
  });
});
