import { ReportListError } from '../reports/errors.js';
import type { ReportItem } from '../reports/types.js';
import { CibElement, element } from './tree.js';

/**
 * A small configuration tree:
 * primitives A, B and C; clone `C-clone` around R; master `M-master` around
 * group G with P.
 */
export function sampleCib(): CibElement {
  return element('cib', {}, [
    element('configuration', {}, [
      element('resources', {}, [
        element('primitive', { id: 'A' }),
        element('primitive', { id: 'B' }),
        element('primitive', { id: 'C' }),
        element('clone', { id: 'C-clone' }, [element('primitive', { id: 'R' })]),
        element('master', { id: 'M-master' }, [
          element('group', { id: 'G' }, [element('primitive', { id: 'P' })]),
        ]),
      ]),
      element('constraints'),
    ]),
  ]);
}

/**
 * Runs `operation` and returns the reports of the ReportListError it throws.
 */
export function reportsThrownBy(operation: () => unknown): ReportItem[] {
  try {
    operation();
  } catch (error) {
    if (error instanceof ReportListError) {
      return [...error.reports];
    }
    throw error;
  }
  throw new Error('Expected a ReportListError');
}
