import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { splitClause, tokenizeClause } from './splitter.js';
import type { ClauseNode } from './types.js';

function collectBodies(node: ClauseNode): string[] {
  return [node.body, ...node.children.flatMap(collectBodies)];
}

describe('Clause splitter', () => {
  it('should split A_AND_B_WITH_C into a root with two children', () => {
    expect(splitClause('THEN', 'A_AND_B_WITH_C')).toEqual({
      tag: 'THEN',
      body: 'A',
      children: [
        { tag: 'AND', body: 'B', children: [] },
        { tag: 'WITH', body: 'C', children: [] },
      ],
    });
  });

  it('should match joiners in any case and tag children in upper case', () => {
    const node = splitClause(
      'THEN',
      'it_increments_the_reference_count_and_returns_its_new_value'
    );

    expect(node).toEqual({
      tag: 'THEN',
      body: 'it increments the reference count',
      children: [{ tag: 'AND', body: 'returns its new value', children: [] }],
    });
  });

  it('should leave a clause without joiners as a single node', () => {
    expect(splitClause('GIVEN', 'an_empty_stack')).toEqual({
      tag: 'GIVEN',
      body: 'an empty stack',
      children: [],
    });
  });

  it('should not split on joiner words inside other words', () => {
    expect(splitClause('WHEN', 'Band_WITHDRAW_is_called').children).toEqual([]);
  });

  it('should keep the joiner after is_called', () => {
    expect(splitClause('WHEN', 'Add_is_called_WITH_a_null_pointer_BUT_no_owner')).toEqual({
      tag: 'WHEN',
      body: 'Add is called',
      children: [
        { tag: 'WITH', body: 'a null pointer', children: [] },
        { tag: 'BUT', body: 'no owner', children: [] },
      ],
    });
  });

  it('should produce an empty segment between adjacent joiners', () => {
    expect(tokenizeClause('A_AND_WITH_B')).toEqual({
      head: 'A',
      joins: [
        { joiner: 'AND', text: '' },
        { joiner: 'WITH', text: 'B' },
      ],
    });
  });

  it('should never leave a joiner token in any body', () => {
    const word = fc.constantFrom('alpha', 'beta', 'and', 'WITH', 'but', 'gamma', 'x');
    fc.assert(
      fc.property(fc.array(word, { minLength: 1, maxLength: 12 }), (words) => {
        const bodies = collectBodies(splitClause('THEN', words.join('_')));
        for (const body of bodies) {
          expect(body.replace(/ /g, '_')).not.toMatch(/_(and|with|but)_/i);
        }
      }),
      { numRuns: 200 }
    );
  });
});
