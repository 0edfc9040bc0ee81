import 'reflect-metadata';

import { describe, expect, it } from 'vitest';

import { parseReferenceMaterials } from '../../../src/core/knowledge/typeormKnowledgeStore';

describe('parseReferenceMaterials', () => {
  it('keeps well-formed entries and normalises optional fields', () => {
    const raw = [
      { rid: 'R1', title: 'Structure and Interpretation of Computer Programs', location: 'ch. 1.2', year: 1996 },
      { rid: 'R2', title: 'Lecture notes', kind: 'notes', url: '' },
      { title: 'No id' },
      'just a string',
    ];

    expect(parseReferenceMaterials(raw)).toEqual([
      { rid: 'R1', title: 'Structure and Interpretation of Computer Programs', location: 'ch. 1.2', year: '1996' },
      { rid: 'R2', title: 'Lecture notes', kind: 'notes' },
    ]);
  });

  it('returns an empty list for anything that is not an array', () => {
    expect(parseReferenceMaterials({ rid: 'R1' })).toEqual([]);
    expect(parseReferenceMaterials(null)).toEqual([]);
  });
});
