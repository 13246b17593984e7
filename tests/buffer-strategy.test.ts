import { describe, it, expect } from 'vitest';
import { selectBufferMode } from '../src/importers/gltf/mesh-decoder';

describe('selectBufferMode', () => {
  it('selects shared mode when every primitive has the same accessors', () => {
    const attributes = { POSITION: 0, NORMAL: 1, TEXCOORD_0: 2 };
    expect(selectBufferMode([
      { attributes: { ...attributes } },
      { attributes: { ...attributes } },
      { attributes: { ...attributes } },
    ])).toBe('shared');
  });

  it('treats a single primitive as shared', () => {
    expect(selectBufferMode([{ attributes: { POSITION: 4 } }])).toBe('shared');
  });

  it('selects independent mode when one accessor index differs', () => {
    expect(selectBufferMode([
      { attributes: { POSITION: 0, NORMAL: 1 } },
      { attributes: { POSITION: 0, NORMAL: 1 } },
      { attributes: { POSITION: 0, NORMAL: 5 } },
    ])).toBe('independent');
  });

  it('selects independent mode when the semantic sets differ', () => {
    expect(selectBufferMode([
      { attributes: { POSITION: 0, NORMAL: 1 } },
      { attributes: { POSITION: 0 } },
    ])).toBe('independent');

    expect(selectBufferMode([
      { attributes: { POSITION: 0, NORMAL: 1 } },
      { attributes: { POSITION: 0, TEXCOORD_0: 1 } },
    ])).toBe('independent');
  });
});
