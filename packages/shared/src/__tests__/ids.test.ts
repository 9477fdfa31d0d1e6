import { describe, it, expect } from 'vitest';
import { decodeTime } from 'ulid';
import { generateUlid } from '../utils/ids';

describe('generateUlid', () => {
  it('generates a 26-character Crockford base32 string', () => {
    expect(generateUlid()).toMatch(/^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/);
  });

  it('generates sortable IDs', () => {
    const id1 = generateUlid();
    const id2 = generateUlid();
    expect(id2 > id1).toBe(true);
  });

  // Monotonic: a seed earlier than a previous id's time is ignored, so seed ahead of the clock.
  it('embeds the seed time', () => {
    const id = generateUlid(4_102_444_800_000);
    expect(decodeTime(id)).toBe(4_102_444_800_000);
  });
});
