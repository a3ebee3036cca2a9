/* ------------------------------------------------------------------
   ByteSource - out‑of‑bounds & zero‑length slices
   ------------------------------------------------------------------ */
import { ByteSource } from '../../src/util/ByteSource.js';

const SAMPLE = new Uint8Array(256).map((_, i) => i);

const SOURCES: Array<[string, Blob | Uint8Array]> = [
  ['Uint8Array', SAMPLE],
  ['Blob',       new Blob([SAMPLE])],
];

describe.each(SOURCES)('ByteSource (%s)', (_label, input) => {

  const bs = new ByteSource(input);

  it('reports the underlying length', () => {
    expect(bs.length).toBe(256);
  });

  it('returns a copy of the requested slice', async () => {
    const slice = await bs.read(10, 4);
    expect(Array.from(slice)).toEqual([10, 11, 12, 13]);
    slice[0] = 0xff;
    expect(Array.from(await bs.read(10, 1))).toEqual([10]);
  });

  it('throws RangeError when slice exceeds bounds', async () => {
    await expect(bs.read(200, 100)).rejects.toThrow(RangeError);
    await expect(bs.read(-1, 2)).rejects.toThrow(RangeError);
  });

  it('returns 0‑byte slice at EOF', async () => {
    const tail = await bs.read(bs.length, 0);
    expect(tail.byteLength).toBe(0);
  });
});
