import { ContractViolationError } from '../src/errors/index.js';
import { alignUp, loadSharedRomFs } from '../src/romfs/sharedRomFs.js';
import { EXEFS_BYTE_OFFSET, buildContainer, buildIvfcImage, pattern } from './_helper.js';

// Without ExHeader and ExeFS the fixtures put RomFS at 0xA00 (media unit 5).
const ROMFS_OFFSET = EXEFS_BYTE_OFFSET;

function image(payload: Uint8Array, blockSizeLog2?: number, masterHashSize?: number): Uint8Array {
  return buildContainer({
    noCrypto: true,
    exheader: null,
    romfs   : buildIvfcImage(payload, blockSizeLog2, masterHashSize),
  });
}

function patch32(buf: Uint8Array, at: number, value: number): Uint8Array {
  const out = buf.slice();
  new DataView(out.buffer).setUint32(at, value, true);
  return out;
}

describe('alignUp', () => {
  it('rounds up to the next multiple', () => {
    expect(alignUp(0x60, 0x200)).toBe(0x200);
    expect(alignUp(0x200, 0x200)).toBe(0x200);
    expect(alignUp(0, 0x1000)).toBe(0);
  });
});

describe('loadSharedRomFs', () => {
  it('extracts the level 3 payload after a 512-byte aligned header', () => {
    const payload = pattern(0x123, 4);
    const img = image(payload, 9, 0);

    const out = loadSharedRomFs(img);
    expect(out.byteLength).toBe(0x123);
    expect(Array.from(out)).toEqual(Array.from(img.subarray(ROMFS_OFFSET + 0x200, ROMFS_OFFSET + 0x323)));
    expect(Array.from(out)).toEqual(Array.from(payload));
  });

  it('skips the master hash up to the level 3 block size', () => {
    const payload = pattern(0x40, 6);
    const out = loadSharedRomFs(image(payload, 12, 0x20));
    expect(Array.from(out)).toEqual(Array.from(payload));
  });

  it('returns a copy', () => {
    const img = image(pattern(16), 9, 0);
    const out = loadSharedRomFs(img);
    out[0] ^= 0xff;
    expect(img[ROMFS_OFFSET + 0x200]).toBe(pattern(16)[0]);
  });

  it('rejects a buffer shorter than the outer header', () => {
    expect(() => loadSharedRomFs(new Uint8Array(0x100)))
      .toThrowError(new ContractViolationError('NCCH size is too small'));
  });

  it('rejects a buffer that ends inside the IVFC header', () => {
    const img = image(pattern(16), 9, 0).subarray(0, ROMFS_OFFSET + 0x20);
    expect(() => loadSharedRomFs(img)).toThrowError('NCCH size is too small');
  });

  it('rejects a wrong IVFC magic', () => {
    const img = patch32(image(pattern(16), 9, 0), ROMFS_OFFSET, 0);
    expect(() => loadSharedRomFs(img)).toThrowError(new ContractViolationError('IVFC magic is incorrect'));
  });

  it('rejects a wrong IVFC version', () => {
    const img = patch32(image(pattern(16), 9, 0), ROMFS_OFFSET + 4, 0x20000);
    expect(() => loadSharedRomFs(img)).toThrowError(new ContractViolationError('IVFC version is incorrect'));
  });

  it('rejects an out of range block size', () => {
    // level 3 descriptor: 0x0C + 2 * 0x18, block size at +0x10
    const img = patch32(image(pattern(16), 9, 0), ROMFS_OFFSET + 0x4C, 40);
    expect(() => loadSharedRomFs(img)).toThrowError('IVFC block size 2^40 is out of range');
  });

  it('rejects a payload running past the end of the buffer', () => {
    const img = image(pattern(0x300), 9, 0).subarray(0, ROMFS_OFFSET + 0x200 + 0x100);
    expect(() => loadSharedRomFs(img))
      .toThrowError(new ContractViolationError('NCCH size is too small for the RomFS payload'));
  });
});
