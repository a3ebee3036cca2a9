import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FilesystemError, KeyFileError } from '../../core/src/errors/index.js';
import { KeySlot } from '../../core/src/crypto/keys.js';
import { toHex } from '../../core/src/util/bytes.js';
import { loadKeyFile, parseKeyFile } from '../src/keyFile.js';

const KEY_X_HEX = '00112233445566778899aabbccddeeff';

describe('parseKeyFile', () => {
  it('collects KeyX and normal keys per slot', () => {
    const slots = parseKeyFile([
      '# retail keys',
      '',
      `slot0x2CKeyX=${KEY_X_HEX}`,
      'slot0x2CKeyY = 0f0f0f0f0f0f0f0f0f0f0f0f0f0f0f0f',
      `  slot0x25KeyN = ${'5A'.repeat(16)}  `,
    ].join('\r\n'));

    expect([...slots.keys()]).toEqual([0x2C, 0x25]);
    const secure1 = slots.get(0x2C);
    expect(secure1?.keyX && toHex(secure1.keyX)).toBe(KEY_X_HEX);
    expect(secure1?.normalKey).toBeUndefined();
    const other = slots.get(0x25);
    expect(other?.normalKey && toHex(other.normalKey)).toBe('5a'.repeat(16));
  });

  it('merges KeyX and normal key lines of one slot', () => {
    const slot = parseKeyFile(`slot0x2CKeyX=${KEY_X_HEX}\nslot0x2CKeyN=${'11'.repeat(16)}\n`).get(0x2C);
    expect(slot?.keyX && toHex(slot.keyX)).toBe(KEY_X_HEX);
    expect(slot?.normalKey && toHex(slot.normalKey)).toBe('11'.repeat(16));
  });

  it('rejects malformed lines with their line number', () => {
    expect(() => parseKeyFile(`# header\nslot0x2CKeyX=1234\n`))
      .toThrowError(new KeyFileError('Malformed key entry on line 2'));
    expect(() => parseKeyFile('boot9=present')).toThrow(KeyFileError);
  });
});

describe('loadKeyFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'ncch-keys-'));
  });

  afterAll(() => fs.rm(dir, { recursive: true, force: true }));

  it('returns a provider that scrambles the configured KeyX', async () => {
    const path = join(dir, 'keys.txt');
    await fs.writeFile(path, `slot0x2CKeyX=${KEY_X_HEX}\n`);

    const provider = await loadKeyFile(path);
    const r = provider.resolveNormalKey(KeySlot.NCCHSecure1, new Uint8Array(16).fill(0x0f));
    expect(r.available && toHex(r.key)).toBe('de4ce595be97a2b8b6722c4d6c97d79b');
  });

  it('wraps read failures in FilesystemError', async () => {
    await expect(loadKeyFile(join(dir, 'nope.txt'))).rejects.toBeInstanceOf(FilesystemError);
  });
});
