import { NcchContainer } from '../src/container/NcchContainer.js';
import { KeySlot, ScramblerKeyProvider } from '../src/crypto/keys.js';
import { ByteSource } from '../src/util/ByteSource.js';
import {
  EXEFS_BYTE_OFFSET,
  RecordingSource,
  TEST_KEY,
  TruncatingSource,
  buildContainer,
  pattern,
} from './_helper.js';

const keyProvider = new ScramblerKeyProvider([[KeySlot.NCCHSecure1, { normalKey: TEST_KEY }]]);

const bytes = (r: { status: string; value?: Uint8Array }) =>
  r.status === 'Success' && r.value ? Array.from(r.value) : r.status;

describe('NcchContainer.loadSectionByName', () => {
  it('reads exactly the described range of a plaintext section', async () => {
    const icon   = pattern(10, 1);
    const banner = pattern(20, 4);
    const src = new RecordingSource(buildContainer({
      noCrypto: true,
      sections: [
        { name: 'icon', data: icon, offset: 0 },
        { name: 'banner', data: banner, offset: 10 },
      ],
    }));
    const c = new NcchContainer(src);

    const r = await c.loadSectionByName('banner');
    expect(bytes(r)).toEqual(Array.from(banner));
    expect(src.reads.at(-1)).toEqual([EXEFS_BYTE_OFFSET + 0x200 + 10, 20]);
  });

  it.each([0, 1, 2])('decrypts sections of a version %i container', async (version) => {
    const code   = pattern(0x210, 6);
    const banner = pattern(0x25, 8);
    const c = new NcchContainer(
      new ByteSource(buildContainer({
        version,
        sections: [
          { name: '.code', data: code, offset: 0 },
          // not block aligned: keystream has to be entered mid-block
          { name: 'banner', data: banner, offset: 0x213 },
        ],
      })),
      { keyProvider },
    );

    expect(bytes(await c.loadSectionByName('.code'))).toEqual(Array.from(code));
    expect(bytes(await c.loadSectionByName('banner'))).toEqual(Array.from(banner));
  });

  it('decrypts sections of a fixed-key container', async () => {
    const icon = pattern(0x30, 7);
    const c = new NcchContainer(new ByteSource(buildContainer({
      fixedKey: true,
      sections: [{ name: 'icon', data: icon }],
    })));
    expect(bytes(await c.loadSectionByName('icon'))).toEqual(Array.from(icon));
  });

  it('returns NotFound for a missing or empty name', async () => {
    const c = new NcchContainer(new ByteSource(buildContainer({
      noCrypto: true,
      sections: [{ name: 'icon', data: pattern(4) }],
    })));
    expect(await c.loadSectionByName('logo')).toEqual({
      status : 'NotFound',
      message: 'ExeFS section "logo" not found',
    });
    // unused slots have an empty name and must not match
    expect((await c.loadSectionByName('')).status).toBe('NotFound');
  });

  it('takes the first of two descriptors with the same name', async () => {
    const first  = pattern(8, 1);
    const second = pattern(8, 2);
    const c = new NcchContainer(new ByteSource(buildContainer({
      noCrypto: true,
      sections: [
        { name: 'icon', data: first },
        { name: 'icon', data: second },
      ],
    })));
    expect(bytes(await c.loadSectionByName('icon'))).toEqual(Array.from(first));
  });

  it('fails with ReadFailed when the container has no ExeFS', async () => {
    const c = new NcchContainer(new ByteSource(buildContainer({ noCrypto: true })));
    expect(await c.loadSectionByName('icon')).toEqual({
      status : 'ReadFailed',
      message: 'Container has no ExeFS',
    });
  });

  it('fails with ReadFailed on a short section read', async () => {
    const image = buildContainer({ noCrypto: true, sections: [{ name: 'icon', data: pattern(16) }] });
    const c = new NcchContainer(new TruncatingSource(image, EXEFS_BYTE_OFFSET + 0x200 + 5));
    expect((await c.load()).status).toBe('Success');
    expect(await c.loadSectionByName('icon')).toEqual({
      status : 'ReadFailed',
      message: 'Short read of section icon: wanted 0x10, got 0x5',
    });
  });

  it('loads without a key when there is no ExHeader, but cannot open sections', async () => {
    const c = new NcchContainer(new ByteSource(buildContainer({
      exheader: null,
      sections: [{ name: 'icon', data: pattern(16) }],
    })));

    expect((await c.load()).status).toBe('Success');
    expect(c.cryptoState).toBe('encrypted');
    expect(await c.hasExeFs()).toBe(true);
    expect(await c.loadSectionByName('icon')).toEqual({
      status : 'EncryptedButNoKey',
      message: 'No key provider configured',
    });
    expect((await c.listSections()).status).toBe('EncryptedButNoKey');
  });
});

describe('NcchContainer.listSections', () => {
  it('lists occupied slots in slot order', async () => {
    const c = new NcchContainer(
      new ByteSource(buildContainer({
        sections: [
          { name: '.code', data: pattern(0x210) },
          { name: 'icon', data: pattern(0x30) },
        ],
      })),
      { keyProvider },
    );
    expect(await c.listSections()).toEqual({
      status: 'Success',
      value : [
        { name: '.code', offset: 0, size: 0x210 },
        { name: 'icon', offset: 0x400, size: 0x30 },
      ],
    });
  });

  it('returns NotFound without an ExeFS', async () => {
    const c = new NcchContainer(new ByteSource(buildContainer({ noCrypto: true })));
    expect((await c.listSections()).status).toBe('NotFound');
  });
});
