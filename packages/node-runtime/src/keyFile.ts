// packages/node-runtime/src/keyFile.ts
import { readFile } from 'node:fs/promises';
import { ScramblerKeyProvider, type SlotKeys } from '../../core/src/crypto/keys.js';
import { FilesystemError, KeyFileError } from '../../core/src/errors/index.js';
import { fromHex } from '../../core/src/util/bytes.js';

// slot0x2CKeyX=0123...  /  slot0x2CKeyN=0123...
const LINE = /^slot0x([0-9a-fA-F]{1,2})Key([XN])\s*=\s*([0-9a-fA-F]{32})$/;

/**
 * Parse key file text into per-slot keys. Blank lines and `#` comments are
 * skipped; KeyY entries are ignored since the container supplies its own.
 */
export function parseKeyFile(text: string): Map<number, SlotKeys> {
  const slots = new Map<number, SlotKeys>();
  text.split(/\r?\n/).forEach((rawLine, idx) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) return;
    if (/^slot0x[0-9a-fA-F]{1,2}KeyY\s*=/.test(line)) return;

    const m = LINE.exec(line);
    if (!m) throw new KeyFileError(`Malformed key entry on line ${idx + 1}`);

    const slot = parseInt(m[1], 16);
    const key  = fromHex(m[3]);
    const keys = slots.get(slot) ?? {};
    if (m[2] === 'X') keys.keyX = key;
    else keys.normalKey = key;
    slots.set(slot, keys);
  });
  return slots;
}

export async function loadKeyFile(path: string): Promise<ScramblerKeyProvider> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new FilesystemError(`Failed to read key file ${path}: ${msg}`);
  }
  return new ScramblerKeyProvider(parseKeyFile(text));
}
