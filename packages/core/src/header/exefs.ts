// packages/core/src/header/exefs.ts
import {
  EXEFS_HEADER_SIZE,
  EXEFS_MAX_SECTIONS,
  EXEFS_NAME_LENGTH,
} from '../config/constants.js';
import { readAscii, view } from '../util/bytes.js';
import { requireLength } from './guard.js';

export interface ExeFsSection {
  name  : string;
  /** relative to the end of the ExeFS header */
  offset: number;
  size  : number;
}

export interface ExeFsHeader {
  /** always EXEFS_MAX_SECTIONS entries; unused slots have an empty name */
  sections: ExeFsSection[];
  /** SHA-256 per slot, in slot order (stored reversed on disk); not verified */
  hashes  : Uint8Array[];
}

const HASHES_OFFSET = 0xC0;
const HASH_SIZE = 0x20;

export function decodeExeFsHeader(buf: Uint8Array): ExeFsHeader {
  requireLength(buf, EXEFS_HEADER_SIZE, 'ExeFS header');
  const dv = view(buf);

  const sections: ExeFsSection[] = [];
  const hashes: Uint8Array[] = [];
  for (let i = 0; i < EXEFS_MAX_SECTIONS; i++) {
    const base = i * 0x10;
    sections.push({
      name  : readAscii(buf, base, EXEFS_NAME_LENGTH),
      offset: dv.getUint32(base + 8, true),
      size  : dv.getUint32(base + 12, true),
    });
    const h = HASHES_OFFSET + (EXEFS_MAX_SECTIONS - 1 - i) * HASH_SIZE;
    hashes.push(buf.slice(h, h + HASH_SIZE));
  }
  return { sections, hashes };
}

/** First descriptor whose name matches exactly, in slot order. */
export function findSection(header: ExeFsHeader, name: string): ExeFsSection | undefined {
  if (name === '') return undefined;
  return header.sections.find((s) => s.name === name);
}
