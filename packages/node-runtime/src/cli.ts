#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, Option } from 'commander';
import { readFile, writeFile } from 'node:fs/promises';
import { stderr, stdout } from 'node:process';
import { pathToFileURL } from 'node:url';
import {
  loadSharedRomFs,
  NcchError,
  type NcchContainer,
  type NcchContainerOptions,
  type NcchResult,
  type Verbosity,
} from '../../core/src/index.js';
import { formatId } from '../../core/src/util/bytes.js';
import { openNcchFile } from './index.js';
import { loadKeyFile } from './keyFile.js';

const PKG_VERSION = '0.3.0'; // sync with root package.json

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const processIO: CliIO = {
  out: (text) => { stdout.write(text); },
  err: (text) => { stderr.write(text); },
};

interface GlobalOpts {
  keys?  : string;
  verbose: number;
}

const VERBOSITY: readonly Verbosity[] = [0, 1, 2, 3, 4];

class CliFailure extends NcchError {}

function unwrap<T>(r: NcchResult<T>, what: string): T {
  if (r.status !== 'Success') throw new CliFailure(`${what}: ${r.status} (${r.message})`);
  return r.value;
}

async function containerOptions(opts: GlobalOpts, io: CliIO): Promise<NcchContainerOptions> {
  return {
    keyProvider: opts.keys ? await loadKeyFile(opts.keys) : undefined,
    verbose    : VERBOSITY[Math.min(opts.verbose, VERBOSITY.length - 1)],
    logger     : (msg) => io.err(`${msg}\n`),
  };
}

async function withContainer<T>(
  file: string,
  opts: GlobalOpts,
  io  : CliIO,
  fn  : (c: NcchContainer) => Promise<T>,
): Promise<T> {
  const opened = await openNcchFile(file, await containerOptions(opts, io));
  try {
    return await fn(opened.container);
  } finally {
    await opened.close();
  }
}

async function summarize(c: NcchContainer): Promise<Record<string, unknown>> {
  const header = unwrap(await c.readHeader(), 'load');
  const info: Record<string, unknown> = {
    programId  : formatId(header.programId),
    productCode: header.productCode,
    version    : header.version,
    crypto     : c.cryptoState,
    hasRomFs   : await c.hasRomFs(),
  };

  const exheader = await c.readExtendedHeader();
  if (exheader.status === 'Success') {
    info.name = exheader.value.name;
    const extdata = await c.readExtDataId();
    info.extdataId = extdata.status === 'Success' ? formatId(extdata.value) : null;
  }

  const sections = await c.listSections();
  if (sections.status === 'Success') {
    info.exefs = sections.value.map((s) => ({ name: s.name, size: s.size }));
  }
  return info;
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('ncch')
    .version(PKG_VERSION)
    .description('Inspect NCCH containers and extract their sections')
    .configureOutput({ writeOut: io.out, writeErr: io.err })
    .addOption(new Option('-k, --keys <path>', 'key file with slot KeyX / normal keys'))
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1),
    );

  program
    .command('info <file>')
    .description('Print header metadata as JSON')
    .action(async (file: string) => {
      const info = await withContainer(file, program.opts<GlobalOpts>(), io, summarize);
      io.out(JSON.stringify(info, null, 2) + '\n');
    });

  program
    .command('section <file> <name>')
    .description('Write one decrypted ExeFS section')
    .requiredOption('-o, --out <path>', 'output file')
    .action(async (file: string, name: string, cmd: { out: string }) => {
      const data = await withContainer(file, program.opts<GlobalOpts>(), io,
        async (c) => unwrap(await c.loadSectionByName(name), `section ${name}`));
      await writeFile(cmd.out, data);
      io.out(`${name}: ${data.byteLength} bytes\n`);
    });

  program
    .command('romfs <file>')
    .description('Write the RomFS payload of a decrypted container')
    .requiredOption('-o, --out <path>', 'output file')
    .action(async (file: string, cmd: { out: string }) => {
      const romfs = loadSharedRomFs(new Uint8Array(await readFile(file)));
      await writeFile(cmd.out, romfs);
      io.out(`romfs: ${romfs.byteLength} bytes\n`);
    });

  return program;
}

function reportError(err: unknown): void {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  process.exitCode = 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  createProgram().parseAsync(process.argv).catch(reportError);
}
