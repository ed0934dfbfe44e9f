/**
 * tinydns flat-file backend
 *
 * Challenge records live in the tinydns-data source file as TXT lines:
 *
 *   '_acme-challenge.example.com:token:60
 *
 * `commit()` runs `make` in the data directory, which compiles data.cdb.
 */

import { constants } from 'fs';
import { access, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { MAKE_BIN, TINYDNS_DATA_FILE } from '../constants/defaults.js';
import { normalizeName } from '../dns/txt.js';
import type { CommandRunner } from '../utils/command.js';
import { debugBackend } from '../utils/debug.js';
import type { RecordBackend } from './types.js';

export interface TinydnsBackendOptions {
  /** Directory holding `data` and the Makefile */
  root: string;
  ttl: number;
  runner: CommandRunner;
  /** make binary (default: make) */
  makeBin?: string;
}

/** Escape a TXT value for tinydns-data: ':' '\\' and non-printable bytes as \ooo */
export function escapeTinydnsText(value: string): string {
  let out = '';
  for (const byte of Buffer.from(value, 'utf8')) {
    const printable = byte >= 0x20 && byte <= 0x7e && byte !== 0x3a && byte !== 0x5c;
    out += printable ? String.fromCharCode(byte) : `\\${byte.toString(8).padStart(3, '0')}`;
  }
  return out;
}

export function unescapeTinydnsText(text: string): string {
  const bytes: number[] = [];
  for (const part of text.split(/(\\[0-7]{3})/)) {
    const octal = /^\\([0-7]{3})$/.exec(part);
    if (octal) bytes.push(parseInt(octal[1], 8) & 0xff);
    else bytes.push(...Buffer.from(part, 'utf8'));
  }
  return Buffer.from(bytes).toString('utf8');
}

export function formatTxtLine(name: string, value: string, ttl: number): string {
  return `'${normalizeName(name)}:${escapeTinydnsText(value)}:${ttl}`;
}

export interface TxtLine {
  name: string;
  value: string;
}

/** Parse a `'fqdn:text:ttl...` line; anything else yields undefined */
export function parseTxtLine(line: string): TxtLine | undefined {
  if (!line.startsWith("'")) return undefined;
  const [name, text = ''] = line.slice(1).split(':');
  return { name: normalizeName(name), value: unescapeTinydnsText(text) };
}

export class TinydnsBackend implements RecordBackend {
  readonly name = 'tinydns';
  private readonly dataFile: string;

  constructor(private readonly opts: TinydnsBackendOptions) {
    this.dataFile = join(opts.root, TINYDNS_DATA_FILE);
  }

  async probe(): Promise<void> {
    await access(this.dataFile, constants.R_OK | constants.W_OK);
  }

  async read(name: string): Promise<string[]> {
    const wanted = normalizeName(name);
    const values: string[] = [];
    for (const line of await this.lines()) {
      const txt = parseTxtLine(line);
      if (txt && txt.name === wanted) values.push(txt.value);
    }
    return values;
  }

  async add(name: string, value: string): Promise<void> {
    const line = formatTxtLine(name, value, this.opts.ttl);
    const lines = await this.lines();
    if (lines.includes(line)) {
      debugBackend('tinydns: %s already present', line);
      return;
    }
    debugBackend('tinydns: adding %s', line);
    await this.save([...lines, line]);
  }

  async remove(name: string, value: string): Promise<void> {
    const wanted = normalizeName(name);
    const lines = await this.lines();
    const kept = lines.filter((line) => {
      const txt = parseTxtLine(line);
      return !(txt && txt.name === wanted && txt.value === value);
    });
    if (kept.length === lines.length) {
      debugBackend('tinydns: nothing to remove for %s', wanted);
      return;
    }
    debugBackend('tinydns: removing %d line(s) for %s', lines.length - kept.length, wanted);
    await this.save(kept);
  }

  async commit(): Promise<void> {
    await this.opts.runner.run(this.opts.makeBin ?? MAKE_BIN, [], { cwd: this.opts.root });
  }

  private async lines(): Promise<string[]> {
    const content = await readFile(this.dataFile, 'utf8');
    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
  }

  /** Replace the data file atomically */
  private async save(lines: string[]): Promise<void> {
    const tmp = `${this.dataFile}.tmp`;
    await writeFile(tmp, lines.map((l) => `${l}\n`).join(''), 'utf8');
    await rename(tmp, this.dataFile);
  }
}
