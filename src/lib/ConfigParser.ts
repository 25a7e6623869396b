import { pipeline, Transform } from 'stream';
import type { Readable, TransformCallback } from 'stream';
import { StringDecoder } from 'string_decoder';
import { ConfigError } from './errors.js';
import type { ConfigMapping, ConfigSection, ConfigTable } from './types.js';

/** Section whose options every other section falls back to. */
export const DEFAULT_SECTION = 'DEFAULT';

const SECTION_REGEX = /^\[(.+)\]/;
const OPTION_REGEX = /^(.*?)\s*([=:])\s*(.*)$/;

interface OpenSection {
  name: string;
  values: Map<string, string[]>;
}

/**
 * A Transform stream that parses a Planet-style INI config file and emits
 * one {@link ConfigSection} object per section once the section is complete.
 *
 * Supported syntax:
 * - `[section]` headers, case-sensitive, each name at most once except `DEFAULT`
 * - `key = value` and `key: value`, keys lowercased
 * - `#` and `;` comment lines
 * - values continued on lines indented deeper than their key
 *
 * @example
 * // Input:  "[https://a.example/feed]\nname = A\n"
 * // Output: { name: 'https://a.example/feed', options: { name: 'A' } }
 */
export class ConfigParser extends Transform {
  private decoder = new StringDecoder('utf8');
  private buffer = '';
  private lineNumber = 0;
  private current: OpenSection | null = null;
  private currentKey: string | null = null;
  private currentKeyIndent = 0;
  private seenSections = new Set<string>();
  private defaultKeys = new Set<string>();

  constructor() {
    super({ readableObjectMode: true });
  }

  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    // The decoder holds back bytes of a character split across chunks.
    this.buffer +=
      typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    try {
      for (const line of lines) {
        this.processLine(line);
      }
      callback();
    } catch (error) {
      callback(toError(error));
    }
  }

  _flush(callback: TransformCallback): void {
    this.buffer += this.decoder.end();

    try {
      if (this.buffer !== '') {
        this.processLine(this.buffer);
        this.buffer = '';
      }
      this.emitCurrent();
      callback();
    } catch (error) {
      callback(toError(error));
    }
  }

  private processLine(rawLine: string): void {
    this.lineNumber++;

    let line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (this.lineNumber === 1 && line.startsWith('\uFEFF')) {
      line = line.slice(1);
    }
    const stripped = line.trim();

    if (stripped === '') {
      // Kept in case the value continues below; trailing blanks are trimmed on emit.
      if (this.current && this.currentKey !== null) {
        this.current.values.get(this.currentKey)?.push('');
      }
      return;
    }

    // Skipped without closing the value; deeper-indented lines still continue it.
    if (stripped.startsWith('#') || stripped.startsWith(';')) {
      return;
    }

    const indent = line.length - line.trimStart().length;

    if (
      this.current &&
      this.currentKey !== null &&
      indent > this.currentKeyIndent
    ) {
      this.current.values.get(this.currentKey)?.push(stripped);
      return;
    }

    const header = SECTION_REGEX.exec(stripped);
    if (header) {
      this.openSection(header[1]);
      return;
    }

    if (!this.current) {
      throw new ConfigError(
        `Line ${this.lineNumber}: option outside of any section: ${stripped}`
      );
    }

    const option = OPTION_REGEX.exec(stripped);
    if (!option || option[1] === '') {
      throw new ConfigError(
        `Line ${this.lineNumber}: cannot parse "${stripped}"`
      );
    }

    const key = option[1].toLowerCase();
    const isDefault = this.current.name === DEFAULT_SECTION;
    if (
      this.current.values.has(key) ||
      (isDefault && this.defaultKeys.has(key))
    ) {
      throw new ConfigError(
        `Line ${this.lineNumber}: option "${key}" already set in section "${this.current.name}"`
      );
    }

    this.current.values.set(key, [option[3]]);
    if (isDefault) this.defaultKeys.add(key);
    this.currentKey = key;
    this.currentKeyIndent = indent;
  }

  /**
   * Repeated `DEFAULT` blocks are allowed; each is emitted on its own and
   * {@link toConfigMapping} merges them.
   */
  private openSection(name: string): void {
    if (name !== DEFAULT_SECTION && this.seenSections.has(name)) {
      throw new ConfigError(
        `Line ${this.lineNumber}: section "${name}" already defined`
      );
    }

    this.emitCurrent();
    this.seenSections.add(name);
    this.current = { name, values: new Map() };
    this.currentKey = null;
  }

  private emitCurrent(): void {
    if (!this.current) return;

    const options: ConfigTable = Object.fromEntries(
      Array.from(this.current.values, ([key, lines]): [string, string] => [
        key,
        lines.join('\n').trimEnd(),
      ])
    );
    const section: ConfigSection = { name: this.current.name, options };
    this.push(section);

    this.current = null;
    this.currentKey = null;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Folds parsed sections into a mapping of section name to options, filling
 * each section's gaps from the `DEFAULT` blocks, merged in file order.
 */
export function toConfigMapping(sections: ConfigSection[]): ConfigMapping {
  const defaults: ConfigTable = {};
  for (const section of sections) {
    if (section.name === DEFAULT_SECTION) {
      Object.assign(defaults, section.options);
    }
  }

  const mapping: ConfigMapping = {};
  for (const { name, options } of sections) {
    mapping[name] =
      name === DEFAULT_SECTION ? { ...defaults } : { ...defaults, ...options };
  }
  return mapping;
}

/**
 * Reads a whole config file from a stream.
 * @throws {ConfigError} When the file has a line that cannot be parsed.
 */
export function readConfig(input: Readable): Promise<ConfigMapping> {
  return new Promise((resolve, reject) => {
    const parser = new ConfigParser();
    const sections: ConfigSection[] = [];

    parser.on('data', (section: ConfigSection) => {
      sections.push(section);
    });

    pipeline(input, parser, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(toConfigMapping(sections));
    });
  });
}
